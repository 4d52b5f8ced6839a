import { UserRepository } from "../repository/types";
import { CredentialService } from "./credentialService";
import { UserRole } from "../types/domain";
import { ErrorManager, isManagedError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, AuthRouteLogger, ErrorRouteLogger } from "../factory/loggerFactory";

// Seeds the bootstrap admin account at application startup
export class AdminInitService {
    private readonly errorManager = ErrorManager.getInstance();
    private readonly authLogger: AuthRouteLogger = loggerFactory.createAuthLogger();
    private readonly errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

    constructor(
        private readonly users: UserRepository,
        private readonly credentials: CredentialService
    ) {}

    // Creates the admin when both credentials are configured and the username is free.
    public async initializeAdminUser(username: string | undefined, password: string | undefined): Promise<void> {
        if (!username || !password) {
            this.authLogger.log("Admin credentials not configured. Skipping admin user creation.", {
                operation: "INIT_ADMIN_SKIP",
                reason: "missing_env_vars"
            });
            return;
        }

        try {
            const existing = await this.users.findByUsername(username);
            if (existing) {
                this.authLogger.logAdminBootstrap(username, false);
                return;
            }

            const passwordHash = await this.credentials.hashPassword(password);
            await this.users.create({ username, passwordHash, role: UserRole.Admin });
            this.authLogger.logAdminBootstrap(username, true);
        } catch (error) {
            if (isManagedError(error) && error.errorType === ErrorStatus.conflict) {
                this.authLogger.logAdminBootstrap(username, false);
                return;
            }
            const err = error instanceof Error ? error : new Error("Unknown error");
            this.errorLogger.logDatabaseError("INIT_ADMIN", "users", err.message);
            throw this.errorManager.createError(
                ErrorStatus.creationInternalServerError,
                `Failed to initialize admin user: ${err.message}`
            );
        }
    }
}
