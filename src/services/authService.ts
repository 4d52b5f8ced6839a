import { UserRepository } from "../repository/types";
import { CredentialService } from "./credentialService";
import { AuditContext, AuditRecorder } from "./auditRecorder";
import { AuditResult, AuditTarget, PublicUser, UserRecord, UserRole, toPublicUser } from "../types/domain";
import { ErrorManager, isManagedError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, AuthRouteLogger } from "../factory/loggerFactory";

export interface Registration {
    username: string;
    password: string;
    role: UserRole;
}

export interface AccessToken {
    access_token: string;
    token_type: "bearer";
}

// Account registration, login and token resolution.
export class AuthService {
    private readonly errorManager = ErrorManager.getInstance();
    private readonly authLogger: AuthRouteLogger = loggerFactory.createAuthLogger();

    constructor(
        private readonly users: UserRepository,
        private readonly credentials: CredentialService,
        private readonly audit: AuditRecorder
    ) {}

    public async register(context: AuditContext, registration: Registration): Promise<PublicUser> {
        const taken = () => this.audit.recordFailure(
            context,
            { action: "register", result: AuditResult.Deny, detail: "username_taken" },
            this.errorManager.createError(ErrorStatus.usernameTaken)
        );

        if (await this.users.findByUsername(registration.username)) {
            throw await taken();
        }

        const passwordHash = await this.credentials.hashPassword(registration.password);
        let created: UserRecord;
        try {
            created = await this.users.create({
                username: registration.username,
                passwordHash,
                role: registration.role
            });
        } catch (error) {
            if (isManagedError(error) && error.errorType === ErrorStatus.conflict) {
                throw await taken();
            }
            throw error;
        }

        const user = toPublicUser(created);
        await this.audit.record(
            { ...context, actorId: user.id },
            { action: "register", result: AuditResult.Ok, resourceType: AuditTarget.User, resourceId: user.id }
        );
        this.authLogger.logRegistration(user.id, user.username, user.role);
        return user;
    }

    public async login(context: AuditContext, username: string, password: string): Promise<AccessToken> {
        const user = await this.users.findByUsername(username);
        const valid = user ? await this.credentials.verifyPassword(password, user.passwordHash) : false;

        if (!user || !valid) {
            this.authLogger.logLogin(username, false);
            throw await this.audit.recordFailure(
                { ...context, actorId: user?.id ?? null },
                { action: "login", result: AuditResult.Deny, detail: "bad_credentials" },
                this.errorManager.createError(ErrorStatus.invalidCredentials)
            );
        }

        await this.audit.record(
            { ...context, actorId: user.id },
            { action: "login", result: AuditResult.Ok }
        );
        this.authLogger.logLogin(username, true);
        return { access_token: this.credentials.issueToken(toPublicUser(user)), token_type: "bearer" };
    }

    // Resolves a bearer token to the persisted user; the stored role is the one that counts.
    public async resolveToken(token: string): Promise<PublicUser> {
        const username = this.credentials.verifyToken(token);
        const user = await this.users.findByUsername(username);
        if (!user) {
            this.authLogger.logTokenValidation(username, false, "user_not_found");
            throw this.errorManager.createError(ErrorStatus.unauthenticated, "User not found", "user_not_found");
        }
        this.authLogger.logTokenValidation(username, true);
        return toPublicUser(user);
    }
}
