import bcrypt from "bcrypt";
import jwt from "jsonwebtoken";
import { Settings } from "../config/settings";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { PublicUser } from "../types/domain";

export type CredentialSettings = Pick<Settings, "jwtSecret" | "jwtAlgorithm" | "accessTokenExpireMinutes">;

// Password hashing and signed identity tokens.
export class CredentialService {
    private readonly errorManager = ErrorManager.getInstance();

    constructor(
        private readonly settings: CredentialSettings,
        private readonly saltRounds: number = 10
    ) {}

    public async hashPassword(password: string): Promise<string> {
        return await bcrypt.hash(password, this.saltRounds);
    }

    public async verifyPassword(password: string, passwordHash: string): Promise<boolean> {
        return await bcrypt.compare(password, passwordHash);
    }

    // `sub` carries the username; the role claim is informational only.
    public issueToken(user: PublicUser): string {
        return jwt.sign({ role: user.role }, this.settings.jwtSecret, {
            subject: user.username,
            algorithm: this.settings.jwtAlgorithm,
            expiresIn: this.settings.accessTokenExpireMinutes * 60
        });
    }

    // Returns the username named by a valid token.
    public verifyToken(token: string): string {
        let decoded: string | jwt.JwtPayload;
        try {
            decoded = jwt.verify(token, this.settings.jwtSecret, { algorithms: [this.settings.jwtAlgorithm] });
        } catch (error) {
            const reason = error instanceof jwt.TokenExpiredError ? "token_expired" : "invalid_token";
            throw this.errorManager.createError(ErrorStatus.unauthenticated, "Invalid token", reason);
        }
        if (typeof decoded === "string" || typeof decoded.sub !== "string" || decoded.sub === "") {
            throw this.errorManager.createError(ErrorStatus.unauthenticated, "Invalid token", "invalid_token");
        }
        return decoded.sub;
    }
}
