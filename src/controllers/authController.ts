import { Request, Response, NextFunction } from "express";
import { AuthService } from "../services/authService";
import { loggerFactory, ApiRouteLogger } from "../factory/loggerFactory";
import { HttpStatus } from "../factory/status";
import { bodyOf, readString } from "../utils/requestBody";
import { resolveClientIp } from "../utils/clientIp";
import { requireCurrentUser } from "../types/request";
import { UserRole, isEnumValue } from "../types/domain";
import { sendSuccess } from "./respond";

// Controller for registration, login and identity lookup
export class AuthController {
    private readonly apiLogger: ApiRouteLogger = loggerFactory.createApiLogger();

    constructor(private readonly authService: AuthService) {}

    register = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const body = bodyOf(req);
            const role = isEnumValue(UserRole, body.role) ? body.role : UserRole.Researcher;
            const user = await this.authService.register(
                { actorId: null, ip: resolveClientIp(req) },
                {
                    username: readString(body, "username") ?? "",
                    password: readString(body, "password") ?? "",
                    role
                }
            );
            sendSuccess(res, HttpStatus.CREATED, "User registered successfully", user);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };

    // Accepts form-encoded or JSON credentials.
    login = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const body = bodyOf(req);
            const token = await this.authService.login(
                { actorId: null, ip: resolveClientIp(req) },
                readString(body, "username") ?? "",
                readString(body, "password") ?? ""
            );
            sendSuccess(res, HttpStatus.OK, "Login successful", token);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };

    me = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        this.apiLogger.logRequest(req);
        try {
            sendSuccess(res, HttpStatus.OK, "Current user", requireCurrentUser(req));
        } catch (error) {
            next(error);
        }
    };
}
