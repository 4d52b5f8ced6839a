import { Request, Response, NextFunction, RequestHandler } from "express";
import { loggerFactory, ApiRouteLogger, ErrorRouteLogger } from "../factory/loggerFactory";
import { ErrorManager, isManagedError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { AuthService } from "../services/authService";
import "../types/request";

const authLogger: ApiRouteLogger = loggerFactory.createApiLogger();
const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();
const errorManager = ErrorManager.getInstance();

// Check authorization header.
export const checkAuthHeader = (req: Request, res: Response, next: NextFunction): void => {
    if (!req.headers.authorization) {
        authLogger.log("Authorization check failed - missing header", {
            reason: "Authorization header missing",
            ip: req.ip,
            path: req.path,
            method: req.method
        });
        next(errorManager.createError(ErrorStatus.unauthenticated, "Not authenticated", "missing_token"));
        return;
    }
    next();
};

// Extracts the Bearer token from the Authorization header.
export const extractToken = (req: Request, res: Response, next: NextFunction): void => {
    const [scheme, token, ...rest] = (req.headers.authorization ?? "").trim().split(/\s+/);

    if (scheme?.toLowerCase() !== "bearer" || !token || rest.length > 0) {
        authLogger.log("Token extraction failed", {
            reason: "Invalid token format, expected \"Bearer <token>\"",
            ip: req.ip
        });
        next(errorManager.createError(ErrorStatus.unauthenticated, "Invalid token", "malformed_token"));
        return;
    }

    req.token = token;
    next();
};

// Verifies the token and loads the user it names; the role comes from the stored account.
export const createResolveUser = (authService: AuthService) => {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        if (!req.token) {
            next(errorManager.createError(ErrorStatus.unauthenticated, "Invalid token", "missing_token"));
            return;
        }
        try {
            req.currentUser = await authService.resolveToken(req.token);
            next();
        } catch (error) {
            if (isManagedError(error)) {
                errorLogger.logAuthenticationError(undefined, error.reason);
            }
            next(error);
        }
    };
};

// Composed authentication chain
export const createAuthenticateToken = (authService: AuthService): RequestHandler[] => {
    const resolveUser = createResolveUser(authService);
    return [
        checkAuthHeader,
        extractToken,
        (req, res, next) => {
            void resolveUser(req, res, next);
        }
    ];
};
