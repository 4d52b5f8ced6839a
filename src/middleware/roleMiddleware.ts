import { Request, Response, NextFunction, RequestHandler } from "express";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import { AuditRecorder } from "../services/auditRecorder";
import { isPrivileged } from "../policy/accessPolicy";
import { AuditAction, AuditResult } from "../types/domain";
import { resolveClientIp } from "../utils/clientIp";
import "../types/request";

const errorManager = ErrorManager.getInstance();
const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

// Admits admin and data_admin; a refusal is audited under the guarded action.
export const createRequirePrivileged = (audit: AuditRecorder) => {
    return (action: AuditAction): RequestHandler => {
        const gate = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
            const user = req.currentUser;
            if (!user) {
                next(errorManager.createError(ErrorStatus.unauthenticated));
                return;
            }
            if (isPrivileged(user.role)) {
                next();
                return;
            }

            errorLogger.logAuthorizationError(user.id, action, "insufficient_role");
            await audit.record(
                { actorId: user.id, ip: resolveClientIp(req) },
                { action, result: AuditResult.Deny, detail: "insufficient_role" }
            );
            next(errorManager.createError(ErrorStatus.insufficientRole, "Insufficient role", "insufficient_role"));
        };
        return (req, res, next) => {
            void gate(req, res, next).catch(next);
        };
    };
};
