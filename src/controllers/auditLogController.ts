import { Request, Response, NextFunction } from "express";
import { AuditLogService } from "../services/auditLogService";
import { actorFromRequest } from "../services/auditRecorder";
import { loggerFactory, ApiRouteLogger } from "../factory/loggerFactory";
import { HttpStatus } from "../factory/status";
import { requireCurrentUser } from "../types/request";
import { sendSuccess } from "./respond";

export class AuditLogController {
    private readonly apiLogger: ApiRouteLogger = loggerFactory.createApiLogger();

    constructor(private readonly auditLogService: AuditLogService) {}

    list = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            const entries = await this.auditLogService.listRecent(actor);
            sendSuccess(res, HttpStatus.OK, "Audit log retrieved successfully", entries);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };
}
