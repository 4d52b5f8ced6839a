import { Request, Response, NextFunction } from "express";
import { ApprovalService } from "../services/approvalService";
import { actorFromRequest } from "../services/auditRecorder";
import { loggerFactory, ApiRouteLogger } from "../factory/loggerFactory";
import { HttpStatus } from "../factory/status";
import { idParam } from "../middleware/validationMiddleware";
import {
    requireApprovalRequest,
    requireApprovalReview,
    requireCurrentUser,
    requireResourceRef
} from "../types/request";
import { Decision, isEnumValue } from "../types/domain";
import { sendSuccess } from "./respond";

// Controller class for access requests and their review
export class ApprovalController {
    private readonly apiLogger: ApiRouteLogger = loggerFactory.createApiLogger();

    constructor(private readonly approvalService: ApprovalService) {}

    request = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            const approval = await this.approvalService.request(actor, requireApprovalRequest(req));
            sendSuccess(res, HttpStatus.CREATED, "Approval requested", approval);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };

    review = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            const approval = await this.approvalService.review(actor, idParam(req, "id"), requireApprovalReview(req));
            sendSuccess(res, HttpStatus.OK, "Approval reviewed", approval);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };

    list = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            const filter = isEnumValue(Decision, req.query.decision) ? req.query.decision : undefined;
            const approvals = await this.approvalService.list(actor, filter);
            sendSuccess(res, HttpStatus.OK, "Approvals retrieved successfully", approvals);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };

    // Latest approval the caller holds for a resource, or null.
    mine = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const { resourceType, resourceId } = requireResourceRef(req);
            const approval = await this.approvalService.latestFor(requireCurrentUser(req), resourceType, resourceId);
            sendSuccess(res, HttpStatus.OK, approval ? "Latest approval" : "No approval on record", approval);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };
}
