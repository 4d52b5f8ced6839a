import { Request, Response, NextFunction } from "express";
import { AnnotationService, AnnotationVerdict } from "../services/annotationService";
import { actorFromRequest } from "../services/auditRecorder";
import { loggerFactory, ApiRouteLogger } from "../factory/loggerFactory";
import { HttpStatus } from "../factory/status";
import { bodyOf, readString } from "../utils/requestBody";
import { idParam } from "../middleware/validationMiddleware";
import { requireCurrentUser } from "../types/request";
import { AnnotationStatus, AnnotationType, isEnumValue } from "../types/domain";
import { sendSuccess } from "./respond";

export class AnnotationController {
    private readonly apiLogger: ApiRouteLogger = loggerFactory.createApiLogger();

    constructor(private readonly annotationService: AnnotationService) {}

    create = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            const body = bodyOf(req);
            const annotation = await this.annotationService.create(actor, idParam(req, "sampleId"), {
                annoType: isEnumValue(AnnotationType, body.annoType) ? body.annoType : AnnotationType.Tag,
                payload: readString(body, "payload") ?? ""
            });
            sendSuccess(res, HttpStatus.CREATED, "Annotation created successfully", annotation);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };

    listBySample = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            const annotations = await this.annotationService.listBySample(actor, idParam(req, "sampleId"));
            sendSuccess(res, HttpStatus.OK, "Annotations retrieved successfully", annotations);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };

    approve = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        await this.review(req, res, next, AnnotationStatus.Approved);
    };

    reject = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        await this.review(req, res, next, AnnotationStatus.Rejected);
    };

    private async review(req: Request, res: Response, next: NextFunction, verdict: AnnotationVerdict): Promise<void> {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            const annotation = await this.annotationService.review(actor, idParam(req, "id"), verdict);
            sendSuccess(res, HttpStatus.OK, `Annotation ${verdict}`, annotation);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    }
}
