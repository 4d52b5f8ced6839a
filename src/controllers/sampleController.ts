import { Request, Response, NextFunction } from "express";
import { SampleService } from "../services/sampleService";
import { DownloadAuthorizer } from "../services/downloadAuthorizer";
import { actorFromRequest } from "../services/auditRecorder";
import { loggerFactory, ApiRouteLogger } from "../factory/loggerFactory";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus, HttpStatus } from "../factory/status";
import { idParam } from "../middleware/validationMiddleware";
import { requireCurrentUser } from "../types/request";
import { ResourceType } from "../types/domain";
import { sendSuccess } from "./respond";

// Controller class for sample operations
export class SampleController {
    private readonly apiLogger: ApiRouteLogger = loggerFactory.createApiLogger();
    private readonly errorManager = ErrorManager.getInstance();

    constructor(
        private readonly sampleService: SampleService,
        private readonly downloadAuthorizer: DownloadAuthorizer
    ) {}

    upload = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            if (!req.file) {
                throw this.errorManager.createError(ErrorStatus.invalidFormat, "file required");
            }
            const result = await this.sampleService.upload(actor, idParam(req, "datasetId"), {
                originalName: req.file.originalname,
                bytes: req.file.buffer,
                mime: req.file.mimetype || null
            });
            sendSuccess(res, HttpStatus.CREATED, "Sample uploaded successfully", result);
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
            const samples = await this.sampleService.listVisible(requireCurrentUser(req));
            sendSuccess(res, HttpStatus.OK, "Samples retrieved successfully", samples);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };

    listByDataset = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            const samples = await this.sampleService.listByDataset(actor, idParam(req, "datasetId"));
            sendSuccess(res, HttpStatus.OK, "Samples retrieved successfully", samples);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };

    get = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            const sample = await this.sampleService.get(actor, idParam(req, "id"));
            sendSuccess(res, HttpStatus.OK, "Sample retrieved successfully", sample);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };

    delete = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            await this.sampleService.delete(actor, idParam(req, "id"));
            res.status(HttpStatus.NO_CONTENT).end();
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };

    download = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            const grant = await this.downloadAuthorizer.authorizeOrThrow(actor, ResourceType.Sample, idParam(req, "id"));
            if (grant.kind !== ResourceType.Sample) {
                throw new Error("Sample download produced a dataset grant");
            }
            if (grant.mime) {
                res.type(grant.mime);
            }
            res.download(grant.absolutePath, grant.fileName, (err) => {
                if (err) {
                    this.apiLogger.logError(req, err);
                    if (!res.headersSent) {
                        next(err);
                    }
                    return;
                }
                this.apiLogger.logResponse(req, res, Date.now() - startTime);
            });
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };
}
