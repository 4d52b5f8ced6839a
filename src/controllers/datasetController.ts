import { Request, Response, NextFunction } from "express";
import { DatasetService } from "../services/datasetService";
import { DownloadAuthorizer } from "../services/downloadAuthorizer";
import { FileStorage } from "../utils/fileStorage";
import { actorFromRequest } from "../services/auditRecorder";
import { loggerFactory, ApiRouteLogger } from "../factory/loggerFactory";
import { HttpStatus } from "../factory/status";
import { bodyOf, readString } from "../utils/requestBody";
import { idParam } from "../middleware/validationMiddleware";
import { requireCurrentUser } from "../types/request";
import { ResourceType, Visibility, isEnumValue } from "../types/domain";
import { sendSuccess } from "./respond";

// Controller class for dataset operations
export class DatasetController {
    private readonly apiLogger: ApiRouteLogger = loggerFactory.createApiLogger();

    constructor(
        private readonly datasetService: DatasetService,
        private readonly downloadAuthorizer: DownloadAuthorizer,
        private readonly storage: FileStorage
    ) {}

    create = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            const body = bodyOf(req);
            const dataset = await this.datasetService.create(actor, {
                name: readString(body, "name") ?? "",
                description: readString(body, "description") ?? null,
                version: readString(body, "version") ?? null,
                visibility: isEnumValue(Visibility, body.visibility) ? body.visibility : Visibility.Group
            });
            sendSuccess(res, HttpStatus.CREATED, "Dataset created successfully", dataset);
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
            const datasets = await this.datasetService.listVisible(requireCurrentUser(req));
            sendSuccess(res, HttpStatus.OK, "Datasets retrieved successfully", datasets);
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
            const dataset = await this.datasetService.get(actor, idParam(req, "id"));
            sendSuccess(res, HttpStatus.OK, "Dataset retrieved successfully", dataset);
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
            await this.datasetService.delete(actor, idParam(req, "id"));
            res.status(HttpStatus.NO_CONTENT).end();
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };

    // Streams the dataset directory as a zip archive once the approval gate passes.
    download = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);
        try {
            const actor = actorFromRequest(req, requireCurrentUser(req));
            const grant = await this.downloadAuthorizer.authorizeOrThrow(actor, ResourceType.Dataset, idParam(req, "id"));
            if (grant.kind !== ResourceType.Dataset) {
                throw new Error("Dataset download produced a sample grant");
            }
            const archive = await this.storage.archiveDataset(grant.datasetId);
            res.status(HttpStatus.OK);
            res.type("application/zip");
            res.attachment(grant.archiveName);
            res.send(archive);
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error instanceof Error ? error : new Error("Unknown error"));
            next(error);
        }
    };
}
