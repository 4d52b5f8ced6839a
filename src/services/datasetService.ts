import { DatasetRepository, TransactionRunner } from "../repository/types";
import { FileStorage, datasetDirectoryName } from "../utils/fileStorage";
import { Actor, AuditRecorder, contextOf } from "./auditRecorder";
import { cleanUpStorage } from "./storageCleanup";
import { canDelete, canViewDataset } from "../policy/accessPolicy";
import { AuditResult, DatasetRecord, PublicUser, ResourceType, Visibility } from "../types/domain";
import { ErrorManager, isManagedError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, DatasetRouteLogger } from "../factory/loggerFactory";

export interface DatasetInput {
    name: string;
    description: string | null;
    version: string | null;
    visibility: Visibility;
}

// Dataset lifecycle behind the visibility and ownership gates.
export class DatasetService {
    private readonly errorManager = ErrorManager.getInstance();
    private readonly datasetLogger: DatasetRouteLogger = loggerFactory.createDatasetLogger();

    constructor(
        private readonly datasets: DatasetRepository,
        private readonly transactions: TransactionRunner,
        private readonly storage: FileStorage,
        private readonly audit: AuditRecorder
    ) {}

    public async create(actor: Actor, input: DatasetInput): Promise<DatasetRecord> {
        const context = contextOf(actor);
        const nameTaken = () => this.audit.recordFailure(
            context,
            { action: "create_dataset", result: AuditResult.Deny, resourceType: ResourceType.Dataset, detail: "name_taken" },
            this.errorManager.createError(ErrorStatus.datasetNameTaken)
        );

        if (await this.datasets.findByName(input.name)) {
            throw await nameTaken();
        }

        let dataset: DatasetRecord;
        try {
            dataset = await this.datasets.create({ ...input, createdBy: actor.user.id });
        } catch (error) {
            if (isManagedError(error) && error.errorType === ErrorStatus.conflict) {
                throw await nameTaken();
            }
            throw error;
        }

        await this.audit.record(context, {
            action: "create_dataset",
            result: AuditResult.Ok,
            resourceType: ResourceType.Dataset,
            resourceId: dataset.id
        });
        this.datasetLogger.logDatasetCreation(actor.user.id, dataset.id, dataset.name, dataset.visibility);
        return dataset;
    }

    // Datasets the user may see; filtered entries are not audited.
    public async listVisible(user: PublicUser): Promise<DatasetRecord[]> {
        const datasets = await this.datasets.listAll();
        return datasets.filter((dataset) => canViewDataset(user, dataset));
    }

    public async get(actor: Actor, datasetId: number): Promise<DatasetRecord> {
        const dataset = await this.requireVisible(actor, datasetId, "view_dataset");
        await this.audit.record(contextOf(actor), {
            action: "view_dataset",
            result: AuditResult.Ok,
            resourceType: ResourceType.Dataset,
            resourceId: dataset.id
        });
        return dataset;
    }

    /**
     * Looks up a dataset the actor may see, auditing a denial under `action`.
     * Success is left to the caller to audit.
     */
    public async requireVisible(actor: Actor, datasetId: number, action: "view_dataset" | "upload_sample"): Promise<DatasetRecord> {
        const context = contextOf(actor);
        const dataset = await this.datasets.findById(datasetId);
        if (!dataset) {
            throw await this.audit.recordFailure(
                context,
                { action, result: AuditResult.Deny, resourceType: ResourceType.Dataset, resourceId: datasetId, detail: "not_found" },
                this.errorManager.createError(ErrorStatus.notFound, "Dataset not found", "not_found")
            );
        }
        if (!canViewDataset(actor.user, dataset)) {
            throw await this.audit.recordFailure(
                context,
                { action, result: AuditResult.Deny, resourceType: ResourceType.Dataset, resourceId: datasetId, detail: "not_visible" },
                this.errorManager.createError(ErrorStatus.forbidden, "Dataset is private", "not_visible")
            );
        }
        return dataset;
    }

    // Deletes the dataset with its samples and annotations, then its storage directory.
    public async delete(actor: Actor, datasetId: number): Promise<void> {
        const context = contextOf(actor);
        const target = { resourceType: ResourceType.Dataset, resourceId: datasetId };
        const dataset = await this.datasets.findById(datasetId);
        if (!dataset) {
            throw await this.audit.recordFailure(
                context,
                { action: "delete_dataset", result: AuditResult.Deny, ...target, detail: "not_found" },
                this.errorManager.createError(ErrorStatus.notFound, "Dataset not found", "not_found")
            );
        }
        if (!canDelete(actor.user, dataset)) {
            throw await this.audit.recordFailure(
                context,
                { action: "delete_dataset", result: AuditResult.Deny, ...target, detail: "not_owner" },
                this.errorManager.createError(ErrorStatus.forbidden, "Only the creator or a data administrator may delete this dataset", "not_owner")
            );
        }

        const removed = await this.transactions.run((transaction) => this.datasets.delete(datasetId, { transaction }));
        if (!removed) {
            throw await this.audit.recordFailure(
                context,
                { action: "delete_dataset", result: AuditResult.Deny, ...target, detail: "not_found" },
                this.errorManager.createError(ErrorStatus.notFound, "Dataset not found", "not_found")
            );
        }

        await this.audit.record(context, { action: "delete_dataset", result: AuditResult.Ok, ...target });
        this.datasetLogger.logDatasetDeletion(actor.user.id, datasetId);

        await cleanUpStorage(
            this.audit,
            context,
            { action: "delete_dataset", ...target, location: datasetDirectoryName(datasetId) },
            () => this.storage.removeDataset(datasetId)
        );
    }
}
