import { DatasetRepository, SampleRepository, TransactionRunner } from "../repository/types";
import { FileStorage, StoredObject, sha256Hex } from "../utils/fileStorage";
import { Actor, AuditRecorder, contextOf } from "./auditRecorder";
import { DatasetService } from "./datasetService";
import { cleanUpStorage } from "./storageCleanup";
import { canDelete, canViewSample } from "../policy/accessPolicy";
import { AuditResult, DatasetRecord, PublicUser, ResourceType, SampleRecord } from "../types/domain";
import { ErrorManager, isManagedError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, DatasetRouteLogger, ErrorRouteLogger } from "../factory/loggerFactory";

export interface UploadedFile {
    originalName: string;
    bytes: Buffer;
    mime: string | null;
}

export interface UploadResult {
    id: number;
    sha256: string;
    path: string;
}

export interface VisibleSample {
    sample: SampleRecord;
    dataset: DatasetRecord;
}

// Sample upload, lookup and deletion.
export class SampleService {
    private readonly errorManager = ErrorManager.getInstance();
    private readonly datasetLogger: DatasetRouteLogger = loggerFactory.createDatasetLogger();
    private readonly errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

    constructor(
        private readonly samples: SampleRepository,
        private readonly datasets: DatasetRepository,
        private readonly datasetService: DatasetService,
        private readonly transactions: TransactionRunner,
        private readonly storage: FileStorage,
        private readonly audit: AuditRecorder
    ) {}

    // Stores the file under the dataset directory and records it; identical content is refused.
    public async upload(actor: Actor, datasetId: number, file: UploadedFile): Promise<UploadResult> {
        const context = contextOf(actor);
        await this.datasetService.requireVisible(actor, datasetId, "upload_sample");

        const sha256 = sha256Hex(file.bytes);
        const duplicate = () => this.audit.recordFailure(
            context,
            { action: "upload_sample", result: AuditResult.Deny, resourceType: ResourceType.Dataset, resourceId: datasetId, detail: "checksum_duplicate" },
            this.errorManager.createError(ErrorStatus.checksumDuplicate)
        );

        if (await this.samples.findBySha256(sha256)) {
            throw await duplicate();
        }

        let stored: StoredObject;
        try {
            stored = await this.storage.store(datasetId, file.originalName, file.bytes, sha256);
        } catch (error) {
            const message = error instanceof Error ? error.message : "Unknown error";
            this.errorLogger.logFileUploadError(file.originalName, file.bytes.length, message);
            throw await this.audit.recordFailure(
                context,
                { action: "upload_sample", result: AuditResult.Error, resourceType: ResourceType.Dataset, resourceId: datasetId, detail: "storage_write_failed" },
                this.errorManager.createError(ErrorStatus.storageFault, "Failed to store uploaded file", "storage_write_failed")
            );
        }

        let sample: SampleRecord;
        try {
            sample = await this.samples.create({
                datasetId,
                filePath: stored.relativePath,
                sha256,
                mime: file.mime,
                createdBy: actor.user.id
            });
        } catch (error) {
            await this.discard(stored.relativePath);
            if (isManagedError(error) && error.errorType === ErrorStatus.conflict) {
                throw await duplicate();
            }
            throw error;
        }

        await this.audit.record(context, {
            action: "upload_sample",
            result: AuditResult.Ok,
            resourceType: ResourceType.Sample,
            resourceId: sample.id
        });
        this.datasetLogger.logSampleUpload(actor.user.id, datasetId, sample.id, sample.filePath, file.bytes.length);
        return { id: sample.id, sha256: sample.sha256, path: sample.filePath };
    }

    // Samples visible to the user across all datasets, newest first.
    public async listVisible(user: PublicUser): Promise<SampleRecord[]> {
        const [samples, datasets] = await Promise.all([this.samples.listAll(), this.datasets.listAll()]);
        const byId = new Map(datasets.map((dataset) => [dataset.id, dataset]));
        return samples.filter((sample) => {
            const parent = byId.get(sample.datasetId);
            return parent !== undefined && canViewSample(user, sample, parent);
        });
    }

    public async listByDataset(actor: Actor, datasetId: number): Promise<SampleRecord[]> {
        await this.datasetService.requireVisible(actor, datasetId, "view_dataset");
        return await this.samples.listByDataset(datasetId);
    }

    public async get(actor: Actor, sampleId: number): Promise<SampleRecord> {
        const { sample } = await this.requireVisible(actor, sampleId, "view_sample");
        await this.audit.record(contextOf(actor), {
            action: "view_sample",
            result: AuditResult.Ok,
            resourceType: ResourceType.Sample,
            resourceId: sample.id
        });
        return sample;
    }

    // Looks up a sample the actor may see, auditing a denial under `action`.
    public async requireVisible(actor: Actor, sampleId: number, action: "view_sample" | "create_annotation"): Promise<VisibleSample> {
        const context = contextOf(actor);
        const target = { resourceType: ResourceType.Sample, resourceId: sampleId };
        const sample = await this.samples.findById(sampleId);
        const dataset = sample ? await this.datasets.findById(sample.datasetId) : null;
        if (!sample || !dataset) {
            throw await this.audit.recordFailure(
                context,
                { action, result: AuditResult.Deny, ...target, detail: "not_found" },
                this.errorManager.createError(ErrorStatus.notFound, "Sample not found", "not_found")
            );
        }
        if (!canViewSample(actor.user, sample, dataset)) {
            throw await this.audit.recordFailure(
                context,
                { action, result: AuditResult.Deny, ...target, detail: "not_visible" },
                this.errorManager.createError(ErrorStatus.forbidden, "Sample belongs to a private dataset", "not_visible")
            );
        }
        return { sample, dataset };
    }

    // Deletes the sample with its annotations, then its file.
    public async delete(actor: Actor, sampleId: number): Promise<void> {
        const context = contextOf(actor);
        const target = { resourceType: ResourceType.Sample, resourceId: sampleId };
        const sample = await this.samples.findById(sampleId);
        if (!sample) {
            throw await this.audit.recordFailure(
                context,
                { action: "delete_sample", result: AuditResult.Deny, ...target, detail: "not_found" },
                this.errorManager.createError(ErrorStatus.notFound, "Sample not found", "not_found")
            );
        }
        if (!canDelete(actor.user, sample)) {
            throw await this.audit.recordFailure(
                context,
                { action: "delete_sample", result: AuditResult.Deny, ...target, detail: "not_owner" },
                this.errorManager.createError(ErrorStatus.forbidden, "Only the uploader or a data administrator may delete this sample", "not_owner")
            );
        }

        const removed = await this.transactions.run((transaction) => this.samples.delete(sampleId, { transaction }));
        if (!removed) {
            throw await this.audit.recordFailure(
                context,
                { action: "delete_sample", result: AuditResult.Deny, ...target, detail: "not_found" },
                this.errorManager.createError(ErrorStatus.notFound, "Sample not found", "not_found")
            );
        }

        await this.audit.record(context, { action: "delete_sample", result: AuditResult.Ok, ...target });
        this.datasetLogger.logSampleDeletion(actor.user.id, sampleId);

        await cleanUpStorage(
            this.audit,
            context,
            { action: "delete_sample", ...target, location: sample.filePath },
            () => this.storage.removeFile(sample.filePath)
        );
    }

    private async discard(relativePath: string): Promise<void> {
        try {
            await this.storage.removeFile(relativePath);
        } catch (error) {
            const message = error instanceof Error ? error.message : "Unknown error";
            this.errorLogger.logStorageError("discard_upload", relativePath, message);
        }
    }
}
