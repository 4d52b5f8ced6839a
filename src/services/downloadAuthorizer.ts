import path from "path";
import { ApprovalRepository, DatasetRepository, SampleRepository } from "../repository/types";
import { FileStorage } from "../utils/fileStorage";
import { Actor, AuditRecorder, contextOf } from "./auditRecorder";
import { AuditAction, AuditResult, Decision, ResourceType } from "../types/domain";
import { Clock, isStrictlyAfter } from "../utils/time";
import { ErrorManager, ManagedError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, DatasetRouteLogger } from "../factory/loggerFactory";

export type DenialReason = "not_found" | "no_approval" | "not_approved" | "approval_expired" | "storage_missing";

export type DownloadGrant =
    | { kind: ResourceType.Sample; sampleId: number; absolutePath: string; fileName: string; mime: string | null }
    | { kind: ResourceType.Dataset; datasetId: number; archiveName: string };

export type DownloadDecision =
    | { granted: true; grant: DownloadGrant }
    | { granted: false; reason: DenialReason };

const DOWNLOAD_ACTIONS: Record<ResourceType, AuditAction> = {
    [ResourceType.Dataset]: "download_dataset",
    [ResourceType.Sample]: "download_sample"
};

/**
 * Decides whether a user may download a dataset archive or a sample file.
 *
 * Checks run in a fixed order and stop at the first failure: the resource exists, the
 * latest approval for (user, resource) exists, it is approved, it has not expired, and
 * for a sample, the stored file is present. Each call appends exactly one audit entry.
 * Visibility is not consulted; an approved grant covers private resources too.
 */
export class DownloadAuthorizer {
    private readonly errorManager = ErrorManager.getInstance();
    private readonly datasetLogger: DatasetRouteLogger = loggerFactory.createDatasetLogger();

    constructor(
        private readonly datasets: DatasetRepository,
        private readonly samples: SampleRepository,
        private readonly approvals: ApprovalRepository,
        private readonly storage: FileStorage,
        private readonly audit: AuditRecorder,
        private readonly clock: Clock
    ) {}

    public async authorize(actor: Actor, resourceType: ResourceType, resourceId: number): Promise<DownloadDecision> {
        const decision = await this.evaluate(actor, resourceType, resourceId);
        await this.audit.record(contextOf(actor), {
            action: DOWNLOAD_ACTIONS[resourceType],
            result: decision.granted
                ? AuditResult.Ok
                : decision.reason === "storage_missing" ? AuditResult.Error : AuditResult.Deny,
            resourceType,
            resourceId,
            detail: decision.granted ? null : decision.reason
        });
        if (decision.granted) {
            this.datasetLogger.logDownload(actor.user.id, resourceType, resourceId);
        }
        return decision;
    }

    // As `authorize`, but a denial is thrown as a managed error carrying the reason.
    public async authorizeOrThrow(actor: Actor, resourceType: ResourceType, resourceId: number): Promise<DownloadGrant> {
        const decision = await this.authorize(actor, resourceType, resourceId);
        if (!decision.granted) {
            throw this.toError(resourceType, decision.reason);
        }
        return decision.grant;
    }

    private async evaluate(actor: Actor, resourceType: ResourceType, resourceId: number): Promise<DownloadDecision> {
        const sample = resourceType === ResourceType.Sample ? await this.samples.findById(resourceId) : null;
        const dataset = resourceType === ResourceType.Dataset ? await this.datasets.findById(resourceId) : null;
        if (!sample && !dataset) {
            return { granted: false, reason: "not_found" };
        }

        const approval = await this.approvals.latestFor(actor.user.id, resourceType, resourceId);
        if (!approval) {
            return { granted: false, reason: "no_approval" };
        }
        if (approval.decision !== Decision.Approved) {
            return { granted: false, reason: "not_approved" };
        }
        if (approval.expiresAt !== null && !isStrictlyAfter(approval.expiresAt, this.clock.now())) {
            return { granted: false, reason: "approval_expired" };
        }

        if (sample) {
            if (!(await this.storage.exists(sample.filePath))) {
                return { granted: false, reason: "storage_missing" };
            }
            return {
                granted: true,
                grant: {
                    kind: ResourceType.Sample,
                    sampleId: sample.id,
                    absolutePath: this.storage.resolve(sample.filePath),
                    fileName: path.posix.basename(sample.filePath),
                    mime: sample.mime
                }
            };
        }

        if (dataset) {
            // A dataset with nothing uploaded yet has no directory and archives as an empty zip.
            return {
                granted: true,
                grant: { kind: ResourceType.Dataset, datasetId: dataset.id, archiveName: `dataset_${dataset.id}.zip` }
            };
        }
        return { granted: false, reason: "not_found" };
    }

    private toError(resourceType: ResourceType, reason: DenialReason): ManagedError {
        switch (reason) {
            case "not_found":
                return this.errorManager.createError(
                    ErrorStatus.notFound,
                    resourceType === ResourceType.Dataset ? "Dataset not found" : "Sample not found",
                    reason
                );
            case "storage_missing":
                return this.errorManager.createError(ErrorStatus.storageFault, "Stored file is missing", reason);
            case "no_approval":
                return this.errorManager.createError(ErrorStatus.downloadDenied, "No approval on record for this resource", reason);
            case "not_approved":
                return this.errorManager.createError(ErrorStatus.downloadDenied, "Approval has not been granted", reason);
            case "approval_expired":
                return this.errorManager.createError(ErrorStatus.downloadDenied, "Approval has expired", reason);
        }
    }
}
