import { AnnotationRepository, TransactionRunner } from "../repository/types";
import { Actor, AuditRecorder, contextOf } from "./auditRecorder";
import { SampleService } from "./sampleService";
import { AnnotationRecord, AnnotationStatus, AnnotationType, AuditResult, AuditTarget, ResourceType } from "../types/domain";
import { Clock } from "../utils/time";
import { ErrorManager, isManagedError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, AnnotationRouteLogger } from "../factory/loggerFactory";

export interface AnnotationInput {
    annoType: AnnotationType;
    payload: string;
}

export type AnnotationVerdict = AnnotationStatus.Approved | AnnotationStatus.Rejected;

// Versioned annotations on visible samples, with a one-shot review.
export class AnnotationService {
    private readonly errorManager = ErrorManager.getInstance();
    private readonly annotationLogger: AnnotationRouteLogger = loggerFactory.createAnnotationLogger();

    constructor(
        private readonly annotations: AnnotationRepository,
        private readonly sampleService: SampleService,
        private readonly transactions: TransactionRunner,
        private readonly audit: AuditRecorder,
        private readonly clock: Clock
    ) {}

    // Version is one past the highest existing version for the sample.
    public async create(actor: Actor, sampleId: number, input: AnnotationInput): Promise<AnnotationRecord> {
        const context = contextOf(actor);
        await this.sampleService.requireVisible(actor, sampleId, "create_annotation");

        let annotation: AnnotationRecord;
        try {
            annotation = await this.transactions.run(async (transaction) => {
                const version = (await this.annotations.maxVersion(sampleId, { transaction })) + 1;
                return await this.annotations.create({
                    sampleId,
                    authorId: actor.user.id,
                    annoType: input.annoType,
                    payload: input.payload,
                    version
                }, { transaction });
            });
        } catch (error) {
            if (isManagedError(error) && error.errorType === ErrorStatus.conflict) {
                throw await this.audit.recordFailure(
                    context,
                    { action: "create_annotation", result: AuditResult.Deny, resourceType: ResourceType.Sample, resourceId: sampleId, detail: "version_conflict" },
                    this.errorManager.createError(ErrorStatus.conflict, "Another annotation was created concurrently; retry", "version_conflict")
                );
            }
            throw error;
        }

        await this.audit.record(context, {
            action: "create_annotation",
            result: AuditResult.Ok,
            resourceType: AuditTarget.Annotation,
            resourceId: annotation.id
        });
        this.annotationLogger.logCreated(annotation.id, sampleId, actor.user.id, annotation.version);
        return annotation;
    }

    // Ascending version.
    public async listBySample(actor: Actor, sampleId: number): Promise<AnnotationRecord[]> {
        await this.sampleService.requireVisible(actor, sampleId, "view_sample");
        return await this.annotations.listBySample(sampleId);
    }

    // Moves a submitted annotation to approved or rejected; any other starting state is refused.
    public async review(actor: Actor, annotationId: number, verdict: AnnotationVerdict): Promise<AnnotationRecord> {
        const context = contextOf(actor);
        const target = { resourceType: AuditTarget.Annotation, resourceId: annotationId };
        const notSubmitted = () => this.audit.recordFailure(
            context,
            { action: "review_annotation", result: AuditResult.Deny, ...target, detail: "not_submitted" },
            this.errorManager.createError(ErrorStatus.invalidState, "Annotation has already been reviewed", "not_submitted")
        );

        const existing = await this.annotations.findById(annotationId);
        if (!existing) {
            throw await this.audit.recordFailure(
                context,
                { action: "review_annotation", result: AuditResult.Deny, ...target, detail: "not_found" },
                this.errorManager.createError(ErrorStatus.notFound, "Annotation not found", "not_found")
            );
        }
        if (existing.status !== AnnotationStatus.Submitted) {
            throw await notSubmitted();
        }

        const reviewed = await this.transactions.run(async (transaction) => {
            const updated = await this.annotations.reviewIfSubmitted(annotationId, {
                status: verdict,
                reviewedBy: actor.user.id,
                reviewedAt: this.clock.now()
            }, { transaction });
            if (updated) {
                await this.audit.recordWithin(transaction, context, {
                    action: "review_annotation",
                    result: AuditResult.Ok,
                    ...target,
                    detail: verdict
                });
            }
            return updated;
        });
        if (!reviewed) {
            throw await notSubmitted();
        }

        this.annotationLogger.logReviewed(annotationId, actor.user.id, verdict);
        return reviewed;
    }
}
