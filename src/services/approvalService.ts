import { ApprovalRepository, TransactionRunner } from "../repository/types";
import { Actor, AuditRecorder, contextOf } from "./auditRecorder";
import { ApprovalRecord, AuditResult, AuditTarget, Decision, PublicUser, ResourceType } from "../types/domain";
import { Clock, addMinutes } from "../utils/time";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, ApprovalRouteLogger } from "../factory/loggerFactory";
import { ApprovalRequestInput, ApprovalReviewInput } from "../types/request";

export type ApprovalRequest = ApprovalRequestInput;
export type ReviewInput = ApprovalReviewInput;

type Verdict = Decision.Approved | Decision.Rejected;

function toVerdict(value: string): Verdict | null {
    if (value === Decision.Approved) return Decision.Approved;
    if (value === Decision.Rejected) return Decision.Rejected;
    return null;
}

/**
 * Approval state machine.
 *
 * pending -> approved | rejected, exactly once. Approving with a TTL sets `expiresAt` to
 * review time plus TTL; approving without one produces a grant that never expires.
 */
export class ApprovalService {
    private readonly errorManager = ErrorManager.getInstance();
    private readonly approvalLogger: ApprovalRouteLogger = loggerFactory.createApprovalLogger();

    constructor(
        private readonly approvals: ApprovalRepository,
        private readonly transactions: TransactionRunner,
        private readonly audit: AuditRecorder,
        private readonly clock: Clock
    ) {}

    // Always creates a new pending record; the target is not checked for existence.
    public async request(actor: Actor, request: ApprovalRequest): Promise<ApprovalRecord> {
        const approval = await this.approvals.create({
            applicantId: actor.user.id,
            resourceType: request.resourceType,
            resourceId: request.resourceId,
            purpose: request.purpose
        });
        await this.audit.record(contextOf(actor), {
            action: "request_approval",
            result: AuditResult.Ok,
            resourceType: request.resourceType,
            resourceId: request.resourceId,
            detail: `approval:${approval.id}`
        });
        this.approvalLogger.logRequested(approval.id, actor.user.id, request.resourceType, request.resourceId);
        return approval;
    }

    public async review(actor: Actor, approvalId: number, input: ReviewInput): Promise<ApprovalRecord> {
        const context = contextOf(actor);
        const target = { resourceType: AuditTarget.Approval, resourceId: approvalId };
        const alreadyReviewed = () => this.audit.recordFailure(
            context,
            { action: "review_approval", result: AuditResult.Deny, ...target, detail: "already_reviewed" },
            this.errorManager.createError(ErrorStatus.invalidState, "Already reviewed", "already_reviewed")
        );

        const existing = await this.approvals.findById(approvalId);
        if (!existing) {
            throw await this.audit.recordFailure(
                context,
                { action: "review_approval", result: AuditResult.Deny, ...target, detail: "not_found" },
                this.errorManager.createError(ErrorStatus.notFound, "Approval not found", "not_found")
            );
        }
        if (existing.decision !== Decision.Pending) {
            throw await alreadyReviewed();
        }
        const verdict = toVerdict(input.decision);
        if (!verdict) {
            throw await this.audit.recordFailure(
                context,
                { action: "review_approval", result: AuditResult.Deny, ...target, detail: "invalid_decision" },
                this.errorManager.createError(ErrorStatus.invalidState, "Decision must be approved or rejected", "invalid_decision")
            );
        }

        const reviewedAt = this.clock.now();
        const expiresAt = verdict === Decision.Approved && input.ttlMinutes !== undefined
            ? addMinutes(reviewedAt, input.ttlMinutes)
            : null;

        // The transition and its audit entry commit together.
        const reviewed = await this.transactions.run(async (transaction) => {
            const updated = await this.approvals.decideIfPending(approvalId, {
                decision: verdict,
                expiresAt,
                reviewedBy: actor.user.id,
                reviewedAt
            }, { transaction });
            if (updated) {
                await this.audit.recordWithin(transaction, context, {
                    action: "review_approval",
                    result: AuditResult.Ok,
                    ...target,
                    detail: verdict
                });
            }
            return updated;
        });
        if (!reviewed) {
            throw await alreadyReviewed();
        }

        this.approvalLogger.logReviewed(approvalId, actor.user.id, verdict, expiresAt?.toISOString());
        if (verdict === Decision.Approved && !expiresAt) {
            this.approvalLogger.logPermanentGrant(approvalId, actor.user.id);
        }
        return reviewed;
    }

    public async latestFor(user: PublicUser, resourceType: ResourceType, resourceId: number): Promise<ApprovalRecord | null> {
        return await this.approvals.latestFor(user.id, resourceType, resourceId);
    }

    public async list(actor: Actor, decision?: Decision): Promise<ApprovalRecord[]> {
        const approvals = await this.approvals.list({ decision });
        await this.audit.record(contextOf(actor), {
            action: "list_approvals",
            result: AuditResult.Ok,
            detail: decision ? `decision:${decision}` : null
        });
        return approvals;
    }
}
