import { AuditRepository } from "../repository/types";
import { Actor, AuditRecorder, contextOf } from "./auditRecorder";
import { AuditLogRecord, AuditResult } from "../types/domain";

export const AUDIT_PAGE_SIZE = 200;

// Read side of the audit trail.
export class AuditLogService {
    constructor(
        private readonly entries: AuditRepository,
        private readonly audit: AuditRecorder
    ) {}

    // Newest entries first.
    public async listRecent(actor: Actor): Promise<AuditLogRecord[]> {
        const entries = await this.entries.listRecent(AUDIT_PAGE_SIZE);
        await this.audit.record(contextOf(actor), { action: "list_audit_logs", result: AuditResult.Ok });
        return entries;
    }
}
