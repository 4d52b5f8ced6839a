import { AuditAction, AuditResult, ResourceType } from "../types/domain";
import { AuditContext, AuditRecorder } from "./auditRecorder";
import { loggerFactory } from "../factory/loggerFactory";

const errorLogger = loggerFactory.createErrorLogger();

/**
 * Runs a storage removal after the database change has committed.
 * A failure leaves the committed deletion in place; it is logged and recorded as an extra
 * `error` audit entry with detail `storage_cleanup_failed`.
 */
export async function cleanUpStorage(
    audit: AuditRecorder,
    context: AuditContext,
    target: { action: AuditAction; resourceType: ResourceType; resourceId: number; location: string },
    removal: () => Promise<void>
): Promise<boolean> {
    try {
        await removal();
        return true;
    } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown error";
        errorLogger.logStorageError(target.action, target.location, message);
        await audit.record(context, {
            action: target.action,
            result: AuditResult.Error,
            resourceType: target.resourceType,
            resourceId: target.resourceId,
            detail: "storage_cleanup_failed"
        });
        return false;
    }
}
