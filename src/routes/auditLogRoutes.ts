import { Router } from "express";
import { AppContainer } from "../container";
import { AuditLogController } from "../controllers/auditLogController";
import { createAuthenticateToken } from "../middleware/authMiddleware";
import { createRequirePrivileged } from "../middleware/roleMiddleware";
import { asyncHandler } from "../utils/asyncHandler";

export function createAuditLogRoutes(container: AppContainer): Router {
    const router = Router();
    const auditLogController = new AuditLogController(container.auditLogService);
    const requirePrivileged = createRequirePrivileged(container.audit);

    router.get("/",
        ...createAuthenticateToken(container.authService),
        requirePrivileged("list_audit_logs"),
        asyncHandler(auditLogController.list)
    );

    return router;
}
