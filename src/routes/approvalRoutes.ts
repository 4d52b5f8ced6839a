import { Router } from "express";
import { AppContainer } from "../container";
import { ApprovalController } from "../controllers/approvalController";
import { createAuthenticateToken } from "../middleware/authMiddleware";
import { createRequirePrivileged } from "../middleware/roleMiddleware";
import {
    validateApprovalRequest,
    validateApprovalReview,
    validateDecisionFilter,
    validateLatestApprovalQuery
} from "../middleware/approvalMiddleware";
import { validateIdFormat } from "../middleware/validationMiddleware";
import { asyncHandler } from "../utils/asyncHandler";

export function createApprovalRoutes(container: AppContainer): Router {
    const router = Router();
    const approvalController = new ApprovalController(container.approvalService);
    const authenticateToken = createAuthenticateToken(container.authService);
    const requirePrivileged = createRequirePrivileged(container.audit);

    router.post("/request", ...authenticateToken, ...validateApprovalRequest, asyncHandler(approvalController.request));

    // Registered before "/:id" routes so "my" is never read as an id.
    router.get("/my", ...authenticateToken, validateLatestApprovalQuery, asyncHandler(approvalController.mine));

    router.get("/",
        ...authenticateToken,
        requirePrivileged("list_approvals"),
        validateDecisionFilter,
        asyncHandler(approvalController.list)
    );

    router.post("/:id/review",
        ...authenticateToken,
        requirePrivileged("review_approval"),
        validateIdFormat,
        ...validateApprovalReview,
        asyncHandler(approvalController.review)
    );

    return router;
}
