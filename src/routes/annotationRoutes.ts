import { Router } from "express";
import { AppContainer } from "../container";
import { AnnotationController } from "../controllers/annotationController";
import { createAuthenticateToken } from "../middleware/authMiddleware";
import { createRequirePrivileged } from "../middleware/roleMiddleware";
import { validateAnnotationCreation } from "../middleware/annotationMiddleware";
import { validateIdFormat, validateSampleIdFormat } from "../middleware/validationMiddleware";
import { asyncHandler } from "../utils/asyncHandler";

export function createAnnotationRoutes(container: AppContainer): Router {
    const router = Router();
    const annotationController = new AnnotationController(container.annotationService);
    const authenticateToken = createAuthenticateToken(container.authService);
    const requirePrivileged = createRequirePrivileged(container.audit);

    router.get("/by-sample/:sampleId",
        ...authenticateToken,
        validateSampleIdFormat,
        asyncHandler(annotationController.listBySample)
    );

    router.post("/:sampleId",
        ...authenticateToken,
        validateSampleIdFormat,
        ...validateAnnotationCreation,
        asyncHandler(annotationController.create)
    );

    // Review routes are restricted to admin and data_admin.
    router.post("/:id/approve",
        ...authenticateToken,
        requirePrivileged("review_annotation"),
        validateIdFormat,
        asyncHandler(annotationController.approve)
    );

    router.post("/:id/reject",
        ...authenticateToken,
        requirePrivileged("review_annotation"),
        validateIdFormat,
        asyncHandler(annotationController.reject)
    );

    return router;
}
