import { Router } from "express";
import { AppContainer } from "../container";
import { DatasetController } from "../controllers/datasetController";
import { createAuthenticateToken } from "../middleware/authMiddleware";
import { validateDatasetCreation } from "../middleware/datasetMiddleware";
import { validateIdFormat } from "../middleware/validationMiddleware";
import { asyncHandler } from "../utils/asyncHandler";

export function createDatasetRoutes(container: AppContainer): Router {
    const router = Router();
    const datasetController = new DatasetController(
        container.datasetService,
        container.downloadAuthorizer,
        container.storage
    );
    const authenticateToken = createAuthenticateToken(container.authService);

    router.post("/", ...authenticateToken, ...validateDatasetCreation, asyncHandler(datasetController.create));

    router.get("/", ...authenticateToken, asyncHandler(datasetController.list));

    router.get("/:id", ...authenticateToken, validateIdFormat, asyncHandler(datasetController.get));

    router.delete("/:id", ...authenticateToken, validateIdFormat, asyncHandler(datasetController.delete));

    // Gated by an approved, unexpired access request.
    router.get("/:id/download", ...authenticateToken, validateIdFormat, asyncHandler(datasetController.download));

    return router;
}
