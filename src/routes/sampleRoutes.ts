import { Router } from "express";
import { AppContainer } from "../container";
import { SampleController } from "../controllers/sampleController";
import { createAuthenticateToken } from "../middleware/authMiddleware";
import { handleSampleUpload } from "../middleware/sampleMiddleware";
import { validateDatasetIdFormat, validateIdFormat } from "../middleware/validationMiddleware";
import { asyncHandler } from "../utils/asyncHandler";

export function createSampleRoutes(container: AppContainer): Router {
    const router = Router();
    const sampleController = new SampleController(container.sampleService, container.downloadAuthorizer);
    const authenticateToken = createAuthenticateToken(container.authService);

    router.post("/upload/:datasetId",
        ...authenticateToken,
        validateDatasetIdFormat,
        ...handleSampleUpload,
        asyncHandler(sampleController.upload)
    );

    router.get("/", ...authenticateToken, asyncHandler(sampleController.list));

    router.get("/by-dataset/:datasetId",
        ...authenticateToken,
        validateDatasetIdFormat,
        asyncHandler(sampleController.listByDataset)
    );

    router.get("/:id", ...authenticateToken, validateIdFormat, asyncHandler(sampleController.get));

    router.delete("/:id", ...authenticateToken, validateIdFormat, asyncHandler(sampleController.delete));

    router.get("/:id/download", ...authenticateToken, validateIdFormat, asyncHandler(sampleController.download));

    return router;
}
