import { Router } from "express";
import { AppContainer } from "../container";
import { HealthController } from "../controllers/healthController";
import { asyncHandler } from "../utils/asyncHandler";

// Application-level endpoints.
export function createAppRoutes(container: AppContainer): Router {
    const router = Router();
    const healthController = new HealthController(container.healthProbe);

    router.get("/", (req, res) => {
        res.json({
            message: container.settings.appName,
            version: "1.0.0",
            status: "running"
        });
    });

    router.get("/health", asyncHandler(healthController.check));

    return router;
}
