import { Router } from "express";
import { AppContainer } from "../container";
import { AuthController } from "../controllers/authController";
import { validateRegistration, validateLogin } from "../middleware/userMiddleware";
import { createAuthenticateToken } from "../middleware/authMiddleware";
import { asyncHandler } from "../utils/asyncHandler";

export function createAuthRoutes(container: AppContainer): Router {
    const router = Router();
    const authController = new AuthController(container.authService);
    const authenticateToken = createAuthenticateToken(container.authService);

    // CREATE - Register a new account.
    router.post("/register", ...validateRegistration, asyncHandler(authController.register));

    // LOGIN - Exchange credentials for a bearer token (form or JSON body).
    router.post("/login", ...validateLogin, asyncHandler(authController.login));

    // READ - The authenticated caller.
    router.get("/me", ...authenticateToken, asyncHandler(authController.me));

    return router;
}
