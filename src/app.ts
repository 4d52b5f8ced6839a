import express, { Express } from "express"; // Framework for building the web server.
import cors from "cors";       // Middleware to enable Cross-Origin Resource Sharing.
import helmet from "helmet";     // Middleware to set security-related HTTP headers.

import { AppContainer } from "./container";
import { createAppRoutes } from "./routes/appRoutes";
import { createAuthRoutes } from "./routes/authRoutes";
import { createDatasetRoutes } from "./routes/datasetRoutes";
import { createSampleRoutes } from "./routes/sampleRoutes";
import { createAnnotationRoutes } from "./routes/annotationRoutes";
import { createApprovalRoutes } from "./routes/approvalRoutes";
import { createAuditLogRoutes } from "./routes/auditLogRoutes";
import { routeNotFoundHandler, errorHandlingChain } from "./middleware/errorHandler";
import { FIELD_LIMITS } from "./middleware/fieldLengthMiddleware";

// Builds the Express application over an already wired container.
export function createApp(container: AppContainer): Express {
    const app = express();

    app.use(helmet());
    app.use(cors());

    // Annotation payloads are the largest JSON bodies accepted.
    app.use(express.json({ limit: FIELD_LIMITS.ANNOTATION_PAYLOAD * 2 }));
    // Form-encoded bodies are accepted for login.
    app.use(express.urlencoded({ extended: true }));

    app.use("/", createAppRoutes(container));
    app.use("/auth", createAuthRoutes(container));
    app.use("/datasets", createDatasetRoutes(container));
    app.use("/samples", createSampleRoutes(container));
    app.use("/annotations", createAnnotationRoutes(container));
    app.use("/approvals", createApprovalRoutes(container));
    app.use("/audit-logs", createAuditLogRoutes(container));

    app.use(routeNotFoundHandler);
    app.use(...errorHandlingChain);

    return app;
}
