import { DbConnection } from "./config/database";
import { settings } from "./config/settings";
import { buildContainer } from "./container";
import { createApp } from "./app";
import { FileStorage } from "./utils/fileStorage";
import logger from "./utils/logger";

// Registers every model and its associations before the first sync.
import "./models";

import { UserDao } from "./dao/userDao";
import { DatasetDao } from "./dao/datasetDao";
import { SampleDao } from "./dao/sampleDao";
import { AnnotationDao } from "./dao/annotationDao";
import { ApprovalDao } from "./dao/approvalDao";
import { AuditLogDao } from "./dao/auditLogDao";
import { SequelizeTransactionRunner } from "./dao/transactionRunner";

async function bootstrap(): Promise<void> {
    const storage = new FileStorage(settings.storageRoot);
    await Promise.all([DbConnection.connect(), storage.init()]);
    logger.info("Database connected and file storage initialized successfully", {
        storageRoot: storage.getRoot()
    });

    const container = buildContainer({
        settings,
        repositories: {
            users: UserDao.getInstance(),
            datasets: DatasetDao.getInstance(),
            samples: SampleDao.getInstance(),
            annotations: AnnotationDao.getInstance(),
            approvals: ApprovalDao.getInstance(),
            audit: AuditLogDao.getInstance()
        },
        transactions: new SequelizeTransactionRunner(DbConnection.getSequelizeInstance()),
        storage,
        healthProbe: { ping: () => DbConnection.ping() }
    });

    await container.adminInitService.initializeAdminUser(settings.adminUsername, settings.adminPassword);

    const app = createApp(container);
    app.listen(settings.port, () => {
        logger.info("Server started successfully", {
            port: settings.port,
            healthCheckUrl: `http://localhost:${settings.port}/health`
        });
    });
}

bootstrap().catch((error) => {
    const err = error instanceof Error ? error : new Error("Unknown initialization error");
    logger.error("Failed to initialize application - Application will exit", {
        errorMessage: err.message,
        stack: err.stack
    });
    process.exit(1);
});
