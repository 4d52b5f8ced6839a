// Import necessary modules
import { Sequelize } from "sequelize";
import logger from "../utils/logger";
import { settings } from "./settings";

// A configuration function to centralize environment variable checks.
function getDatabaseUrl(): string {
    if (!settings.dbUrl) {
        throw new Error("FATAL: Missing required environment variable: DB_URL");
    }
    return settings.dbUrl;
}

// Database connection manager
export class DbConnection {
    private static instance: DbConnection | null = null;
    public readonly sequelize: Sequelize;

    private constructor() {
        this.sequelize = new Sequelize(getDatabaseUrl(), {
            logging: settings.debug
                ? (sql: string) => logger.debug("Database Query", { sql })
                : false,
            pool: {
                max: 5,
                min: 0,
                acquire: 30000,
                idle: 10000
            }
        });
    }

    private static getInstance(): DbConnection {
        DbConnection.instance ??= new DbConnection();
        return DbConnection.instance;
    }

    // Provides public access to the raw Sequelize instance for other parts of the application.
    public static getSequelizeInstance(): Sequelize {
        return DbConnection.getInstance().sequelize;
    }

    // Establishes the connection and creates missing tables.
    public static async connect(): Promise<void> {
        try {
            logger.info("Connecting to database...");
            await DbConnection.getSequelizeInstance().authenticate();
            await DbConnection.getSequelizeInstance().sync();
            logger.info("Database connected and synchronized successfully");
        } catch (error) {
            const err = error instanceof Error ? error : new Error("Unknown database error");
            logger.error("Unable to connect to database:", { error: err.message, stack: err.stack });
            throw error;
        }
    }

    // Round-trips a trivial query; used by the health endpoint.
    public static async ping(): Promise<boolean> {
        try {
            await DbConnection.getSequelizeInstance().query("SELECT 1");
            return true;
        } catch (error) {
            const err = error instanceof Error ? error : new Error("Unknown database error");
            logger.warn("Database ping failed", { error: err.message });
            return false;
        }
    }
}
