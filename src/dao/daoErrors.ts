import { UniqueConstraintError } from "sequelize";
import { ErrorManager, isManagedError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory } from "../factory/loggerFactory";

const errorManager = ErrorManager.getInstance();
const errorLogger = loggerFactory.createErrorLogger();

// Converts a persistence failure into a managed error; uniqueness violations become conflicts.
export function rethrowAsManaged(error: unknown, operation: string, table: string, fallback: ErrorStatus): never {
    if (isManagedError(error)) {
        throw error;
    }
    if (error instanceof UniqueConstraintError) {
        const fields = Object.keys(error.fields).join(", ");
        errorLogger.logDatabaseError(operation, table, `unique constraint violated on ${fields || "unknown"}`);
        throw errorManager.createError(ErrorStatus.conflict, `${table} already exists`);
    }
    const message = error instanceof Error ? error.message : "Unknown error";
    errorLogger.logDatabaseError(operation, table, message);
    throw errorManager.createError(fallback);
}
