import { Request, Response, NextFunction } from "express";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus, HttpStatus, Response as ErrorResponse } from "../factory/status";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";

const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();
const errorManager = ErrorManager.getInstance();

// Shape of any error travelling down the chain, including raw Sequelize and body-parser errors.
interface CustomError extends Error {
    status?: number;
    statusCode?: number;
    errorType?: ErrorStatus;
    getResponse?: () => ErrorResponse;
    parent?: { code?: string; constraint?: string };
    original?: { code?: string; constraint?: string };
    errors?: Array<{ path?: string | null; message?: string }>;
}

// Log Errors records the error details.
function logErrors(err: CustomError, req: Request, res: Response, next: NextFunction) {
    errorLogger.log("Application error occurred", {
        errorName: err.name,
        errorMessage: err.message,
        statusCode: err.status || err.statusCode || 500,
        requestUrl: req.originalUrl,
        requestMethod: req.method,
        ip: req.ip
    });
    next(err);
}

// Database error handler for Sequelize errors that escaped the DAOs.
function handleDatabaseError(err: CustomError, req: Request, res: Response, next: NextFunction) {
    if (err.name === "SequelizeValidationError") {
        const errorMessages = (err.errors || [])
            .map((error) => `${error.path ?? "field"}: ${error.message ?? "invalid"}`)
            .join(", ");
        errorLogger.log("Database validation error", {
            errorType: "SequelizeValidationError",
            errors: errorMessages
        });
        return next(errorManager.createError(ErrorStatus.invalidFormat, `Validation failed: ${errorMessages}`));
    }

    if (err.name === "SequelizeUniqueConstraintError") {
        errorLogger.log("Database unique constraint violation", {
            errorType: "SequelizeUniqueConstraintError",
            constraint: err.parent?.constraint || "unknown"
        });
        return next(errorManager.createError(ErrorStatus.conflict, "Resource with this information already exists"));
    }

    if (err.name === "SequelizeDatabaseError") {
        const pgError = err.original || err.parent;
        if (pgError?.code === "22001") {
            errorLogger.log("Database string length error", {
                errorType: "SequelizeDatabaseError",
                code: "22001"
            });
            return next(errorManager.createError(
                ErrorStatus.invalidFormat,
                "One or more fields exceed the maximum allowed length"
            ));
        }
    }

    next(err);
}

// Assigns a standardized internal `errorType` to errors that lack one.
function classifyError(err: CustomError, req: Request, res: Response, next: NextFunction) {
    if (err.errorType === undefined) {
        switch (err.status || err.statusCode) {
            case HttpStatus.BAD_REQUEST:
                err.errorType = ErrorStatus.invalidFormat;
                break;
            case HttpStatus.UNAUTHORIZED:
                err.errorType = ErrorStatus.unauthenticated;
                break;
            case HttpStatus.FORBIDDEN:
                err.errorType = ErrorStatus.forbidden;
                break;
            case HttpStatus.NOT_FOUND:
                err.errorType = ErrorStatus.notFound;
                break;
            case HttpStatus.CONFLICT:
                err.errorType = ErrorStatus.conflict;
                break;
            default:
                err.errorType = ErrorStatus.defaultError;
        }
    }
    next(err);
}

// Ensures every error carries a `getResponse` generator. Unclassified server errors keep their template message.
function formatErrorResponse(err: CustomError, req: Request, res: Response, next: NextFunction) {
    if (err.getResponse) {
        return next(err);
    }

    const errorResponseTemplate = errorManager.getErrorResponse(err.errorType ?? ErrorStatus.defaultError);
    const exposeMessage = errorResponseTemplate.status < HttpStatus.INTERNAL_SERVER_ERROR;
    err.getResponse = () => ({
        ...errorResponseTemplate,
        message: exposeMessage && err.message ? err.message : errorResponseTemplate.message
    });
    next(err);
}

// Sends the final JSON error body.
function generalErrorHandler(err: CustomError, req: Request, res: Response, next: NextFunction) {
    if (res.headersSent) {
        return next(err);
    }

    const response = err.getResponse
        ? err.getResponse()
        : errorManager.getErrorResponse(ErrorStatus.defaultError);

    res.status(response.status).json({
        success: false,
        message: response.message,
        ...(response.reason ? { reason: response.reason } : {})
    });
}

// Route Not Found Handler forwards unknown routes to the chain.
export function routeNotFoundHandler(req: Request, res: Response, next: NextFunction) {
    next(errorManager.createError(
        ErrorStatus.routeNotFound,
        `Route not found: ${req.method} ${req.originalUrl}`
    ));
}

export const errorHandlingChain = [
    logErrors,
    handleDatabaseError,
    classifyError,
    formatErrorResponse,
    generalErrorHandler
];
