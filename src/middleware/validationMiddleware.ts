import { Request, Response, NextFunction } from "express";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import { MAX_ROW_ID } from "../utils/requestBody";

const errorManager: ErrorManager = ErrorManager.getInstance();
const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

const POSITIVE_INTEGER = /^[1-9]\d{0,9}$/;

function isRowId(value: string | undefined): value is string {
    return value !== undefined && POSITIVE_INTEGER.test(value) && Number(value) <= MAX_ROW_ID;
}

// Reads a route parameter already checked by `validateIdParam`.
export function idParam(req: Pick<Request, "params">, paramName: string): number {
    const value = req.params[paramName];
    if (!isRowId(value)) {
        throw errorManager.createError(ErrorStatus.invalidFormat, `Invalid ${paramName} format`);
    }
    return Number(value);
}

// Generic integer id validation middleware
export const validateIdParam = (paramName: string) => {
    return (req: Request, res: Response, next: NextFunction): void => {
        const paramValue = req.params[paramName];
        if (!isRowId(paramValue)) {
            errorLogger.logValidationError("idFormat", paramValue, `Invalid id format for ${paramName}`);
            next(errorManager.createError(
                ErrorStatus.invalidFormat,
                `Invalid ${paramName} format`
            ));
            return;
        }
        next();
    };
};

export const validateIdFormat = validateIdParam("id");
export const validateDatasetIdFormat = validateIdParam("datasetId");
export const validateSampleIdFormat = validateIdParam("sampleId");
