import { Request, Response, NextFunction } from "express";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import { bodyOf } from "../utils/requestBody";

const errorManager: ErrorManager = ErrorManager.getInstance();
const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

// Column and payload length constraints
export const FIELD_LIMITS = {
    USERNAME_MIN: 3,
    USERNAME: 64,
    PASSWORD_MIN: 6,
    PASSWORD: 128,
    DATASET_NAME: 255,
    DATASET_VERSION: 64,
    DESCRIPTION: 4000,
    PURPOSE: 4000,
    ANNOTATION_PAYLOAD: 1024 * 1024
} as const;

// Generic field length validation function
export const validateFieldLength = (fieldName: string, value: string | undefined, maxLength: number): void => {
    if (value && value.length > maxLength) {
        errorLogger.logValidationError(fieldName, `length: ${value.length}`, `Field exceeds maximum length of ${maxLength} characters`);
        throw errorManager.createError(
            ErrorStatus.invalidFormat,
            `${fieldName} exceeds maximum length of ${maxLength} characters (current: ${value.length})`
        );
    }
};

// Middleware factory for field length validation
export const createFieldLengthValidator = (fields: Record<string, number>) => {
    return (req: Request, res: Response, next: NextFunction): void => {
        try {
            const body = bodyOf(req);
            for (const [fieldName, maxLength] of Object.entries(fields)) {
                const value = body[fieldName];
                if (typeof value === "string") {
                    validateFieldLength(fieldName, value, maxLength);
                }
            }
            next();
        } catch (error) {
            next(error);
        }
    };
};

export const validateDatasetFieldLengths = createFieldLengthValidator({
    name: FIELD_LIMITS.DATASET_NAME,
    description: FIELD_LIMITS.DESCRIPTION,
    version: FIELD_LIMITS.DATASET_VERSION
});

export const validateApprovalFieldLengths = createFieldLengthValidator({
    purpose: FIELD_LIMITS.PURPOSE
});

export const validateAnnotationFieldLengths = createFieldLengthValidator({
    payload: FIELD_LIMITS.ANNOTATION_PAYLOAD
});
