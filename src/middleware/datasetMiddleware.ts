import { Request, Response, NextFunction } from "express";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { validateDatasetFieldLengths } from "./fieldLengthMiddleware";
import { bodyOf, readString } from "../utils/requestBody";
import { Visibility, isEnumValue } from "../types/domain";

const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();
const errorManager: ErrorManager = ErrorManager.getInstance();

// Optional text fields may be omitted, null, or a string; blank strings become null.
function normalizeOptionalText(value: unknown): string | null | undefined {
    if (value === undefined || value === null) return null;
    if (typeof value !== "string") return undefined;
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
}

// Validates the dataset creation body and writes back its normalized form.
export const validateDatasetBody = (req: Request, res: Response, next: NextFunction): void => {
    const body = bodyOf(req);
    const name = readString(body, "name")?.trim();

    if (!name) {
        errorLogger.logValidationError("name", undefined, "Dataset name is required");
        next(errorManager.createError(ErrorStatus.invalidFormat, "name required"));
        return;
    }

    const visibility = body.visibility ?? Visibility.Group;
    if (!isEnumValue(Visibility, visibility)) {
        errorLogger.logValidationError("visibility", String(visibility), "Unknown visibility");
        next(errorManager.createError(
            ErrorStatus.invalidFormat,
            `visibility must be one of: ${Object.values(Visibility).join(", ")}`
        ));
        return;
    }

    const description = normalizeOptionalText(body.description);
    const version = normalizeOptionalText(body.version);
    if (description === undefined || version === undefined) {
        errorLogger.logValidationError("description/version", undefined, "Optional text fields must be strings");
        next(errorManager.createError(ErrorStatus.invalidFormat, "description and version must be strings"));
        return;
    }

    req.body = { name, description, version, visibility };
    next();
};

export const validateDatasetCreation = [
    validateDatasetFieldLengths,
    validateDatasetBody
];
