import { Request, Response, NextFunction } from "express";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import { validateAnnotationFieldLengths } from "./fieldLengthMiddleware";
import { bodyOf } from "../utils/requestBody";
import { AnnotationType, isEnumValue } from "../types/domain";

const errorManager: ErrorManager = ErrorManager.getInstance();
const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

// The payload is opaque; structured values are stored as their JSON text.
export const validateAnnotationBody = (req: Request, res: Response, next: NextFunction): void => {
    const body = bodyOf(req);

    if (!isEnumValue(AnnotationType, body.annoType)) {
        errorLogger.logValidationError("annoType", String(body.annoType), "Unknown annotation type");
        next(errorManager.createError(
            ErrorStatus.invalidFormat,
            `annoType must be one of: ${Object.values(AnnotationType).join(", ")}`
        ));
        return;
    }

    const raw = body.payload;
    if (raw === undefined || raw === null || raw === "") {
        errorLogger.logValidationError("payload", undefined, "Annotation payload is required");
        next(errorManager.createError(ErrorStatus.invalidFormat, "payload required"));
        return;
    }
    const payload = typeof raw === "string" ? raw : JSON.stringify(raw);

    req.body = { annoType: body.annoType, payload };
    next();
};

export const validateAnnotationCreation = [
    validateAnnotationBody,
    validateAnnotationFieldLengths
];
