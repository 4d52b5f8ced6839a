import { Request, Response, NextFunction } from "express";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import { validateApprovalFieldLengths } from "./fieldLengthMiddleware";
import { bodyOf, readInteger, readRowId, readString } from "../utils/requestBody";
import { Decision, ResourceType, isEnumValue } from "../types/domain";

const errorManager: ErrorManager = ErrorManager.getInstance();
const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

// About a hundred years; review time plus this stays a valid Date.
export const MAX_TTL_MINUTES = 52560000;

export const validateApprovalRequestBody = (req: Request, res: Response, next: NextFunction): void => {
    const body = bodyOf(req);

    if (!isEnumValue(ResourceType, body.resourceType)) {
        errorLogger.logValidationError("resourceType", String(body.resourceType), "Unknown resource type");
        next(errorManager.createError(ErrorStatus.invalidFormat, "resourceType must be dataset or sample"));
        return;
    }

    const resourceId = readRowId(body, "resourceId");
    if (resourceId === undefined) {
        errorLogger.logValidationError("resourceId", String(body.resourceId), "resourceId must be a positive integer");
        next(errorManager.createError(ErrorStatus.invalidFormat, "resourceId must be a positive integer"));
        return;
    }

    const purpose = readString(body, "purpose")?.trim();
    if (!purpose) {
        errorLogger.logValidationError("purpose", undefined, "Purpose is required");
        next(errorManager.createError(ErrorStatus.invalidFormat, "purpose required"));
        return;
    }

    req.approvalRequest = { resourceType: body.resourceType, resourceId, purpose };
    next();
};

// Only the shape is checked here; whether the decision is a legal transition is the service's call.
export const validateReviewBody = (req: Request, res: Response, next: NextFunction): void => {
    const body = bodyOf(req);

    const decision = readString(body, "decision")?.trim();
    if (!decision) {
        errorLogger.logValidationError("decision", undefined, "Decision is required");
        next(errorManager.createError(ErrorStatus.invalidFormat, "decision required"));
        return;
    }

    let ttlMinutes: number | undefined;
    if (body.ttlMinutes !== undefined && body.ttlMinutes !== null) {
        ttlMinutes = readInteger(body, "ttlMinutes");
        if (ttlMinutes === undefined || ttlMinutes <= 0) {
            errorLogger.logValidationError("ttlMinutes", String(body.ttlMinutes), "ttlMinutes must be a positive integer");
            next(errorManager.createError(ErrorStatus.invalidFormat, "ttlMinutes must be a positive integer"));
            return;
        }
        if (ttlMinutes > MAX_TTL_MINUTES) {
            errorLogger.logValidationError("ttlMinutes", String(ttlMinutes), "ttlMinutes too large");
            next(errorManager.createError(ErrorStatus.invalidFormat, `ttlMinutes must not exceed ${MAX_TTL_MINUTES}`));
            return;
        }
    }

    req.approvalReview = { decision, ttlMinutes };
    next();
};

export const validateDecisionFilter = (req: Request, res: Response, next: NextFunction): void => {
    const decision = req.query.decision;
    if (decision !== undefined && !isEnumValue(Decision, decision)) {
        errorLogger.logValidationError("decision", String(decision), "Unknown decision filter");
        next(errorManager.createError(
            ErrorStatus.invalidFormat,
            `decision must be one of: ${Object.values(Decision).join(", ")}`
        ));
        return;
    }
    next();
};

export const validateLatestApprovalQuery = (req: Request, res: Response, next: NextFunction): void => {
    const query: Record<string, unknown> = { ...req.query };
    const resourceId = readRowId(query, "resourceId");
    if (!isEnumValue(ResourceType, query.resourceType) || resourceId === undefined) {
        errorLogger.logValidationError("resourceType/resourceId", undefined, "Query must name a resource");
        next(errorManager.createError(
            ErrorStatus.invalidFormat,
            "resourceType (dataset or sample) and a positive integer resourceId are required"
        ));
        return;
    }
    req.resourceRef = { resourceType: query.resourceType, resourceId };
    next();
};

export const validateApprovalRequest = [
    validateApprovalFieldLengths,
    validateApprovalRequestBody
];

export const validateApprovalReview = [validateReviewBody];
