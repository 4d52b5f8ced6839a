import { Request } from "express";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { PublicUser, ResourceType } from "./domain";

export interface ResourceRef {
    resourceType: ResourceType;
    resourceId: number;
}

export interface ApprovalRequestInput extends ResourceRef {
    purpose: string;
}

export interface ApprovalReviewInput {
    decision: string;
    ttlMinutes?: number;
}

// Identity attached by the authentication chain.
declare global {
    namespace Express {
        interface Request {
            currentUser?: PublicUser;
            token?: string;
            // Set by the approval validators.
            approvalRequest?: ApprovalRequestInput;
            approvalReview?: ApprovalReviewInput;
            resourceRef?: ResourceRef;
        }
    }
}

// Returns the resolved user or fails as unauthenticated when the auth chain did not run.
export function requireCurrentUser(req: Request): PublicUser {
    if (!req.currentUser) {
        throw ErrorManager.getInstance().createError(ErrorStatus.unauthenticated);
    }
    return req.currentUser;
}

function notValidated(): Error {
    return ErrorManager.getInstance().createError(ErrorStatus.invalidFormat, "Request body was not validated");
}

export function requireApprovalRequest(req: Request): ApprovalRequestInput {
    if (!req.approvalRequest) {
        throw notValidated();
    }
    return req.approvalRequest;
}

export function requireApprovalReview(req: Request): ApprovalReviewInput {
    if (!req.approvalReview) {
        throw notValidated();
    }
    return req.approvalReview;
}

export function requireResourceRef(req: Request): ResourceRef {
    if (!req.resourceRef) {
        throw notValidated();
    }
    return req.resourceRef;
}
