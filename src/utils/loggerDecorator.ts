import { Request, Response } from "express";
import winston from "winston";
import { Logger } from "./logger";
import "../types/request";

// Structured metadata accepted by every decorator.
export interface LogData {
    [key: string]: string | number | boolean | null | undefined | string[] | Record<string, unknown>;
}

// Decorator Interface
export interface LoggerDecorator {
    log(message: string, data?: LogData): void;
}

// Base Logger Decorator
export abstract class BaseLoggerDecorator implements LoggerDecorator {
    protected logger: winston.Logger;

    // Accept an optional wrapped logger for chaining decorators
    constructor(protected wrappedLogger?: LoggerDecorator) {
        this.logger = Logger.getInstance();
    }

    protected abstract readonly type: string;

    log(message: string, data?: LogData): void {
        const decoratedData = { type: this.type, ...data };
        if (this.wrappedLogger) {
            this.wrappedLogger.log(message, decoratedData);
        } else {
            this.write(message, decoratedData);
        }
    }

    protected write(message: string, data: LogData): void {
        this.logger.info(message, data);
    }

    // Same routing as `log`, but written at warn level when nothing is wrapped.
    protected warn(message: string, data?: LogData): void {
        const decoratedData = { type: this.type, severity: "warn", ...data };
        if (this.wrappedLogger) {
            this.wrappedLogger.log(message, decoratedData);
        } else {
            this.logger.warn(message, decoratedData);
        }
    }
}

// Auth Route Logger Decorator
export class AuthRouteLogger extends BaseLoggerDecorator {
    protected readonly type = "AUTH_ACTION";

    logRegistration(userId: number, username: string, role: string): void {
        this.log("USER_REGISTERED", { userId, username, role });
    }

    logLogin(username: string, success: boolean): void {
        this.log("USER_LOGIN", { username, success });
    }

    logTokenValidation(username: string, success: boolean, reason?: string): void {
        this.log("TOKEN_VALIDATED", { username, success, reason });
    }

    logAdminBootstrap(username: string, created: boolean): void {
        this.log("ADMIN_BOOTSTRAP", { username, created });
    }
}

// API Request/Response Logger Decorator
export class ApiRouteLogger extends BaseLoggerDecorator {
    protected readonly type = "API_ACTION";

    logRequest(req: Request): void {
        this.log(`API_REQUEST: ${req.method} ${req.path}`, {
            method: req.method,
            path: req.path,
            userId: req.currentUser?.id,
            ip: req.ip,
            userAgent: req.get("User-Agent")
        });
    }

    logResponse(req: Request, res: Response, executionTime?: number): void {
        this.log(`API_RESPONSE: ${req.method} ${req.path} - ${res.statusCode}`, {
            method: req.method,
            path: req.path,
            statusCode: res.statusCode,
            userId: req.currentUser?.id,
            executionTime,
            ip: req.ip
        });
    }

    logError(req: Request, error: Error): void {
        const errorData = {
            method: req.method,
            path: req.path,
            userId: req.currentUser?.id,
            error: error.message,
            stack: error.stack,
            ip: req.ip
        };
        if (this.wrappedLogger) {
            this.wrappedLogger.log(`API_ERROR: ${req.method} ${req.path}`, errorData);
        } else {
            this.logger.error(`API_ERROR: ${req.method} ${req.path}`, { type: "API_ERROR", ...errorData });
        }
    }
}

// Error Logger Decorator
export class ErrorRouteLogger extends BaseLoggerDecorator {
    protected readonly type = "ERROR";

    protected write(message: string, data: LogData): void {
        this.logger.error(message, data);
    }

    logValidationError(field: string, value: string | number | undefined, message: string): void {
        this.log("VALIDATION_ERROR", { field, value, message });
    }

    logAuthenticationError(username?: string, reason?: string): void {
        this.log("AUTHENTICATION_ERROR", { username, reason });
    }

    logAuthorizationError(userId?: number, resource?: string, reason?: string): void {
        this.log("AUTHORIZATION_ERROR", { userId, resource, reason });
    }

    logDatabaseError(operation: string, table?: string, error?: string): void {
        this.log("DATABASE_ERROR", { operation, table, error });
    }

    logFileUploadError(filename?: string, size?: number, error?: string): void {
        this.log("FILE_UPLOAD_ERROR", { filename, size, error });
    }

    logStorageError(operation: string, target: string, error: string): void {
        this.log("STORAGE_ERROR", { operation, target, error });
    }

    logAuditFailure(action: string, result: string, error: string): void {
        this.log("AUDIT_APPEND_FAILED", { action, result, error });
    }
}

// Dataset and sample Route Logger Decorator
export class DatasetRouteLogger extends BaseLoggerDecorator {
    protected readonly type = "DATASET_ACTION";

    logDatasetCreation(userId: number, datasetId: number, name: string, visibility: string): void {
        this.log("DATASET_CREATED", { userId, datasetId, name, visibility });
    }

    logDatasetDeletion(userId: number, datasetId: number): void {
        this.log("DATASET_DELETED", { userId, datasetId });
    }

    logSampleUpload(userId: number, datasetId: number, sampleId: number, filePath: string, size: number): void {
        this.log("SAMPLE_UPLOADED", { userId, datasetId, sampleId, filePath, size });
    }

    logSampleDeletion(userId: number, sampleId: number): void {
        this.log("SAMPLE_DELETED", { userId, sampleId });
    }

    logDownload(userId: number, resourceType: string, resourceId: number): void {
        this.log("DOWNLOAD_GRANTED", { userId, resourceType, resourceId });
    }
}

// Approval workflow Logger Decorator
export class ApprovalRouteLogger extends BaseLoggerDecorator {
    protected readonly type = "APPROVAL_ACTION";

    logRequested(approvalId: number, applicantId: number, resourceType: string, resourceId: number): void {
        this.log("APPROVAL_REQUESTED", { approvalId, applicantId, resourceType, resourceId });
    }

    logReviewed(approvalId: number, reviewerId: number, decision: string, expiresAt?: string): void {
        this.log("APPROVAL_REVIEWED", { approvalId, reviewerId, decision, expiresAt });
    }

    logPermanentGrant(approvalId: number, reviewerId: number): void {
        this.warn("APPROVAL_GRANTED_WITHOUT_EXPIRY", { approvalId, reviewerId });
    }
}

// Annotation Logger Decorator
export class AnnotationRouteLogger extends BaseLoggerDecorator {
    protected readonly type = "ANNOTATION_ACTION";

    logCreated(annotationId: number, sampleId: number, authorId: number, version: number): void {
        this.log("ANNOTATION_CREATED", { annotationId, sampleId, authorId, version });
    }

    logReviewed(annotationId: number, reviewerId: number, status: string): void {
        this.log("ANNOTATION_REVIEWED", { annotationId, reviewerId, status });
    }
}
