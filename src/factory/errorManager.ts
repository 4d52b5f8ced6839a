import { HttpStatus, ErrorStatus, Response, Message, MessageFactory } from "./status";

const json = "application/json";

// Response template for each error type.
const errorResponseMap: Map<ErrorStatus, Response> = new Map([
    [ErrorStatus.unauthenticated, { message: "Invalid token",
        status: HttpStatus.UNAUTHORIZED, type: json }],
    [ErrorStatus.invalidCredentials, { message: "Incorrect username or password",
        status: HttpStatus.UNAUTHORIZED, type: json }],
    [ErrorStatus.forbidden, { message: "Access to this resource is not permitted",
        status: HttpStatus.FORBIDDEN, type: json }],
    [ErrorStatus.insufficientRole, { message: "Insufficient role",
        status: HttpStatus.FORBIDDEN, type: json }],
    [ErrorStatus.downloadDenied, { message: "Download not authorized",
        status: HttpStatus.FORBIDDEN, type: json }],
    [ErrorStatus.notFound, { message: "Requested resource was not found.",
        status: HttpStatus.NOT_FOUND, type: json }],
    [ErrorStatus.routeNotFound, { message: "Route not found.",
        status: HttpStatus.NOT_FOUND, type: json }],
    [ErrorStatus.conflict, { message: "Resource already exists.",
        status: HttpStatus.CONFLICT, type: json }],
    [ErrorStatus.usernameTaken, { message: "Username already registered",
        status: HttpStatus.CONFLICT, type: json }],
    [ErrorStatus.datasetNameTaken, { message: "Dataset name already exists",
        status: HttpStatus.CONFLICT, type: json }],
    [ErrorStatus.checksumDuplicate, { message: "Duplicate file (sha256 exists)",
        status: HttpStatus.CONFLICT, type: json }],
    [ErrorStatus.invalidState, { message: "Operation not allowed in the current state",
        status: HttpStatus.BAD_REQUEST, type: json }],
    [ErrorStatus.invalidFormat, { message: "Invalid format provided.",
        status: HttpStatus.BAD_REQUEST, type: json }],
    [ErrorStatus.unsupportedFileType, { message: "Unsupported file type",
        status: HttpStatus.BAD_REQUEST, type: json }],
    [ErrorStatus.storageFault, { message: "Stored file is missing",
        status: HttpStatus.INTERNAL_SERVER_ERROR, type: json }],
    [ErrorStatus.readInternalServerError, { message: "Internal server error occurred while reading data.",
        status: HttpStatus.INTERNAL_SERVER_ERROR, type: json }],
    [ErrorStatus.creationInternalServerError, { message: "Internal server error occurred during creation.",
        status: HttpStatus.INTERNAL_SERVER_ERROR, type: json }],
    [ErrorStatus.updateInternalServerError, { message: "Internal server error occurred during update.",
        status: HttpStatus.INTERNAL_SERVER_ERROR, type: json }],
    [ErrorStatus.deleteInternalServerError, { message: "Internal server error occurred during deletion.",
        status: HttpStatus.INTERNAL_SERVER_ERROR, type: json }],
    [ErrorStatus.defaultError, { message: "An unexpected error occurred.",
        status: HttpStatus.INTERNAL_SERVER_ERROR, type: json }]
]);

const fallbackResponse: Response = {
    message: "An unexpected error occurred.",
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    type: json
};

// The ErrorMessageFactory is responsible for creating error messages.
export class ErrorMessageFactory extends MessageFactory {
    getMessage(type: ErrorStatus): Message {
        const response = errorResponseMap.get(type) ?? fallbackResponse;
        return {
            getResponse: () => response
        };
    }
}

// Throwable error carrying its HTTP status, classification and optional denial reason.
export class ManagedError extends Error {
    public status: number;
    public errorType: ErrorStatus;
    public readonly reason?: string;
    private readonly template: Response;

    constructor(errorType: ErrorStatus, template: Response, message: string, reason?: string) {
        super(message);
        this.name = "ManagedError";
        this.errorType = errorType;
        this.status = template.status;
        this.template = template;
        this.reason = reason;
    }

    public getResponse(): Response {
        return {
            ...this.template,
            message: this.message,
            ...(this.reason ? { reason: this.reason } : {})
        };
    }
}

export function isManagedError(error: unknown): error is ManagedError {
    return error instanceof ManagedError;
}

/* The ErrorManager is a singleton responsible for creating standardized
 * error objects that can be used throughout the application.
 */
export class ErrorManager {
    private static instance: ErrorManager;
    private readonly errorFactory: ErrorMessageFactory;

    private constructor() {
        this.errorFactory = new ErrorMessageFactory();
    }

    public static getInstance(): ErrorManager {
        if (!ErrorManager.instance) {
            ErrorManager.instance = new ErrorManager();
        }
        return ErrorManager.instance;
    }

    // Retrieves a standard response template for a given error type.
    public getErrorResponse(errorType: ErrorStatus): Response {
        return this.errorFactory.getMessage(errorType).getResponse();
    }

    public createError(errorType: ErrorStatus, customMessage?: string, reason?: string): ManagedError {
        const responseTemplate = this.getErrorResponse(errorType);
        return new ManagedError(errorType, responseTemplate, customMessage || responseTemplate.message, reason);
    }
}
