// Enumeration of HTTP status codes
export enum HttpStatus {
    OK = 200, // Successful request
    CREATED = 201, // Resource created successfully
    NO_CONTENT = 204, // No content to return
    BAD_REQUEST = 400, // Client error: Bad request
    UNAUTHORIZED = 401, // Client error: Unauthorized
    FORBIDDEN = 403, // Client error: Forbidden
    NOT_FOUND = 404, // Client error: Not found
    CONFLICT = 409, // Client error: Conflict with current state
    INTERNAL_SERVER_ERROR = 500 // Server error: Internal server error
}

// Enumeration of error statuses
export enum ErrorStatus {
    unauthenticated, // Missing, malformed or expired credentials
    invalidCredentials, // Username/password pair rejected
    forbidden, // Visibility or ownership denial
    insufficientRole, // Role gate denial
    downloadDenied, // Download refused by the approval gate
    notFound, // Resource not found
    routeNotFound, // Route not found error
    conflict, // Uniqueness violation
    usernameTaken, // Username already registered
    datasetNameTaken, // Dataset name already in use
    checksumDuplicate, // Sample with identical content already stored
    invalidState, // Illegal state transition
    invalidFormat, // Invalid format error
    unsupportedFileType, // Upload extension outside the allow-list
    storageFault, // Blob storage missing or unreadable
    readInternalServerError, // Error during resource read
    creationInternalServerError, // Error during resource creation
    updateInternalServerError, // Error during resource update
    deleteInternalServerError, // Error during resource deletion
    defaultError // Default error message
}

// Interface for response objects
export interface Response {
    message: string; // The message to return
    status: number; // HTTP status code
    reason?: string; // Machine-readable denial code
    type: string; // Type of response
}

// Interface for message objects
export interface Message {
    getResponse(): Response; // Method to get the response object
}

// Abstract class for message factories
export abstract class MessageFactory {
    abstract getMessage(type: number): Message; // Abstract method to get a message based on the type
}
