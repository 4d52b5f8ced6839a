import multer from "multer";
import path from "path";
import { Request, Response, NextFunction } from "express";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import { ErrorManager, isManagedError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";

const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();
const errorManager: ErrorManager = ErrorManager.getInstance();

export const ALLOWED_EXTENSIONS: readonly string[] = [".jpg", ".jpeg", ".png", ".tif", ".tiff"];
export const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

export function hasAllowedExtension(fileName: string): boolean {
    return ALLOWED_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

// Middleware class for sample uploads
export class SampleMiddleware {
    // Files are held in memory so the checksum can be taken before anything touches storage.
    static readonly uploadHandler = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 },
        fileFilter: (request, uploadedFile, callback) => {
            if (!hasAllowedExtension(uploadedFile.originalname)) {
                errorLogger.logFileUploadError(uploadedFile.originalname, undefined, "Unsupported file extension");
                callback(errorManager.createError(
                    ErrorStatus.unsupportedFileType,
                    `Unsupported file type; allowed: ${ALLOWED_EXTENSIONS.join(", ")}`
                ));
                return;
            }
            callback(null, true);
        }
    });

    // Translates multer failures into managed errors.
    static readonly handleMulterErrors = (err: Error | null, req: Request, res: Response, next: NextFunction): void => {
        if (!err) {
            next();
            return;
        }
        if (isManagedError(err)) {
            next(err);
            return;
        }
        if (err instanceof multer.MulterError) {
            const message = err.code === "LIMIT_FILE_SIZE"
                ? `File size exceeds the maximum limit of ${MAX_UPLOAD_BYTES / (1024 * 1024)}MB`
                : err.code === "LIMIT_UNEXPECTED_FILE"
                    ? "Unexpected file field or too many files; send a single \"file\" field"
                    : err.message;
            errorLogger.logFileUploadError(err.field, undefined, message);
            next(errorManager.createError(ErrorStatus.invalidFormat, message));
            return;
        }
        errorLogger.logFileUploadError("unknown", 0, err.message || "Multer error occurred");
        next(errorManager.createError(ErrorStatus.invalidFormat, err.message || "File upload failed"));
    };

    static readonly requireFile = (req: Request, res: Response, next: NextFunction): void => {
        if (!req.file) {
            errorLogger.logValidationError("file", undefined, "Multipart field \"file\" is required");
            next(errorManager.createError(ErrorStatus.invalidFormat, "file required"));
            return;
        }
        next();
    };
}

export const handleSampleUpload = [
    SampleMiddleware.uploadHandler.single("file"),
    SampleMiddleware.handleMulterErrors,
    SampleMiddleware.requireFile
];
