import { Request, Response, NextFunction } from "express";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import { FIELD_LIMITS } from "./fieldLengthMiddleware";
import { bodyOf, readString } from "../utils/requestBody";
import { UserRole, isEnumValue } from "../types/domain";

const errorManager: ErrorManager = ErrorManager.getInstance();
const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

const USERNAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

// checkCredentialFields verifies that username and password are present, trimming the username.
export const checkCredentialFields = (req: Request, res: Response, next: NextFunction): void => {
    const body = bodyOf(req);
    const username = readString(body, "username")?.trim();
    const password = readString(body, "password");

    if (!username || !password) {
        const missingFields: string[] = [];
        if (!username) missingFields.push("username");
        if (!password) missingFields.push("password");

        errorLogger.logValidationError("requiredFields", missingFields.join(", "), "Missing or empty required fields");
        next(errorManager.createError(
            ErrorStatus.invalidFormat,
            `The following fields are required and cannot be empty: ${missingFields.join(", ")}`
        ));
        return;
    }

    req.body = { ...body, username, password };
    next();
};

// validateUsernameFormat enforces the length bounds and character set of a new username.
export const validateUsernameFormat = (req: Request, res: Response, next: NextFunction): void => {
    const username = readString(bodyOf(req), "username") ?? "";

    if (username.length < FIELD_LIMITS.USERNAME_MIN || username.length > FIELD_LIMITS.USERNAME) {
        errorLogger.logValidationError("username", `length: ${username.length}`, "Username length out of range");
        next(errorManager.createError(
            ErrorStatus.invalidFormat,
            `Username must be between ${FIELD_LIMITS.USERNAME_MIN} and ${FIELD_LIMITS.USERNAME} characters`
        ));
        return;
    }

    if (!USERNAME_PATTERN.test(username)) {
        errorLogger.logValidationError("username", username, "Username contains unsupported characters");
        next(errorManager.createError(
            ErrorStatus.invalidFormat,
            "Username may only contain letters, digits, dots, hyphens and underscores"
        ));
        return;
    }
    next();
};

// validatePasswordStrength enforces the password length bounds.
export const validatePasswordStrength = (req: Request, res: Response, next: NextFunction): void => {
    const password = readString(bodyOf(req), "password") ?? "";

    if (password.length < FIELD_LIMITS.PASSWORD_MIN || password.length > FIELD_LIMITS.PASSWORD) {
        errorLogger.logValidationError("password", `length: ${password.length}`, "Password length out of range");
        next(errorManager.createError(
            ErrorStatus.invalidFormat,
            `Password must be between ${FIELD_LIMITS.PASSWORD_MIN} and ${FIELD_LIMITS.PASSWORD} characters`
        ));
        return;
    }
    next();
};

// validateRole accepts a known role and defaults to researcher.
export const validateRole = (req: Request, res: Response, next: NextFunction): void => {
    const body = bodyOf(req);
    const role = body.role ?? UserRole.Researcher;

    if (!isEnumValue(UserRole, role)) {
        errorLogger.logValidationError("role", String(role), "Unknown role");
        next(errorManager.createError(
            ErrorStatus.invalidFormat,
            `Role must be one of: ${Object.values(UserRole).join(", ")}`
        ));
        return;
    }

    req.body = { ...body, role };
    next();
};

export const validateRegistration = [
    checkCredentialFields,
    validateUsernameFormat,
    validatePasswordStrength,
    validateRole
];

export const validateLogin = [checkCredentialFields];
