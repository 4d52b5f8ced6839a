import dotenv from "dotenv";
import { Algorithm } from "jsonwebtoken";

dotenv.config();

// Tokens are signed with the shared JWT_SECRET, so only HMAC algorithms apply.
const SIGNING_ALGORITHMS: readonly Algorithm[] = ["HS256", "HS384", "HS512"];

export interface Settings {
    readonly appName: string;
    readonly debug: boolean;
    readonly port: number;
    readonly dbUrl: string | undefined;
    readonly jwtSecret: string;
    readonly jwtAlgorithm: Algorithm;
    readonly accessTokenExpireMinutes: number;
    readonly storageRoot: string;
    readonly adminUsername: string | undefined;
    readonly adminPassword: string | undefined;
}

type Environment = Record<string, string | undefined>;

function readBoolean(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value.trim() === "") return fallback;
    return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function readPositiveInteger(name: string, value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === "") return fallback;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new Error(`FATAL: ${name} must be a positive integer, got "${value}"`);
    }
    return parsed;
}

function readAlgorithm(value: string | undefined): Algorithm {
    const candidate = value?.trim() || "HS256";
    const match = SIGNING_ALGORITHMS.find((algorithm) => algorithm === candidate);
    if (!match) {
        throw new Error(`FATAL: JWT_ALG "${candidate}" is not a supported signing algorithm`);
    }
    return match;
}

function optional(value: string | undefined): string | undefined {
    return value && value.trim() !== "" ? value : undefined;
}

// Builds the settings object from an environment map.
export function loadSettings(env: Environment = process.env): Settings {
    return Object.freeze({
        appName: env.APP_NAME || "MedImg Label & Access Control",
        debug: readBoolean(env.DEBUG, false),
        port: readPositiveInteger("PORT", env.PORT, 8000),
        dbUrl: optional(env.DB_URL),
        jwtSecret: env.JWT_SECRET || "dev-secret",
        jwtAlgorithm: readAlgorithm(env.JWT_ALG),
        accessTokenExpireMinutes: readPositiveInteger("ACCESS_TOKEN_EXPIRE_MINUTES", env.ACCESS_TOKEN_EXPIRE_MINUTES, 480),
        storageRoot: env.STORAGE_ROOT || "./storage",
        adminUsername: optional(env.ADMIN_USERNAME),
        adminPassword: optional(env.ADMIN_PASSWORD)
    });
}

export const settings: Settings = loadSettings();
