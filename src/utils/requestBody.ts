import { Request } from "express";

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

// The parsed body as a plain record; anything else reads as empty.
export function bodyOf(req: Pick<Request, "body">): Record<string, unknown> {
    const body: unknown = req.body;
    return isRecord(body) ? body : {};
}

export function readString(source: Record<string, unknown>, key: string): string | undefined {
    const value = source[key];
    return typeof value === "string" ? value : undefined;
}

// Accepts integers and strings of decimal digits with an optional leading minus.
export function readInteger(source: Record<string, unknown>, key: string): number | undefined {
    const value = source[key];
    if (typeof value === "number") {
        return Number.isInteger(value) ? value : undefined;
    }
    if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
        return Number(value.trim());
    }
    return undefined;
}

// Largest key a Postgres INTEGER column holds.
export const MAX_ROW_ID = 2147483647;

// A positive integer that fits a row key, or undefined.
export function readRowId(source: Record<string, unknown>, key: string): number | undefined {
    const value = readInteger(source, key);
    return value !== undefined && value > 0 && value <= MAX_ROW_ID ? value : undefined;
}
