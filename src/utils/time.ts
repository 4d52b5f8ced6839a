// Source of the current instant; swapped for a fixed clock in tests.
export interface Clock {
    now(): Date;
}

export const systemClock: Clock = {
    now: () => new Date()
};

const ZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Reads a stored instant as UTC.
 *
 * Strings without a zone designator are taken to be UTC wall-clock time, so
 * `"2024-03-01 10:00:00"` and `"2024-03-01T10:00:00Z"` name the same instant.
 * An unparseable value yields an invalid Date, which compares false with everything.
 */
export function toUtcInstant(value: Date | string): Date {
    if (value instanceof Date) {
        return value;
    }
    const trimmed = value.trim();
    if (DATE_ONLY.test(trimmed)) {
        return new Date(`${trimmed}T00:00:00Z`);
    }
    if (ZONE_SUFFIX.test(trimmed)) {
        return new Date(trimmed);
    }
    return new Date(`${trimmed.replace(" ", "T")}Z`);
}

// True when `expiresAt` lies strictly after `now`.
export function isStrictlyAfter(expiresAt: Date | string, now: Date | string): boolean {
    return toUtcInstant(expiresAt).getTime() > toUtcInstant(now).getTime();
}

export function addMinutes(instant: Date, minutes: number): Date {
    return new Date(instant.getTime() + minutes * 60000);
}
