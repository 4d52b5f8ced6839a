import { isIP } from "net";
import { Request } from "express";
import { getClientIp } from "request-ip";

// Longest address the audit log stores.
const MAX_ADDRESS_LENGTH = 64;

function validAddress(candidate: string | null | undefined): string | null {
    const value = candidate?.trim();
    return value && value.length <= MAX_ADDRESS_LENGTH && isIP(value) ? value : null;
}

// First X-Forwarded-For hop that is a real address, then request-ip's header and socket lookup, else null.
export function resolveClientIp(req: Pick<Request, "headers" | "socket">): string | null {
    const forwarded = req.headers["x-forwarded-for"];
    const header = Array.isArray(forwarded) ? forwarded.join(",") : forwarded;
    for (const hop of header ? header.split(",") : []) {
        const address = validAddress(hop);
        if (address) {
            return address;
        }
    }
    return validAddress(getClientIp(req));
}
