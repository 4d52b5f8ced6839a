import { Response } from "express";
import { HttpStatus } from "../factory/status";

// Success envelope shared by every controller.
export function sendSuccess<T>(res: Response, status: HttpStatus, message: string, data: T): void {
    res.status(status).json({ success: true, message, data });
}
