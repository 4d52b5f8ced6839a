import { Request, Response } from "express";
import { HealthProbe } from "../repository/types";
import { HttpStatus } from "../factory/status";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";

// Liveness plus a database reachability flag; never fails the request.
export class HealthController {
    private readonly errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

    constructor(private readonly probe: HealthProbe) {}

    check = async (req: Request, res: Response): Promise<void> => {
        let db = false;
        try {
            db = await this.probe.ping();
        } catch (error) {
            const message = error instanceof Error ? error.message : "Unknown error";
            this.errorLogger.logDatabaseError("HEALTH_PING", "database", message);
        }
        res.status(HttpStatus.OK).json({ ok: true, db });
    };
}
