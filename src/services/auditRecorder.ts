import { Request } from "express";
import { Transaction } from "sequelize";
import { AuditRepository } from "../repository/types";
import { AuditAction, AuditResult, AuditTarget, PublicUser, ResourceType } from "../types/domain";
import { resolveClientIp } from "../utils/clientIp";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import { ManagedError } from "../factory/errorManager";

// Who acted and from where.
export interface AuditContext {
    actorId?: number | null;
    ip?: string | null;
}

// An authenticated caller as seen by the services.
export interface Actor {
    user: PublicUser;
    ip: string | null;
}

export interface AuditEvent {
    action: AuditAction;
    result: AuditResult;
    resourceType?: ResourceType | AuditTarget | null;
    resourceId?: number | null;
    detail?: string | null;
}

export function actorFromRequest(req: Request, user: PublicUser): Actor {
    return { user, ip: resolveClientIp(req) };
}

export function contextOf(actor: Actor): AuditContext {
    return { actorId: actor.user.id, ip: actor.ip };
}

function normalizeActorId(actorId: number | null | undefined): number | null {
    return typeof actorId === "number" && actorId > 0 ? actorId : null;
}

/**
 * Appends audit entries.
 *
 * `record` is used on denial paths and after committed state changes; a failing sink is
 * reported through the error logger and never reaches the caller. `recordWithin` joins the
 * caller's transaction so a decision and its entry commit or roll back together.
 */
export class AuditRecorder {
    private readonly errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

    constructor(private readonly repository: AuditRepository) {}

    public async record(context: AuditContext, event: AuditEvent): Promise<void> {
        try {
            await this.append(context, event);
        } catch (error) {
            const message = error instanceof Error ? error.message : "Unknown error";
            this.errorLogger.logAuditFailure(event.action, event.result, message);
        }
    }

    // Records a deny or error outcome and hands back the error for the caller to throw.
    public async recordFailure(context: AuditContext, event: AuditEvent, error: ManagedError): Promise<ManagedError> {
        await this.record(context, event);
        return error;
    }

    public async recordWithin(transaction: Transaction | undefined, context: AuditContext, event: AuditEvent): Promise<void> {
        await this.append(context, event, transaction);
    }

    private async append(context: AuditContext, event: AuditEvent, transaction?: Transaction): Promise<void> {
        await this.repository.append({
            actorId: normalizeActorId(context.actorId),
            action: event.action,
            resourceType: event.resourceType ?? null,
            resourceId: event.resourceId ?? null,
            ip: context.ip ?? null,
            result: event.result,
            detail: event.detail ?? null
        }, { transaction });
    }
}
