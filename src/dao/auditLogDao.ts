import { AuditLog } from "../models/AuditLog";
import { ErrorStatus } from "../factory/status";
import { AuditRepository, NewAuditEntry, QueryOptions } from "../repository/types";
import { AuditLogRecord } from "../types/domain";
import { rethrowAsManaged } from "./daoErrors";

function toRecord(entry: AuditLog): AuditLogRecord {
    return {
        id: entry.id,
        actorId: entry.actorId,
        action: entry.action,
        resourceType: entry.resourceType,
        resourceId: entry.resourceId,
        ip: entry.ip,
        result: entry.result,
        detail: entry.detail,
        createdAt: entry.createdAt
    };
}

// Insert and read only.
export class AuditLogDao implements AuditRepository {
    private static instance: AuditLogDao;

    private constructor() {}

    public static getInstance(): AuditLogDao {
        if (!AuditLogDao.instance) {
            AuditLogDao.instance = new AuditLogDao();
        }
        return AuditLogDao.instance;
    }

    public async append(entry: NewAuditEntry, options: QueryOptions = {}): Promise<AuditLogRecord> {
        try {
            const created = await AuditLog.create({ ...entry }, { transaction: options.transaction });
            return toRecord(created);
        } catch (error) {
            rethrowAsManaged(error, "append", "AuditLog", ErrorStatus.creationInternalServerError);
        }
    }

    public async listRecent(limit: number, options: QueryOptions = {}): Promise<AuditLogRecord[]> {
        try {
            const entries = await AuditLog.findAll({
                order: [["createdAt", "DESC"], ["id", "DESC"]],
                limit,
                transaction: options.transaction
            });
            return entries.map(toRecord);
        } catch (error) {
            rethrowAsManaged(error, "listRecent", "AuditLog", ErrorStatus.readInternalServerError);
        }
    }
}
