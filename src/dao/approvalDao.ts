import { WhereOptions } from "sequelize";
import { Approval } from "../models/Approval";
import { ErrorStatus } from "../factory/status";
import { ApprovalDecision, ApprovalRepository, NewApproval, QueryOptions } from "../repository/types";
import { ApprovalRecord, Decision, ResourceType } from "../types/domain";
import { rethrowAsManaged } from "./daoErrors";

function toRecord(approval: Approval): ApprovalRecord {
    return {
        id: approval.id,
        applicantId: approval.applicantId,
        resourceType: approval.resourceType,
        resourceId: approval.resourceId,
        purpose: approval.purpose,
        decision: approval.decision,
        expiresAt: approval.expiresAt,
        reviewedBy: approval.reviewedBy,
        reviewedAt: approval.reviewedAt,
        createdAt: approval.createdAt
    };
}

/** DAO for approval records.
 * Review transitions are written as a conditional update so that only one reviewer can move
 * a record out of `pending`.
 */
export class ApprovalDao implements ApprovalRepository {
    private static instance: ApprovalDao;

    private constructor() {}

    public static getInstance(): ApprovalDao {
        if (!ApprovalDao.instance) {
            ApprovalDao.instance = new ApprovalDao();
        }
        return ApprovalDao.instance;
    }

    public async create(data: NewApproval, options: QueryOptions = {}): Promise<ApprovalRecord> {
        try {
            const approval = await Approval.create(
                { ...data, decision: Decision.Pending },
                { transaction: options.transaction }
            );
            return toRecord(approval);
        } catch (error) {
            rethrowAsManaged(error, "create", "Approval", ErrorStatus.creationInternalServerError);
        }
    }

    public async findById(id: number, options: QueryOptions = {}): Promise<ApprovalRecord | null> {
        try {
            const approval = await Approval.findByPk(id, { transaction: options.transaction });
            return approval ? toRecord(approval) : null;
        } catch (error) {
            rethrowAsManaged(error, "findById", "Approval", ErrorStatus.readInternalServerError);
        }
    }

    public async latestFor(applicantId: number, resourceType: ResourceType, resourceId: number, options: QueryOptions = {}): Promise<ApprovalRecord | null> {
        try {
            const approval = await Approval.findOne({
                where: { applicantId, resourceType, resourceId },
                order: [["createdAt", "DESC"], ["id", "DESC"]],
                transaction: options.transaction
            });
            return approval ? toRecord(approval) : null;
        } catch (error) {
            rethrowAsManaged(error, "latestFor", "Approval", ErrorStatus.readInternalServerError);
        }
    }

    public async list(filter: { decision?: Decision } = {}, options: QueryOptions = {}): Promise<ApprovalRecord[]> {
        try {
            const where: WhereOptions = filter.decision ? { decision: filter.decision } : {};
            const approvals = await Approval.findAll({
                where,
                order: [["createdAt", "DESC"], ["id", "DESC"]],
                transaction: options.transaction
            });
            return approvals.map(toRecord);
        } catch (error) {
            rethrowAsManaged(error, "list", "Approval", ErrorStatus.readInternalServerError);
        }
    }

    public async decideIfPending(id: number, decision: ApprovalDecision, options: QueryOptions = {}): Promise<ApprovalRecord | null> {
        try {
            const [affected] = await Approval.update(
                { ...decision },
                { where: { id, decision: Decision.Pending }, transaction: options.transaction }
            );
            if (affected === 0) {
                return null;
            }
            return await this.findById(id, options);
        } catch (error) {
            rethrowAsManaged(error, "decideIfPending", "Approval", ErrorStatus.updateInternalServerError);
        }
    }
}
