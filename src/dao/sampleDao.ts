import { Sample } from "../models/Sample";
import { ErrorStatus } from "../factory/status";
import { NewSample, QueryOptions, SampleRepository } from "../repository/types";
import { SampleRecord } from "../types/domain";
import { rethrowAsManaged } from "./daoErrors";

function toRecord(sample: Sample): SampleRecord {
    return {
        id: sample.id,
        datasetId: sample.datasetId,
        filePath: sample.filePath,
        sha256: sample.sha256,
        mime: sample.mime,
        createdBy: sample.createdBy,
        createdAt: sample.createdAt
    };
}

export class SampleDao implements SampleRepository {
    private static instance: SampleDao;

    private constructor() {}

    public static getInstance(): SampleDao {
        if (!SampleDao.instance) {
            SampleDao.instance = new SampleDao();
        }
        return SampleDao.instance;
    }

    public async create(data: NewSample, options: QueryOptions = {}): Promise<SampleRecord> {
        try {
            const sample = await Sample.create({ ...data }, { transaction: options.transaction });
            return toRecord(sample);
        } catch (error) {
            rethrowAsManaged(error, "create", "Sample", ErrorStatus.creationInternalServerError);
        }
    }

    public async findById(id: number, options: QueryOptions = {}): Promise<SampleRecord | null> {
        try {
            const sample = await Sample.findByPk(id, { transaction: options.transaction });
            return sample ? toRecord(sample) : null;
        } catch (error) {
            rethrowAsManaged(error, "findById", "Sample", ErrorStatus.readInternalServerError);
        }
    }

    public async findBySha256(sha256: string, options: QueryOptions = {}): Promise<SampleRecord | null> {
        try {
            const sample = await Sample.findOne({ where: { sha256 }, transaction: options.transaction });
            return sample ? toRecord(sample) : null;
        } catch (error) {
            rethrowAsManaged(error, "findBySha256", "Sample", ErrorStatus.readInternalServerError);
        }
    }

    public async listAll(options: QueryOptions = {}): Promise<SampleRecord[]> {
        try {
            const samples = await Sample.findAll({ order: [["id", "DESC"]], transaction: options.transaction });
            return samples.map(toRecord);
        } catch (error) {
            rethrowAsManaged(error, "listAll", "Sample", ErrorStatus.readInternalServerError);
        }
    }

    public async listByDataset(datasetId: number, options: QueryOptions = {}): Promise<SampleRecord[]> {
        try {
            const samples = await Sample.findAll({
                where: { datasetId },
                order: [["id", "DESC"]],
                transaction: options.transaction
            });
            return samples.map(toRecord);
        } catch (error) {
            rethrowAsManaged(error, "listByDataset", "Sample", ErrorStatus.readInternalServerError);
        }
    }

    public async delete(id: number, options: QueryOptions = {}): Promise<boolean> {
        try {
            const sample = await Sample.findByPk(id, { transaction: options.transaction });
            if (!sample) {
                return false;
            }
            await sample.destroy({ transaction: options.transaction });
            return true;
        } catch (error) {
            rethrowAsManaged(error, "delete", "Sample", ErrorStatus.deleteInternalServerError);
        }
    }
}
