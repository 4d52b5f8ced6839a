import { Dataset } from "../models/Dataset";
import { ErrorStatus } from "../factory/status";
import { DatasetRepository, NewDataset, QueryOptions } from "../repository/types";
import { DatasetRecord } from "../types/domain";
import { rethrowAsManaged } from "./daoErrors";

function toRecord(dataset: Dataset): DatasetRecord {
    return {
        id: dataset.id,
        name: dataset.name,
        description: dataset.description,
        version: dataset.version,
        visibility: dataset.visibility,
        createdBy: dataset.createdBy,
        createdAt: dataset.createdAt
    };
}

// DAO for datasets; deletion cascades to samples and annotations through the model associations.
export class DatasetDao implements DatasetRepository {
    private static instance: DatasetDao;

    private constructor() {}

    public static getInstance(): DatasetDao {
        if (!DatasetDao.instance) {
            DatasetDao.instance = new DatasetDao();
        }
        return DatasetDao.instance;
    }

    public async create(data: NewDataset, options: QueryOptions = {}): Promise<DatasetRecord> {
        try {
            const dataset = await Dataset.create({ ...data }, { transaction: options.transaction });
            return toRecord(dataset);
        } catch (error) {
            rethrowAsManaged(error, "create", "Dataset", ErrorStatus.creationInternalServerError);
        }
    }

    public async findById(id: number, options: QueryOptions = {}): Promise<DatasetRecord | null> {
        try {
            const dataset = await Dataset.findByPk(id, { transaction: options.transaction });
            return dataset ? toRecord(dataset) : null;
        } catch (error) {
            rethrowAsManaged(error, "findById", "Dataset", ErrorStatus.readInternalServerError);
        }
    }

    public async findByName(name: string, options: QueryOptions = {}): Promise<DatasetRecord | null> {
        try {
            const dataset = await Dataset.findOne({ where: { name }, transaction: options.transaction });
            return dataset ? toRecord(dataset) : null;
        } catch (error) {
            rethrowAsManaged(error, "findByName", "Dataset", ErrorStatus.readInternalServerError);
        }
    }

    public async listAll(options: QueryOptions = {}): Promise<DatasetRecord[]> {
        try {
            const datasets = await Dataset.findAll({ order: [["id", "DESC"]], transaction: options.transaction });
            return datasets.map(toRecord);
        } catch (error) {
            rethrowAsManaged(error, "listAll", "Dataset", ErrorStatus.readInternalServerError);
        }
    }

    public async delete(id: number, options: QueryOptions = {}): Promise<boolean> {
        try {
            const dataset = await Dataset.findByPk(id, { transaction: options.transaction });
            if (!dataset) {
                return false;
            }
            await dataset.destroy({ transaction: options.transaction });
            return true;
        } catch (error) {
            rethrowAsManaged(error, "delete", "Dataset", ErrorStatus.deleteInternalServerError);
        }
    }
}
