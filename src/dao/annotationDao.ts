import { Annotation } from "../models/Annotation";
import { ErrorStatus } from "../factory/status";
import { AnnotationRepository, AnnotationReview, NewAnnotation, QueryOptions } from "../repository/types";
import { AnnotationRecord, AnnotationStatus } from "../types/domain";
import { rethrowAsManaged } from "./daoErrors";

function toRecord(annotation: Annotation): AnnotationRecord {
    return {
        id: annotation.id,
        sampleId: annotation.sampleId,
        authorId: annotation.authorId,
        annoType: annotation.annoType,
        payload: annotation.payload,
        status: annotation.status,
        version: annotation.version,
        reviewedBy: annotation.reviewedBy,
        reviewedAt: annotation.reviewedAt,
        createdAt: annotation.createdAt
    };
}

export class AnnotationDao implements AnnotationRepository {
    private static instance: AnnotationDao;

    private constructor() {}

    public static getInstance(): AnnotationDao {
        if (!AnnotationDao.instance) {
            AnnotationDao.instance = new AnnotationDao();
        }
        return AnnotationDao.instance;
    }

    public async create(data: NewAnnotation, options: QueryOptions = {}): Promise<AnnotationRecord> {
        try {
            const annotation = await Annotation.create(
                { ...data, status: AnnotationStatus.Submitted },
                { transaction: options.transaction }
            );
            return toRecord(annotation);
        } catch (error) {
            rethrowAsManaged(error, "create", "Annotation", ErrorStatus.creationInternalServerError);
        }
    }

    public async findById(id: number, options: QueryOptions = {}): Promise<AnnotationRecord | null> {
        try {
            const annotation = await Annotation.findByPk(id, { transaction: options.transaction });
            return annotation ? toRecord(annotation) : null;
        } catch (error) {
            rethrowAsManaged(error, "findById", "Annotation", ErrorStatus.readInternalServerError);
        }
    }

    public async maxVersion(sampleId: number, options: QueryOptions = {}): Promise<number> {
        try {
            const max: unknown = await Annotation.max("version", { where: { sampleId }, transaction: options.transaction });
            return typeof max === "number" ? max : Number(max ?? 0) || 0;
        } catch (error) {
            rethrowAsManaged(error, "maxVersion", "Annotation", ErrorStatus.readInternalServerError);
        }
    }

    public async listBySample(sampleId: number, options: QueryOptions = {}): Promise<AnnotationRecord[]> {
        try {
            const annotations = await Annotation.findAll({
                where: { sampleId },
                order: [["version", "ASC"]],
                transaction: options.transaction
            });
            return annotations.map(toRecord);
        } catch (error) {
            rethrowAsManaged(error, "listBySample", "Annotation", ErrorStatus.readInternalServerError);
        }
    }

    public async reviewIfSubmitted(id: number, review: AnnotationReview, options: QueryOptions = {}): Promise<AnnotationRecord | null> {
        try {
            const [affected] = await Annotation.update(
                { ...review },
                { where: { id, status: AnnotationStatus.Submitted }, transaction: options.transaction }
            );
            if (affected === 0) {
                return null;
            }
            return await this.findById(id, options);
        } catch (error) {
            rethrowAsManaged(error, "reviewIfSubmitted", "Annotation", ErrorStatus.updateInternalServerError);
        }
    }
}
