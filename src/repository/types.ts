import { Transaction } from "sequelize";
import {
    AnnotationRecord,
    AnnotationStatus,
    AnnotationType,
    ApprovalRecord,
    AuditLogRecord,
    AuditResult,
    DatasetRecord,
    Decision,
    ResourceType,
    SampleRecord,
    UserRecord,
    UserRole,
    Visibility
} from "../types/domain";

// Every repository call may join a running transaction.
export interface QueryOptions {
    transaction?: Transaction;
}

export interface TransactionRunner {
    run<T>(work: (transaction: Transaction | undefined) => Promise<T>): Promise<T>;
}

export interface NewUser {
    username: string;
    passwordHash: string;
    role: UserRole;
}

export interface UserRepository {
    create(data: NewUser, options?: QueryOptions): Promise<UserRecord>;
    findById(id: number, options?: QueryOptions): Promise<UserRecord | null>;
    findByUsername(username: string, options?: QueryOptions): Promise<UserRecord | null>;
}

export interface NewDataset {
    name: string;
    description: string | null;
    version: string | null;
    visibility: Visibility;
    createdBy: number;
}

export interface DatasetRepository {
    create(data: NewDataset, options?: QueryOptions): Promise<DatasetRecord>;
    findById(id: number, options?: QueryOptions): Promise<DatasetRecord | null>;
    findByName(name: string, options?: QueryOptions): Promise<DatasetRecord | null>;
    // Newest first.
    listAll(options?: QueryOptions): Promise<DatasetRecord[]>;
    // Removes the dataset together with its samples and their annotations.
    delete(id: number, options?: QueryOptions): Promise<boolean>;
}

export interface NewSample {
    datasetId: number;
    filePath: string;
    sha256: string;
    mime: string | null;
    createdBy: number;
}

export interface SampleRepository {
    create(data: NewSample, options?: QueryOptions): Promise<SampleRecord>;
    findById(id: number, options?: QueryOptions): Promise<SampleRecord | null>;
    findBySha256(sha256: string, options?: QueryOptions): Promise<SampleRecord | null>;
    // Newest first.
    listAll(options?: QueryOptions): Promise<SampleRecord[]>;
    // Newest first.
    listByDataset(datasetId: number, options?: QueryOptions): Promise<SampleRecord[]>;
    // Removes the sample together with its annotations.
    delete(id: number, options?: QueryOptions): Promise<boolean>;
}

export interface NewAnnotation {
    sampleId: number;
    authorId: number;
    annoType: AnnotationType;
    payload: string;
    version: number;
}

export interface AnnotationReview {
    status: AnnotationStatus.Approved | AnnotationStatus.Rejected;
    reviewedBy: number;
    reviewedAt: Date;
}

export interface AnnotationRepository {
    create(data: NewAnnotation, options?: QueryOptions): Promise<AnnotationRecord>;
    findById(id: number, options?: QueryOptions): Promise<AnnotationRecord | null>;
    // Highest version recorded for the sample, 0 when none.
    maxVersion(sampleId: number, options?: QueryOptions): Promise<number>;
    // Ascending version.
    listBySample(sampleId: number, options?: QueryOptions): Promise<AnnotationRecord[]>;
    // Applies the review only while the annotation is still submitted; null when it was not.
    reviewIfSubmitted(id: number, review: AnnotationReview, options?: QueryOptions): Promise<AnnotationRecord | null>;
}

export interface NewApproval {
    applicantId: number;
    resourceType: ResourceType;
    resourceId: number;
    purpose: string;
}

export interface ApprovalDecision {
    decision: Decision.Approved | Decision.Rejected;
    expiresAt: Date | null;
    reviewedBy: number;
    reviewedAt: Date;
}

export interface ApprovalRepository {
    create(data: NewApproval, options?: QueryOptions): Promise<ApprovalRecord>;
    findById(id: number, options?: QueryOptions): Promise<ApprovalRecord | null>;
    // Most recently created record for the triple, ties broken by the higher id.
    latestFor(applicantId: number, resourceType: ResourceType, resourceId: number, options?: QueryOptions): Promise<ApprovalRecord | null>;
    // Newest first.
    list(filter?: { decision?: Decision }, options?: QueryOptions): Promise<ApprovalRecord[]>;
    // Compare-and-set on decision = pending; null when another review got there first.
    decideIfPending(id: number, decision: ApprovalDecision, options?: QueryOptions): Promise<ApprovalRecord | null>;
}

export interface NewAuditEntry {
    actorId: number | null;
    action: string;
    resourceType: string | null;
    resourceId: number | null;
    ip: string | null;
    result: AuditResult;
    detail: string | null;
}

// Append-only: no update or delete is offered.
export interface AuditRepository {
    append(entry: NewAuditEntry, options?: QueryOptions): Promise<AuditLogRecord>;
    // Newest first.
    listRecent(limit: number, options?: QueryOptions): Promise<AuditLogRecord[]>;
}

export interface HealthProbe {
    ping(): Promise<boolean>;
}
