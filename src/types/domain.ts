// Roles a persisted user can hold.
export enum UserRole {
    Admin = "admin",
    DataAdmin = "data_admin",
    Researcher = "researcher"
}

export enum Visibility {
    Group = "group",
    Private = "private"
}

// Resource kinds an approval or a download can target.
export enum ResourceType {
    Dataset = "dataset",
    Sample = "sample"
}

// Audited records that are never approval targets.
export enum AuditTarget {
    User = "user",
    Annotation = "annotation",
    Approval = "approval"
}

export enum Decision {
    Pending = "pending",
    Approved = "approved",
    Rejected = "rejected"
}

export enum AnnotationType {
    Bbox = "bbox",
    Polygon = "polygon",
    Brush = "brush",
    Tag = "tag"
}

export enum AnnotationStatus {
    Submitted = "submitted",
    Approved = "approved",
    Rejected = "rejected"
}

export enum AuditResult {
    Ok = "ok",
    Deny = "deny",
    Error = "error"
}

// Fixed vocabulary of audited actions.
export const AUDIT_ACTIONS = [
    "register",
    "login",
    "create_dataset",
    "view_dataset",
    "delete_dataset",
    "download_dataset",
    "upload_sample",
    "view_sample",
    "delete_sample",
    "download_sample",
    "create_annotation",
    "review_annotation",
    "request_approval",
    "review_approval",
    "list_approvals",
    "list_audit_logs"
] as const;

export type AuditAction = typeof AUDIT_ACTIONS[number];

// Timestamps read back from persistence may arrive without a zone designator.
export type StoredInstant = Date | string;

export interface UserRecord {
    id: number;
    username: string;
    passwordHash: string;
    role: UserRole;
    createdAt: Date;
}

export type PublicUser = Pick<UserRecord, "id" | "username" | "role">;

export interface DatasetRecord {
    id: number;
    name: string;
    description: string | null;
    version: string | null;
    visibility: Visibility;
    createdBy: number;
    createdAt: Date;
}

export interface SampleRecord {
    id: number;
    datasetId: number;
    filePath: string;
    sha256: string;
    mime: string | null;
    createdBy: number;
    createdAt: Date;
}

export interface AnnotationRecord {
    id: number;
    sampleId: number;
    authorId: number;
    annoType: AnnotationType;
    payload: string;
    status: AnnotationStatus;
    version: number;
    reviewedBy: number | null;
    reviewedAt: Date | null;
    createdAt: Date;
}

export interface ApprovalRecord {
    id: number;
    applicantId: number;
    resourceType: ResourceType;
    resourceId: number;
    purpose: string;
    decision: Decision;
    expiresAt: StoredInstant | null;
    reviewedBy: number | null;
    reviewedAt: Date | null;
    createdAt: Date;
}

export interface AuditLogRecord {
    id: number;
    actorId: number | null;
    action: string;
    resourceType: string | null;
    resourceId: number | null;
    ip: string | null;
    result: AuditResult;
    detail: string | null;
    createdAt: Date;
}

// Narrows an untrusted value to a member of a string enum.
export function isEnumValue<T extends Record<string, string>>(enumObject: T, value: unknown): value is T[keyof T] {
    return typeof value === "string" && Object.values(enumObject).includes(value);
}

export function toPublicUser(user: UserRecord): PublicUser {
    return { id: user.id, username: user.username, role: user.role };
}
