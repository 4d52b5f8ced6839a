import { DatasetRecord, PublicUser, SampleRecord, UserRole, Visibility } from "../types/domain";

type Viewer = Pick<PublicUser, "id" | "role">;

// The one place role lists live; every gate asks this.
export function isPrivileged(role: UserRole): boolean {
    return role === UserRole.Admin || role === UserRole.DataAdmin;
}

export function canViewDataset(user: Viewer, dataset: Pick<DatasetRecord, "visibility" | "createdBy">): boolean {
    return isPrivileged(user.role)
        || dataset.visibility === Visibility.Group
        || dataset.createdBy === user.id;
}

export function canViewSample(
    user: Viewer,
    sample: Pick<SampleRecord, "createdBy">,
    parent: Pick<DatasetRecord, "visibility" | "createdBy">
): boolean {
    return isPrivileged(user.role)
        || parent.visibility === Visibility.Group
        || parent.createdBy === user.id
        || sample.createdBy === user.id;
}

export function canDelete(user: Viewer, resource: { createdBy: number }): boolean {
    return isPrivileged(user.role) || resource.createdBy === user.id;
}
