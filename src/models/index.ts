// Import all model classes
import { User } from "./User";
import { Dataset } from "./Dataset";
import { Sample } from "./Sample";
import { Annotation } from "./Annotation";
import { Approval } from "./Approval";
import { AuditLog } from "./AuditLog";

// Initialize all models
User.initialize();
Dataset.initialize();
Sample.initialize();
Annotation.initialize();
Approval.initialize();
AuditLog.initialize();

// A dataset owns its samples; deleting it removes them in the database.
Dataset.hasMany(Sample, {
    foreignKey: "datasetId",
    as: "samples",
    onDelete: "CASCADE",
    hooks: true
});
Sample.belongsTo(Dataset, {
    foreignKey: "datasetId",
    as: "dataset",
    onDelete: "CASCADE"
});

// A sample owns its annotations.
Sample.hasMany(Annotation, {
    foreignKey: "sampleId",
    as: "annotations",
    onDelete: "CASCADE",
    hooks: true
});
Annotation.belongsTo(Sample, {
    foreignKey: "sampleId",
    as: "sample",
    onDelete: "CASCADE"
});

User.hasMany(Dataset, { foreignKey: "createdBy", as: "datasets" });
Dataset.belongsTo(User, { foreignKey: "createdBy", as: "creator" });

User.hasMany(Sample, { foreignKey: "createdBy", as: "samples" });
Sample.belongsTo(User, { foreignKey: "createdBy", as: "creator" });

User.hasMany(Annotation, { foreignKey: "authorId", as: "annotations" });
Annotation.belongsTo(User, { foreignKey: "authorId", as: "author" });

User.hasMany(Approval, { foreignKey: "applicantId", as: "approvals" });
Approval.belongsTo(User, { foreignKey: "applicantId", as: "applicant" });

// Export all models
export {
    User,
    Dataset,
    Sample,
    Annotation,
    Approval,
    AuditLog
};
