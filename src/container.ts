import { Settings } from "./config/settings";
import {
    AnnotationRepository,
    ApprovalRepository,
    AuditRepository,
    DatasetRepository,
    HealthProbe,
    SampleRepository,
    TransactionRunner,
    UserRepository
} from "./repository/types";
import { FileStorage } from "./utils/fileStorage";
import { Clock, systemClock } from "./utils/time";
import { AuditRecorder } from "./services/auditRecorder";
import { CredentialService } from "./services/credentialService";
import { AuthService } from "./services/authService";
import { DatasetService } from "./services/datasetService";
import { SampleService } from "./services/sampleService";
import { AnnotationService } from "./services/annotationService";
import { ApprovalService } from "./services/approvalService";
import { DownloadAuthorizer } from "./services/downloadAuthorizer";
import { AuditLogService } from "./services/auditLogService";
import { AdminInitService } from "./services/adminInitService";

export interface Repositories {
    users: UserRepository;
    datasets: DatasetRepository;
    samples: SampleRepository;
    annotations: AnnotationRepository;
    approvals: ApprovalRepository;
    audit: AuditRepository;
}

export interface ContainerParts {
    settings: Settings;
    repositories: Repositories;
    transactions: TransactionRunner;
    storage: FileStorage;
    healthProbe: HealthProbe;
    clock?: Clock;
    credentials?: CredentialService;
}

export interface AppContainer {
    settings: Settings;
    clock: Clock;
    repositories: Repositories;
    storage: FileStorage;
    healthProbe: HealthProbe;
    audit: AuditRecorder;
    credentials: CredentialService;
    authService: AuthService;
    datasetService: DatasetService;
    sampleService: SampleService;
    annotationService: AnnotationService;
    approvalService: ApprovalService;
    downloadAuthorizer: DownloadAuthorizer;
    auditLogService: AuditLogService;
    adminInitService: AdminInitService;
}

// Wires services over whichever repositories and storage the caller supplies.
export function buildContainer(parts: ContainerParts): AppContainer {
    const { settings, repositories, transactions, storage, healthProbe } = parts;
    const clock = parts.clock ?? systemClock;
    const credentials = parts.credentials ?? new CredentialService(settings);
    const audit = new AuditRecorder(repositories.audit);

    const datasetService = new DatasetService(repositories.datasets, transactions, storage, audit);
    const sampleService = new SampleService(
        repositories.samples,
        repositories.datasets,
        datasetService,
        transactions,
        storage,
        audit
    );

    return {
        settings,
        clock,
        repositories,
        storage,
        healthProbe,
        audit,
        credentials,
        authService: new AuthService(repositories.users, credentials, audit),
        datasetService,
        sampleService,
        annotationService: new AnnotationService(repositories.annotations, sampleService, transactions, audit, clock),
        approvalService: new ApprovalService(repositories.approvals, transactions, audit, clock),
        downloadAuthorizer: new DownloadAuthorizer(
            repositories.datasets,
            repositories.samples,
            repositories.approvals,
            storage,
            audit,
            clock
        ),
        auditLogService: new AuditLogService(repositories.audit, audit),
        adminInitService: new AdminInitService(repositories.users, credentials)
    };
}
