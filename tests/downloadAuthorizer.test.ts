import fs from "fs/promises";
import path from "path";
import { Harness, actorOf, createHarness, seedUser } from "./support/harness";
import { PublicUser, ResourceType, UserRole, Visibility } from "../src/types/domain";
import { ErrorStatus } from "../src/factory/status";

describe("Download Authorizer Suite", () => {
  let h: Harness;
  let admin: PublicUser;
  let alice: PublicUser;
  let bob: PublicUser;
  let datasetId: number;
  let sampleId: number;

  const downloadAudits = () => h.db.tables.auditLogs.filter((entry) => entry.action.startsWith("download_"));

  async function grant(user: PublicUser, resourceType: ResourceType, resourceId: number, decision: string, ttlMinutes?: number) {
    const approval = await h.container.approvalService.request(actorOf(user), { resourceType, resourceId, purpose: "study" });
    return h.container.approvalService.review(actorOf(admin), approval.id, { decision, ttlMinutes });
  }

  beforeEach(async () => {
    h = await createHarness();
    admin = await seedUser(h, "admin1", UserRole.Admin);
    alice = await seedUser(h, "alice", UserRole.Researcher);
    bob = await seedUser(h, "bob", UserRole.Researcher);

    const dataset = await h.container.datasetService.create(actorOf(alice), {
      name: "chest-ct",
      description: null,
      version: null,
      visibility: Visibility.Private
    });
    datasetId = dataset.id;
    const uploaded = await h.container.sampleService.upload(actorOf(alice), datasetId, {
      originalName: "scan.png",
      bytes: Buffer.from("abc"),
      mime: "image/png"
    });
    sampleId = uploaded.id;
  });

  afterEach(async () => {
    await h.cleanup();
  });

  it("should report a missing resource before looking at approvals", async () => {
    const decision = await h.container.downloadAuthorizer.authorize(actorOf(bob), ResourceType.Sample, 999);

    expect(decision).toEqual({ granted: false, reason: "not_found" });
    expect(downloadAudits()).toEqual([
      expect.objectContaining({ action: "download_sample", actorId: bob.id, result: "deny", resourceId: 999, detail: "not_found" })
    ]);
  });

  it("should deny when the user holds no approval", async () => {
    await grant(alice, ResourceType.Sample, sampleId, "approved");

    const decision = await h.container.downloadAuthorizer.authorize(actorOf(bob), ResourceType.Sample, sampleId);
    expect(decision).toEqual({ granted: false, reason: "no_approval" });
  });

  it("should deny a pending or rejected latest approval", async () => {
    await h.container.approvalService.request(actorOf(bob), { resourceType: ResourceType.Sample, resourceId: sampleId, purpose: "study" });
    expect(await h.container.downloadAuthorizer.authorize(actorOf(bob), ResourceType.Sample, sampleId))
      .toEqual({ granted: false, reason: "not_approved" });

    h.clock.advanceMinutes(1);
    await grant(bob, ResourceType.Sample, sampleId, "rejected");
    expect(await h.container.downloadAuthorizer.authorize(actorOf(bob), ResourceType.Sample, sampleId))
      .toEqual({ granted: false, reason: "not_approved" });
  });

  it("should grant a sample download on an approval without expiry, ignoring visibility", async () => {
    await grant(bob, ResourceType.Sample, sampleId, "approved");

    const decision = await h.container.downloadAuthorizer.authorize(actorOf(bob), ResourceType.Sample, sampleId);

    expect(decision).toEqual({
      granted: true,
      grant: {
        kind: ResourceType.Sample,
        sampleId,
        absolutePath: path.join(h.storage.getRoot(), "dataset_1", "scan.png"),
        fileName: "scan.png",
        mime: "image/png"
      }
    });
    expect(downloadAudits()).toEqual([
      expect.objectContaining({ action: "download_sample", result: "ok", resourceType: "sample", resourceId: sampleId, detail: null })
    ]);
  });

  it("should honour the expiry instant strictly", async () => {
    await grant(bob, ResourceType.Sample, sampleId, "approved", 30);

    h.clock.advanceMinutes(29);
    expect((await h.container.downloadAuthorizer.authorize(actorOf(bob), ResourceType.Sample, sampleId)).granted).toBe(true);

    h.clock.advanceMinutes(1);
    expect(await h.container.downloadAuthorizer.authorize(actorOf(bob), ResourceType.Sample, sampleId))
      .toEqual({ granted: false, reason: "approval_expired" });
  });

  it("should read a zone-less stored expiry as UTC", async () => {
    await grant(bob, ResourceType.Sample, sampleId, "approved");
    h.db.tables.approvals[0].expiresAt = "2024-03-01 10:30:00";

    expect((await h.container.downloadAuthorizer.authorize(actorOf(bob), ResourceType.Sample, sampleId)).granted).toBe(true);

    h.clock.advanceMinutes(31);
    expect(await h.container.downloadAuthorizer.authorize(actorOf(bob), ResourceType.Sample, sampleId))
      .toEqual({ granted: false, reason: "approval_expired" });
  });

  it("should let a newer pending request supersede an earlier grant", async () => {
    await grant(bob, ResourceType.Sample, sampleId, "approved");
    h.clock.advanceMinutes(1);
    await h.container.approvalService.request(actorOf(bob), { resourceType: ResourceType.Sample, resourceId: sampleId, purpose: "again" });

    expect(await h.container.downloadAuthorizer.authorize(actorOf(bob), ResourceType.Sample, sampleId))
      .toEqual({ granted: false, reason: "not_approved" });
  });

  it("should audit a missing stored file as an error", async () => {
    await grant(bob, ResourceType.Sample, sampleId, "approved");
    await fs.rm(path.join(h.storage.getRoot(), "dataset_1", "scan.png"));

    expect(await h.container.downloadAuthorizer.authorize(actorOf(bob), ResourceType.Sample, sampleId))
      .toEqual({ granted: false, reason: "storage_missing" });
    expect(downloadAudits()).toEqual([
      expect.objectContaining({ result: "error", detail: "storage_missing" })
    ]);
  });

  it("should grant a dataset archive named after the dataset id", async () => {
    await grant(bob, ResourceType.Dataset, datasetId, "approved", 60);

    expect(await h.container.downloadAuthorizer.authorize(actorOf(bob), ResourceType.Dataset, datasetId)).toEqual({
      granted: true,
      grant: { kind: ResourceType.Dataset, datasetId, archiveName: "dataset_1.zip" }
    });
  });

  it("should grant an approved dataset that has no uploads yet", async () => {
    const empty = await h.container.datasetService.create(actorOf(alice), {
      name: "empty", description: null, version: null, visibility: Visibility.Group
    });
    await grant(bob, ResourceType.Dataset, empty.id, "approved");

    expect(await h.container.downloadAuthorizer.authorize(actorOf(bob), ResourceType.Dataset, empty.id)).toEqual({
      granted: true,
      grant: { kind: ResourceType.Dataset, datasetId: empty.id, archiveName: `dataset_${empty.id}.zip` }
    });
    expect(downloadAudits()).toEqual([
      expect.objectContaining({ action: "download_dataset", result: "ok", resourceId: empty.id, detail: null })
    ]);
  });

  describe("authorizeOrThrow", () => {
    it("should map approval denials to 403 with the reason", async () => {
      await expect(h.container.downloadAuthorizer.authorizeOrThrow(actorOf(bob), ResourceType.Dataset, datasetId))
        .rejects.toMatchObject({ status: 403, errorType: ErrorStatus.downloadDenied, reason: "no_approval" });
    });

    it("should map a missing resource to 404", async () => {
      await expect(h.container.downloadAuthorizer.authorizeOrThrow(actorOf(bob), ResourceType.Dataset, 77))
        .rejects.toMatchObject({ status: 404, reason: "not_found", message: "Dataset not found" });
    });

    it("should map a missing file to 500", async () => {
      await grant(bob, ResourceType.Sample, sampleId, "approved");
      await fs.rm(path.join(h.storage.getRoot(), "dataset_1", "scan.png"));

      await expect(h.container.downloadAuthorizer.authorizeOrThrow(actorOf(bob), ResourceType.Sample, sampleId))
        .rejects.toMatchObject({ status: 500, errorType: ErrorStatus.storageFault, reason: "storage_missing" });
    });

    it("should append exactly one audit entry per call", async () => {
      await h.container.downloadAuthorizer.authorizeOrThrow(actorOf(bob), ResourceType.Dataset, datasetId).catch(() => undefined);
      expect(downloadAudits()).toHaveLength(1);
    });
  });
});
