import fs from "fs/promises";
import path from "path";
import { Harness, actorOf, createHarness, seedUser } from "./support/harness";
import { AnnotationType, PublicUser, UserRole, Visibility } from "../src/types/domain";
import { ErrorStatus } from "../src/factory/status";

const ABC_SHA256 = "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";

describe("Sample Service Suite", () => {
  let h: Harness;
  let alice: PublicUser;
  let bob: PublicUser;
  let carol: PublicUser;

  const auditFor = (action: string) => h.db.tables.auditLogs.filter((entry) => entry.action === action);
  const upload = (user: PublicUser, datasetId: number, content: string, originalName = "scan.png") =>
    h.container.sampleService.upload(actorOf(user), datasetId, {
      originalName,
      bytes: Buffer.from(content),
      mime: "image/png"
    });

  beforeEach(async () => {
    h = await createHarness();
    alice = await seedUser(h, "alice", UserRole.Researcher);
    bob = await seedUser(h, "bob", UserRole.Researcher);
    carol = await seedUser(h, "carol", UserRole.Researcher);
    await h.container.datasetService.create(actorOf(alice), {
      name: "shared", description: null, version: null, visibility: Visibility.Group
    });
    await h.container.datasetService.create(actorOf(alice), {
      name: "secret", description: null, version: null, visibility: Visibility.Private
    });
  });

  afterEach(async () => {
    await h.cleanup();
  });

  describe("upload", () => {
    it("should store the file and return id, checksum and relative path", async () => {
      const result = await upload(bob, 1, "abc");

      expect(result).toEqual({ id: 1, sha256: ABC_SHA256, path: "dataset_1/scan.png" });
      expect(await fs.readFile(path.join(h.storage.getRoot(), "dataset_1", "scan.png"), "utf8")).toBe("abc");
      expect(h.db.tables.samples[0]).toMatchObject({ datasetId: 1, createdBy: bob.id, mime: "image/png" });
      expect(auditFor("upload_sample")).toEqual([
        expect.objectContaining({ result: "ok", resourceType: "sample", resourceId: 1 })
      ]);
    });

    it("should refuse identical content anywhere in the repository", async () => {
      await upload(bob, 1, "abc");

      await expect(upload(alice, 2, "abc", "copy.png"))
        .rejects.toMatchObject({ status: 409, errorType: ErrorStatus.checksumDuplicate });
      expect(await h.storage.datasetDirExists(2)).toBe(false);
      expect(auditFor("upload_sample").map((entry) => entry.detail)).toEqual([null, "checksum_duplicate"]);
    });

    it("should discard the written file when the insert hits the checksum constraint", async () => {
      await upload(bob, 1, "abc");
      jest.spyOn(h.container.repositories.samples, "findBySha256").mockResolvedValue(null);

      await expect(upload(bob, 1, "abc")).rejects.toMatchObject({ status: 409 });
      await expect(fs.access(path.join(h.storage.getRoot(), "dataset_1", "ba7816bf8f01_scan.png"))).rejects.toThrow();
      expect(h.db.tables.samples).toHaveLength(1);
    });

    it("should refuse uploads into a private dataset of another user", async () => {
      await expect(upload(bob, 2, "abc")).rejects.toMatchObject({ status: 403, reason: "not_visible" });
      expect(auditFor("upload_sample")).toEqual([
        expect.objectContaining({ actorId: bob.id, result: "deny", resourceType: "dataset", resourceId: 2, detail: "not_visible" })
      ]);
    });

    it("should report an unknown dataset as not found", async () => {
      await expect(upload(bob, 9, "abc")).rejects.toMatchObject({ status: 404 });
    });
  });

  describe("visibility", () => {
    it("should let the uploader see a sample in a private dataset they do not own", async () => {
      await upload(alice, 2, "abc");
      h.db.tables.samples[0].createdBy = carol.id;

      await expect(h.container.sampleService.get(actorOf(carol), 1)).resolves.toMatchObject({ id: 1 });
      await expect(h.container.sampleService.get(actorOf(bob), 1)).rejects.toMatchObject({ status: 403 });
    });

    it("should list visible samples newest first", async () => {
      await upload(bob, 1, "first", "a.png");
      h.clock.advanceMinutes(1);
      await upload(alice, 2, "second", "b.png");
      h.clock.advanceMinutes(1);
      await upload(bob, 1, "third", "c.png");

      const forBob = await h.container.sampleService.listVisible(bob);
      expect(forBob.map((sample) => sample.id)).toEqual([3, 1]);

      const byDataset = await h.container.sampleService.listByDataset(actorOf(bob), 1);
      expect(byDataset.map((sample) => sample.filePath)).toEqual(["dataset_1/c.png", "dataset_1/a.png"]);
    });

    it("should refuse listing samples of a dataset the caller cannot see", async () => {
      await expect(h.container.sampleService.listByDataset(actorOf(bob), 2)).rejects.toMatchObject({ status: 403 });
    });
  });

  describe("delete", () => {
    it("should refuse a researcher who did not upload the sample", async () => {
      await upload(bob, 1, "abc");
      await expect(h.container.sampleService.delete(actorOf(carol), 1))
        .rejects.toMatchObject({ status: 403, reason: "not_owner" });
    });

    it("should remove the record, its annotations and its file", async () => {
      await upload(bob, 1, "abc");
      await h.container.annotationService.create(actorOf(carol), 1, { annoType: AnnotationType.Bbox, payload: "[1,2,3,4]" });

      await h.container.sampleService.delete(actorOf(bob), 1);

      expect(h.db.tables.samples).toEqual([]);
      expect(h.db.tables.annotations).toEqual([]);
      await expect(fs.access(path.join(h.storage.getRoot(), "dataset_1", "scan.png"))).rejects.toThrow();
      expect(auditFor("delete_sample")).toEqual([expect.objectContaining({ result: "ok", resourceId: 1 })]);
    });
  });
});
