import { Harness, actorOf, createHarness, seedUser, TEST_NOW } from "./support/harness";
import { AnnotationStatus, AnnotationType, PublicUser, UserRole, Visibility } from "../src/types/domain";
import { ErrorStatus } from "../src/factory/status";

describe("Annotation Service Suite", () => {
  let h: Harness;
  let curator: PublicUser;
  let alice: PublicUser;
  let bob: PublicUser;

  const auditFor = (action: string) => h.db.tables.auditLogs.filter((entry) => entry.action === action);
  const annotate = (user: PublicUser, sampleId: number, payload = "{\"x\":1}") =>
    h.container.annotationService.create(actorOf(user), sampleId, { annoType: AnnotationType.Polygon, payload });

  beforeEach(async () => {
    h = await createHarness();
    curator = await seedUser(h, "curator", UserRole.DataAdmin);
    alice = await seedUser(h, "alice", UserRole.Researcher);
    bob = await seedUser(h, "bob", UserRole.Researcher);
    await h.container.datasetService.create(actorOf(alice), {
      name: "shared", description: null, version: null, visibility: Visibility.Group
    });
    await h.container.datasetService.create(actorOf(alice), {
      name: "secret", description: null, version: null, visibility: Visibility.Private
    });
    await h.container.sampleService.upload(actorOf(alice), 1, { originalName: "a.png", bytes: Buffer.from("a"), mime: null });
    await h.container.sampleService.upload(actorOf(alice), 2, { originalName: "b.png", bytes: Buffer.from("b"), mime: null });
  });

  afterEach(async () => {
    await h.cleanup();
  });

  describe("create", () => {
    it("should number versions per sample starting at 1", async () => {
      const first = await annotate(bob, 1);
      const second = await annotate(alice, 1);

      expect(first).toMatchObject({ version: 1, status: AnnotationStatus.Submitted, authorId: bob.id, payload: "{\"x\":1}" });
      expect(second.version).toBe(2);
      expect(auditFor("create_annotation")).toEqual([
        expect.objectContaining({ result: "ok", resourceType: "annotation", resourceId: first.id }),
        expect.objectContaining({ result: "ok", resourceType: "annotation", resourceId: second.id })
      ]);
    });

    it("should keep versions independent between samples", async () => {
      await annotate(alice, 1);
      const other = await annotate(alice, 2);
      expect(other.version).toBe(1);
    });

    it("should refuse annotating a sample the caller cannot see", async () => {
      await expect(annotate(bob, 2)).rejects.toMatchObject({ status: 403, reason: "not_visible" });
      expect(auditFor("create_annotation")).toEqual([
        expect.objectContaining({ result: "deny", resourceType: "sample", resourceId: 2, detail: "not_visible" })
      ]);
    });

    it("should report a version collision as a conflict", async () => {
      await annotate(bob, 1);
      jest.spyOn(h.container.repositories.annotations, "maxVersion").mockResolvedValue(0);

      await expect(annotate(bob, 1)).rejects.toMatchObject({ status: 409, errorType: ErrorStatus.conflict, reason: "version_conflict" });
      expect(h.db.tables.annotations).toHaveLength(1);
    });
  });

  it("should list a sample's annotations by ascending version", async () => {
    await annotate(bob, 1, "one");
    await annotate(bob, 1, "two");
    await annotate(bob, 1, "three");

    const listed = await h.container.annotationService.listBySample(actorOf(bob), 1);
    expect(listed.map((a) => [a.version, a.payload])).toEqual([[1, "one"], [2, "two"], [3, "three"]]);
  });

  describe("review", () => {
    it("should approve a submitted annotation once", async () => {
      const annotation = await annotate(bob, 1);

      const reviewed = await h.container.annotationService.review(actorOf(curator), annotation.id, AnnotationStatus.Approved);
      expect(reviewed).toMatchObject({ status: AnnotationStatus.Approved, reviewedBy: curator.id, reviewedAt: TEST_NOW });

      await expect(h.container.annotationService.review(actorOf(curator), annotation.id, AnnotationStatus.Rejected))
        .rejects.toMatchObject({ status: 400, errorType: ErrorStatus.invalidState, reason: "not_submitted" });
      expect(auditFor("review_annotation").map((entry) => [entry.result, entry.detail])).toEqual([
        ["ok", "approved"],
        ["deny", "not_submitted"]
      ]);
    });

    it("should report a missing annotation as not found", async () => {
      await expect(h.container.annotationService.review(actorOf(curator), 50, AnnotationStatus.Rejected))
        .rejects.toMatchObject({ status: 404, reason: "not_found" });
    });
  });
});
