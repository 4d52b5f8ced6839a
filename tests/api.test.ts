import AdmZip from "adm-zip";
import { Harness, RunningApi, createHarness, seedUser, startApi, tokenFor } from "./support/harness";
import { PublicUser, UserRole } from "../src/types/domain";
import { isRecord } from "../src/utils/requestBody";

const ABC_SHA256 = "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";

interface ApiResult {
  status: number;
  headers: Headers;
  body: unknown;
  raw: Buffer;
}

interface CallOptions {
  token?: string;
  json?: unknown;
  form?: FormData | URLSearchParams;
  headers?: Record<string, string>;
}

describe("HTTP API Suite", () => {
  let h: Harness;
  let api: RunningApi;
  let admin: PublicUser;
  let alice: PublicUser;
  let bob: PublicUser;

  async function call(method: string, path: string, options: CallOptions = {}): Promise<ApiResult> {
    const headers: Record<string, string> = { ...options.headers };
    if (options.token) {
      headers.authorization = `Bearer ${options.token}`;
    }
    let body: string | FormData | URLSearchParams | undefined = options.form;
    if (options.json !== undefined) {
      headers["content-type"] = "application/json";
      body = JSON.stringify(options.json);
    }

    const response = await fetch(`${api.baseUrl}${path}`, { method, headers, body });
    const raw = Buffer.from(await response.arrayBuffer());
    const isJson = (response.headers.get("content-type") ?? "").includes("application/json");
    return {
      status: response.status,
      headers: response.headers,
      body: isJson ? JSON.parse(raw.toString("utf8")) : null,
      raw
    };
  }

  function uploadForm(content: string, fileName: string): FormData {
    const form = new FormData();
    form.append("file", new Blob([content], { type: "image/png" }), fileName);
    return form;
  }

  beforeEach(async () => {
    h = await createHarness();
    api = await startApi(h);
    admin = await seedUser(h, "admin1", UserRole.Admin);
    alice = await seedUser(h, "alice", UserRole.Researcher);
    bob = await seedUser(h, "bob", UserRole.Researcher);
  });

  afterEach(async () => {
    await api.close();
    await h.cleanup();
  });

  describe("auth", () => {
    it("should register, log in with a form body and resolve the caller", async () => {
      const registered = await call("POST", "/auth/register", { json: { username: "carol", password: "secret-pass" } });
      expect(registered.status).toBe(201);
      expect(registered.body).toEqual({
        success: true,
        message: "User registered successfully",
        data: { id: 4, username: "carol", role: "researcher" }
      });

      const login = await call("POST", "/auth/login", {
        form: new URLSearchParams({ username: "carol", password: "secret-pass" })
      });
      expect(login.status).toBe(200);
      const data = isRecord(login.body) && isRecord(login.body.data) ? login.body.data : {};
      expect(data.token_type).toBe("bearer");
      expect(typeof data.access_token).toBe("string");

      const me = await call("GET", "/auth/me", { token: String(data.access_token) });
      expect(me.body).toEqual({
        success: true,
        message: "Current user",
        data: { id: 4, username: "carol", role: "researcher" }
      });
    });

    it("should refuse a duplicate username with 409", async () => {
      const result = await call("POST", "/auth/register", { json: { username: "alice", password: "secret-pass" } });
      expect(result.status).toBe(409);
      expect(result.body).toEqual({ success: false, message: "Username already registered" });
    });

    it("should refuse wrong credentials with 401", async () => {
      const result = await call("POST", "/auth/login", { json: { username: "alice", password: "nope-nope" } });
      expect(result.status).toBe(401);
      expect(result.body).toEqual({ success: false, message: "Incorrect username or password" });
    });

    it("should refuse requests without a bearer token", async () => {
      const result = await call("GET", "/datasets");
      expect(result.status).toBe(401);
      expect(result.body).toEqual({ success: false, message: "Not authenticated", reason: "missing_token" });
    });
  });

  describe("datasets and samples", () => {
    it("should create, upload into and hide a private dataset", async () => {
      const created = await call("POST", "/datasets", {
        token: tokenFor(h, alice),
        json: { name: "chest-ct", visibility: "private" }
      });
      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({
        success: true,
        data: { id: 1, name: "chest-ct", description: null, version: null, visibility: "private", createdBy: alice.id }
      });

      const uploaded = await call("POST", "/samples/upload/1", { token: tokenFor(h, alice), form: uploadForm("abc", "scan.png") });
      expect(uploaded.status).toBe(201);
      expect(uploaded.body).toMatchObject({ data: { id: 1, sha256: ABC_SHA256, path: "dataset_1/scan.png" } });

      const hidden = await call("GET", "/datasets/1", { token: tokenFor(h, bob) });
      expect(hidden.status).toBe(403);
      expect(hidden.body).toEqual({ success: false, message: "Dataset is private", reason: "not_visible" });

      const bobsList = await call("GET", "/datasets", { token: tokenFor(h, bob) });
      expect(bobsList.body).toMatchObject({ data: [] });
    });

    it("should refuse duplicate content and unsupported extensions", async () => {
      await call("POST", "/datasets", { token: tokenFor(h, alice), json: { name: "shared" } });
      await call("POST", "/samples/upload/1", { token: tokenFor(h, alice), form: uploadForm("abc", "scan.png") });

      const duplicate = await call("POST", "/samples/upload/1", { token: tokenFor(h, bob), form: uploadForm("abc", "other.png") });
      expect(duplicate.status).toBe(409);
      expect(duplicate.body).toEqual({ success: false, message: "Duplicate file (sha256 exists)" });

      const text = await call("POST", "/samples/upload/1", { token: tokenFor(h, bob), form: uploadForm("hello", "notes.txt") });
      expect(text.status).toBe(400);
      expect(text.body).toEqual({ success: false, message: "Unsupported file type; allowed: .jpg, .jpeg, .png, .tif, .tiff" });
    });

    it("should reject a malformed id before touching the store", async () => {
      const result = await call("GET", "/datasets/abc", { token: tokenFor(h, alice) });
      expect(result.status).toBe(400);
      expect(result.body).toEqual({ success: false, message: "Invalid id format" });
    });

    it("should reject an id beyond the row key range with 400", async () => {
      const result = await call("GET", "/datasets/9999999999", { token: tokenFor(h, alice) });
      expect(result.status).toBe(400);
      expect(result.body).toEqual({ success: false, message: "Invalid id format" });
    });

    it("should delete a dataset for its owner with 204", async () => {
      await call("POST", "/datasets", { token: tokenFor(h, alice), json: { name: "shared" } });

      const byBob = await call("DELETE", "/datasets/1", { token: tokenFor(h, bob) });
      expect(byBob.status).toBe(403);

      const byAlice = await call("DELETE", "/datasets/1", { token: tokenFor(h, alice) });
      expect(byAlice.status).toBe(204);
      expect((await call("GET", "/datasets/1", { token: tokenFor(h, alice) })).status).toBe(404);
    });
  });

  describe("approval-gated downloads", () => {
    beforeEach(async () => {
      await call("POST", "/datasets", { token: tokenFor(h, alice), json: { name: "chest-ct", visibility: "private" } });
      await call("POST", "/samples/upload/1", { token: tokenFor(h, alice), form: uploadForm("abc", "scan.png") });
    });

    it("should walk a request from denial through approval to expiry", async () => {
      const before = await call("GET", "/samples/1/download", { token: tokenFor(h, bob) });
      expect(before.status).toBe(403);
      expect(before.body).toEqual({ success: false, message: "No approval on record for this resource", reason: "no_approval" });

      const requested = await call("POST", "/approvals/request", {
        token: tokenFor(h, bob),
        json: { resourceType: "sample", resourceId: 1, purpose: "segmentation study" }
      });
      expect(requested.status).toBe(201);
      expect(requested.body).toMatchObject({ data: { id: 1, decision: "pending", applicantId: bob.id } });

      const pending = await call("GET", "/samples/1/download", { token: tokenFor(h, bob) });
      expect(pending.body).toMatchObject({ reason: "not_approved" });

      const selfReview = await call("POST", "/approvals/1/review", { token: tokenFor(h, bob), json: { decision: "approved" } });
      expect(selfReview.status).toBe(403);
      expect(selfReview.body).toEqual({ success: false, message: "Insufficient role", reason: "insufficient_role" });

      const reviewed = await call("POST", "/approvals/1/review", {
        token: tokenFor(h, admin),
        json: { decision: "approved", ttlMinutes: 60 }
      });
      expect(reviewed.status).toBe(200);
      expect(reviewed.body).toMatchObject({ data: { decision: "approved", expiresAt: "2024-03-01T11:00:00.000Z", reviewedBy: admin.id } });

      const granted = await call("GET", "/samples/1/download", { token: tokenFor(h, bob) });
      expect(granted.status).toBe(200);
      expect(granted.raw.toString("utf8")).toBe("abc");
      expect(granted.headers.get("content-disposition")).toBe("attachment; filename=\"scan.png\"");

      h.clock.advanceMinutes(60);
      const expired = await call("GET", "/samples/1/download", { token: tokenFor(h, bob) });
      expect(expired.status).toBe(403);
      expect(expired.body).toEqual({ success: false, message: "Approval has expired", reason: "approval_expired" });
    });

    it("should stream a dataset archive once approved", async () => {
      await call("POST", "/approvals/request", {
        token: tokenFor(h, bob),
        json: { resourceType: "dataset", resourceId: 1, purpose: "benchmarking" }
      });
      await call("POST", "/approvals/1/review", { token: tokenFor(h, admin), json: { decision: "approved" } });

      const archive = await call("GET", "/datasets/1/download", { token: tokenFor(h, bob) });
      expect(archive.status).toBe(200);
      expect(archive.headers.get("content-type")).toBe("application/zip");
      expect(archive.headers.get("content-disposition")).toBe("attachment; filename=\"dataset_1.zip\"");
      const entries = new AdmZip(archive.raw).getEntries().map((entry) => entry.entryName);
      expect(entries).toEqual(["scan.png"]);
    });

    it("should stream an empty archive for an approved dataset with no uploads", async () => {
      await call("POST", "/datasets", { token: tokenFor(h, alice), json: { name: "fresh" } });
      await call("POST", "/approvals/request", {
        token: tokenFor(h, bob),
        json: { resourceType: "dataset", resourceId: 2, purpose: "benchmarking" }
      });
      await call("POST", "/approvals/1/review", { token: tokenFor(h, admin), json: { decision: "approved" } });

      const archive = await call("GET", "/datasets/2/download", { token: tokenFor(h, bob) });
      expect(archive.status).toBe(200);
      expect(archive.headers.get("content-disposition")).toBe("attachment; filename=\"dataset_2.zip\"");
      expect(new AdmZip(archive.raw).getEntries()).toHaveLength(0);
    });

    it("should refuse an out-of-range resourceId with 400", async () => {
      const result = await call("POST", "/approvals/request", {
        token: tokenFor(h, bob),
        json: { resourceType: "dataset", resourceId: 3000000000, purpose: "benchmarking" }
      });
      expect(result.status).toBe(400);
      expect(result.body).toEqual({ success: false, message: "resourceId must be a positive integer" });
    });

    it("should refuse an oversized ttl and leave the approval pending", async () => {
      await call("POST", "/approvals/request", {
        token: tokenFor(h, bob),
        json: { resourceType: "sample", resourceId: 1, purpose: "study" }
      });

      const reviewed = await call("POST", "/approvals/1/review", {
        token: tokenFor(h, admin),
        json: { decision: "approved", ttlMinutes: 1e17 }
      });
      expect(reviewed.status).toBe(400);
      expect(reviewed.body).toEqual({ success: false, message: "ttlMinutes must not exceed 52560000" });

      const latest = await call("GET", "/approvals/my?resourceType=sample&resourceId=1", { token: tokenFor(h, bob) });
      expect(latest.body).toMatchObject({ data: { id: 1, decision: "pending", expiresAt: null } });
    });

    it("should refuse a second review with 400", async () => {
      await call("POST", "/approvals/request", {
        token: tokenFor(h, bob),
        json: { resourceType: "sample", resourceId: 1, purpose: "study" }
      });
      await call("POST", "/approvals/1/review", { token: tokenFor(h, admin), json: { decision: "rejected" } });

      const again = await call("POST", "/approvals/1/review", { token: tokenFor(h, admin), json: { decision: "approved" } });
      expect(again.status).toBe(400);
      expect(again.body).toEqual({ success: false, message: "Already reviewed", reason: "already_reviewed" });
    });

    it("should report the caller's latest approval or null", async () => {
      const none = await call("GET", "/approvals/my?resourceType=sample&resourceId=1", { token: tokenFor(h, bob) });
      expect(none.body).toEqual({ success: true, message: "No approval on record", data: null });

      await call("POST", "/approvals/request", {
        token: tokenFor(h, bob),
        json: { resourceType: "sample", resourceId: 1, purpose: "study" }
      });
      const latest = await call("GET", "/approvals/my?resourceType=sample&resourceId=1", { token: tokenFor(h, bob) });
      expect(latest.body).toMatchObject({ success: true, data: { id: 1, decision: "pending" } });
    });

    it("should list approvals and audit entries for privileged roles only", async () => {
      await call("POST", "/approvals/request", {
        token: tokenFor(h, bob),
        json: { resourceType: "sample", resourceId: 1, purpose: "study" }
      });

      const forbidden = await call("GET", "/audit-logs", { token: tokenFor(h, bob) });
      expect(forbidden.status).toBe(403);

      const approvals = await call("GET", "/approvals?decision=pending", { token: tokenFor(h, admin) });
      expect(approvals.body).toMatchObject({ data: [{ id: 1, decision: "pending" }] });

      const logs = await call("GET", "/audit-logs", { token: tokenFor(h, admin) });
      expect(logs.status).toBe(200);
      expect(logs.body).toMatchObject({
        data: [
          { action: "list_approvals", result: "ok", actorId: admin.id },
          { action: "list_audit_logs", result: "deny", actorId: bob.id, detail: "insufficient_role" },
          { action: "request_approval", result: "ok", actorId: bob.id, detail: "approval:1" },
          { action: "upload_sample", result: "ok", actorId: alice.id },
          { action: "create_dataset", result: "ok", actorId: alice.id }
        ]
      });
    });
  });

  describe("annotations", () => {
    it("should version annotations and let a curator review them", async () => {
      const curator = await seedUser(h, "curator", UserRole.DataAdmin);
      await call("POST", "/datasets", { token: tokenFor(h, alice), json: { name: "shared" } });
      await call("POST", "/samples/upload/1", { token: tokenFor(h, alice), form: uploadForm("abc", "scan.png") });

      const first = await call("POST", "/annotations/1", {
        token: tokenFor(h, bob),
        json: { annoType: "bbox", payload: { x: 1, y: 2, w: 3, h: 4 } }
      });
      expect(first.status).toBe(201);
      expect(first.body).toMatchObject({ data: { id: 1, version: 1, status: "submitted", payload: "{\"x\":1,\"y\":2,\"w\":3,\"h\":4}" } });

      await call("POST", "/annotations/1", { token: tokenFor(h, alice), json: { annoType: "tag", payload: "nodule" } });

      const listed = await call("GET", "/annotations/by-sample/1", { token: tokenFor(h, bob) });
      expect(listed.body).toMatchObject({ data: [{ version: 1 }, { version: 2 }] });

      const byResearcher = await call("POST", "/annotations/1/approve", { token: tokenFor(h, bob) });
      expect(byResearcher.status).toBe(403);

      const approved = await call("POST", "/annotations/1/approve", { token: tokenFor(h, curator) });
      expect(approved.body).toMatchObject({ message: "Annotation approved", data: { status: "approved", reviewedBy: curator.id } });

      const again = await call("POST", "/annotations/1/reject", { token: tokenFor(h, curator) });
      expect(again.status).toBe(400);
      expect(again.body).toMatchObject({ reason: "not_submitted" });
    });
  });

  describe("service endpoints", () => {
    it("should report health with the database flag", async () => {
      expect((await call("GET", "/health")).body).toEqual({ ok: true, db: true });
      h.healthy.db = false;
      expect((await call("GET", "/health")).body).toEqual({ ok: true, db: false });
    });

    it("should answer unknown routes with a 404 envelope", async () => {
      const result = await call("GET", "/nowhere");
      expect(result.status).toBe(404);
      expect(result.body).toEqual({ success: false, message: "Route not found: GET /nowhere" });
    });
  });
});
