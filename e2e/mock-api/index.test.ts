import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import { createApp, type MockJiraApi } from "./index.js";

// ── Helpers ───────────────────────────────────────────────────────────────────

const AUTH = `Basic ${Buffer.from("test@example.com:test-token").toString("base64")}`;
const API = "/rest/api/3";

// ── Tests ─────────────────────────────────────────────────────────────────────

describe("mock Jira API", () => {
  let api: MockJiraApi;

  beforeEach(() => {
    api = createApp();
  });

  // ── GET /health ──────────────────────────────────────────────────────────────

  describe("GET /health", () => {
    it("returns 200 with status ok without credentials", async () => {
      // Act
      const res = await request(api.app).get("/health");

      // Assert
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: "ok" });
    });
  });

  // ── Authentication ───────────────────────────────────────────────────────────

  describe("authentication", () => {
    it("returns 401 without an Authorization header", async () => {
      // Act
      const res = await request(api.app).get(`${API}/project`);

      // Assert
      expect(res.status).toBe(401);
      expect(res.body.errorMessages).toEqual(["Client must be authenticated to access this resource."]);
    });

    it("accepts custom credentials", async () => {
      // Arrange
      const custom = createApp({ username: "bot@example.com", apiToken: "test-secret" });
      const auth = `Basic ${Buffer.from("bot@example.com:test-secret").toString("base64")}`;

      // Act
      const res = await request(custom.app).get(`${API}/project`).set("Authorization", auth);

      // Assert
      expect(res.status).toBe(200);
    });

    it("records rejected calls too", async () => {
      // Act
      await request(api.app).get(`${API}/issue/TEST-1`);

      // Assert
      expect(api.getCalls()).toHaveLength(1);
      expect(api.getCalls()[0]).toMatchObject({ method: "GET", path: `${API}/issue/TEST-1` });
    });
  });

  // ── Issues ───────────────────────────────────────────────────────────────────

  describe("issues", () => {
    it("returns the seeded issue", async () => {
      // Act
      const res = await request(api.app).get(`${API}/issue/TEST-1`).set("Authorization", AUTH);

      // Assert
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id: "10001", key: "TEST-1", fields: { summary: "Seeded issue" } });
    });

    it("returns 404 for an unknown issue", async () => {
      // Act
      const res = await request(api.app).get(`${API}/issue/NOPE-1`).set("Authorization", AUTH);

      // Assert
      expect(res.status).toBe(404);
      expect(res.body).toEqual({
        errorMessages: ["Issue does not exist or you do not have permission to see it."],
        errors: {},
      });
    });

    it("creates issues with sequential keys", async () => {
      // Act
      const res = await request(api.app)
        .post(`${API}/issue`)
        .set("Authorization", AUTH)
        .send({ fields: { project: { key: "OPS" }, summary: "New", issuetype: { name: "Task" } } });

      // Assert
      expect(res.status).toBe(201);
      expect(res.body).toEqual({ id: "10002", key: "OPS-2", self: `${API}/issue/10002` });
      expect(api.getIssue("OPS-2")?.fields).toMatchObject({ summary: "New", status: { name: "To Do" } });
    });

    it("rejects an issue without summary", async () => {
      // Act
      const res = await request(api.app)
        .post(`${API}/issue`)
        .set("Authorization", AUTH)
        .send({ fields: { project: { key: "TEST" } } });

      // Assert
      expect(res.status).toBe(400);
      expect(res.body.errors).toEqual({ summary: "You must specify a summary of the issue." });
    });

    it("merges updated fields and answers 204", async () => {
      // Act
      const res = await request(api.app)
        .put(`${API}/issue/TEST-1`)
        .set("Authorization", AUTH)
        .send({ fields: { summary: "Renamed" } });

      // Assert
      expect(res.status).toBe(204);
      expect(api.getIssue("TEST-1")?.fields).toMatchObject({ summary: "Renamed", status: { name: "To Do" } });
    });
  });

  // ── Search ───────────────────────────────────────────────────────────────────

  describe("GET /search", () => {
    it("filters by project and honours maxResults", async () => {
      // Act
      const res = await request(api.app)
        .get(`${API}/search`)
        .query({ jql: "project = TEST", maxResults: "10" })
        .set("Authorization", AUTH);

      // Assert
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ startAt: 0, maxResults: 10, total: 1 });
      expect(res.body.issues[0].key).toBe("TEST-1");
    });
  });

  // ── Comments ─────────────────────────────────────────────────────────────────

  describe("comments", () => {
    it("adds a comment and pages through comments", async () => {
      // Arrange
      const body = { type: "doc", version: 1, content: [] };
      await request(api.app).post(`${API}/issue/TEST-1/comment`).set("Authorization", AUTH).send({ body });
      await request(api.app).post(`${API}/issue/TEST-1/comment`).set("Authorization", AUTH).send({ body });

      // Act
      const res = await request(api.app)
        .get(`${API}/issue/TEST-1/comment`)
        .query({ startAt: "0", maxResults: "1" })
        .set("Authorization", AUTH);

      // Assert
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ startAt: 0, maxResults: 1, total: 2, isLast: false });
      expect(res.body.values).toHaveLength(1);
      expect(res.body.values[0].id).toBe("10000");
    });

    it("rejects a comment without an ADF body", async () => {
      // Act
      const res = await request(api.app)
        .post(`${API}/issue/TEST-1/comment`)
        .set("Authorization", AUTH)
        .send({ body: "plain text" });

      // Assert
      expect(res.status).toBe(400);
    });
  });

  // ── Projects and transitions ─────────────────────────────────────────────────

  describe("projects and transitions", () => {
    it("lists projects", async () => {
      // Act
      const res = await request(api.app).get(`${API}/project`).set("Authorization", AUTH);

      // Assert
      expect(res.body.map((p: { key: string }) => p.key)).toEqual(["TEST", "OPS"]);
    });

    it("lists transitions", async () => {
      // Act
      const res = await request(api.app).get(`${API}/issue/TEST-1/transitions`).set("Authorization", AUTH);

      // Assert
      expect(res.body.transitions.map((t: { id: string }) => t.id)).toEqual(["11", "21", "31"]);
    });

    it("applies a valid transition", async () => {
      // Act
      const res = await request(api.app)
        .post(`${API}/issue/TEST-1/transitions`)
        .set("Authorization", AUTH)
        .send({ transition: { id: "21" } });

      // Assert
      expect(res.status).toBe(204);
      expect(api.getIssue("TEST-1")?.fields.status).toEqual({ name: "In Progress" });
    });

    it("rejects an unknown transition", async () => {
      // Act
      const res = await request(api.app)
        .post(`${API}/issue/TEST-1/transitions`)
        .set("Authorization", AUTH)
        .send({ transition: { id: "999" } });

      // Assert
      expect(res.status).toBe(400);
      expect(res.body.errorMessages).toEqual(["Transition id '999' is not valid for this issue."]);
    });
  });
});
