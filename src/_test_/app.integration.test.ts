// src/_test_/app.integration.test.ts
// Cross-cutting HTTP behaviour: health, subjects, correlation ids, fallbacks.

import request from "supertest";
import { describe, it, beforeEach, expect } from "vitest";
import type { Express } from "express";
import { createApp } from "@/app";
import { buildHarness } from "./fixtures";

describe("App", () => {
  let app: Express;

  beforeEach(() => {
    const h = buildHarness();
    app = createApp({
      config: {
        corsOrigin: "http://localhost:3000",
        maxUploadBytes: 1024,
        mode: "MOCK",
        nodeEnv: "test",
      },
      pipeline: h.pipeline,
      subjects: h.subjects,
    });
  });

  it("reports health", async () => {
    const res = await request(app).get("/api/health").expect(200);

    expect(res.body).toMatchObject({
      ok: true,
      status: "online",
      mode: "MOCK",
      env: "test",
    });
    expect(res.headers["cache-control"]).toBe("no-store");
  });

  it("echoes the caller's request id", async () => {
    const res = await request(app)
      .get("/api/health")
      .set("X-Request-Id", "req-123")
      .expect(200);

    expect(res.headers["x-request-id"]).toBe("req-123");
  });

  it("answers unknown routes with 404", async () => {
    const res = await request(app).get("/api/nope").expect(404);
    expect(res.body).toEqual({
      ok: false,
      error: "Route not found",
      code: "route_not_found",
    });
  });

  it("answers malformed JSON with 400", async () => {
    const res = await request(app)
      .post("/api/subjects")
      .set("Content-Type", "application/json")
      .send('{"externalSubjectId":')
      .expect(400);

    expect(res.body).toEqual({
      ok: false,
      error: "Malformed JSON body",
      code: "validation_error",
    });
  });

  describe("subjects", () => {
    it("creates, fetches and lists subjects", async () => {
      const created = await request(app)
        .post("/api/subjects")
        .send({ externalSubjectId: "S1", displayName: "Rex", subjectType: "veterinary" })
        .expect(201);

      expect(created.body.data).toMatchObject({
        externalSubjectId: "S1",
        displayName: "Rex",
        subjectType: "veterinary",
        createdAt: "2024-06-01T12:00:00.000Z",
      });

      const id = created.body.data.id;
      const fetched = await request(app).get(`/api/subjects/${id}`).expect(200);
      expect(fetched.body.data).toEqual(created.body.data);

      const listed = await request(app).get("/api/subjects").expect(200);
      expect(listed.body.data).toEqual([created.body.data]);
    });

    it("returns 409 for a repeated external id", async () => {
      const body = { externalSubjectId: "S1", displayName: "Rex" };
      await request(app).post("/api/subjects").send(body).expect(201);

      const res = await request(app).post("/api/subjects").send(body).expect(409);
      expect(res.body).toMatchObject({
        ok: false,
        code: "conflict",
        error: "Subject already exists: S1",
      });
    });

    it("returns 422 with issue paths for invalid input", async () => {
      const res = await request(app)
        .post("/api/subjects")
        .send({ externalSubjectId: "S1", displayName: "Rex", subjectType: "robot" })
        .expect(422);

      expect(res.body.code).toBe("validation_error");
      expect(res.body.details.issues).toHaveLength(1);
      expect(res.body.details.issues[0].path).toBe("subjectType");
    });

    it("returns 404 for unknown subjects", async () => {
      const res = await request(app).get("/api/subjects/not-a-uuid").expect(404);
      expect(res.body.code).toBe("subject_not_found");
    });
  });
});
