// backend/services/tool/test/app.spec.ts
import request from "supertest";
import { describe, it, expect } from "vitest";
import { buildApp } from "../src/app";
import { InMemoryToolRepo } from "../src/repo/memoryToolRepo";
import type { ToolRepo } from "../src/repo/toolRepo";
import { expectProblem } from "./helpers/http";

describe("service app", () => {
  it("serves liveness on /health", async () => {
    const app = buildApp({ repo: new InMemoryToolRepo() });
    const res = await request(app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ service: "tool", ok: true });
  });

  it("reports readiness details on /readyz", async () => {
    const app = buildApp({
      repo: new InMemoryToolRepo(),
      readiness: () => ({ repo: "memory" }),
    });
    const res = await request(app).get("/readyz");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ ok: true, repo: "memory" });
  });

  it("answers 503 when readiness throws", async () => {
    const app = buildApp({
      repo: new InMemoryToolRepo(),
      readiness: () => {
        throw new Error("mongo not ready (state=0)");
      },
    });
    const res = await request(app).get("/health/ready");
    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({
      ok: false,
      error: "mongo not ready (state=0)",
    });
  });

  it("echoes a caller's x-request-id into the header and problem instance", async () => {
    const app = buildApp({ repo: new InMemoryToolRepo() });
    const res = await request(app)
      .get("/api/v1/tools/9999")
      .set("x-request-id", "test-req-1");
    expect(res.status).toBe(404);
    expect(res.headers["x-request-id"]).toBe("test-req-1");
    expect(res.body.instance).toBe("test-req-1");
  });

  it("mints a request id when none is supplied", async () => {
    const app = buildApp({ repo: new InMemoryToolRepo() });
    const res = await request(app).get("/health");
    expect(res.headers["x-request-id"]).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/
    );
  });

  it("formats unknown API routes as Problem+JSON", async () => {
    const app = buildApp({ repo: new InMemoryToolRepo() });
    const p = await expectProblem(
      request(app).post("/api/v1/tools/unknown").send({}),
      404,
      "NOT_FOUND"
    );
    expect(p.detail).toBe("Route not found");
  });

  it("returns a bare 404 outside known prefixes", async () => {
    const app = buildApp({ repo: new InMemoryToolRepo() });
    const res = await request(app).get("/favicon.ico");
    expect(res.status).toBe(404);
    expect(res.text).toBe("");
  });

  it("rejects malformed JSON with a 400 problem", async () => {
    const app = buildApp({ repo: new InMemoryToolRepo() });
    const p = await expectProblem(
      request(app)
        .post("/api/v1/tools/add")
        .set("content-type", "application/json")
        .send('{"name":'),
      400,
      "REQUEST_ERROR"
    );
    expect(p.title).toBe("Bad Request");
  });

  it("turns a repository failure into a 500 problem", async () => {
    const broken: ToolRepo = {
      findAll: () => Promise.reject(new Error("socket hang up")),
      findById: () => Promise.reject(new Error("socket hang up")),
      existsById: () => Promise.reject(new Error("socket hang up")),
      save: () => Promise.reject(new Error("socket hang up")),
      deleteById: () => Promise.reject(new Error("socket hang up")),
      deleteAll: () => Promise.reject(new Error("socket hang up")),
      count: () => Promise.reject(new Error("socket hang up")),
    };
    const app = buildApp({ repo: broken });
    const p = await expectProblem(
      request(app).get("/api/v1/tools/all"),
      500,
      "INTERNAL_ERROR"
    );
    expect(p.detail).toBe("Unexpected error");
  });
});
