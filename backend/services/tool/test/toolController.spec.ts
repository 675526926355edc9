// backend/services/tool/test/toolController.spec.ts
/**
 * Controller in isolation: the real ToolService is built but every call the
 * test cares about is stubbed, so only the HTTP mapping is under test.
 */
import request from "supertest";
import type { Express } from "express";
import { describe, it, expect, beforeEach, vi } from "vitest";
import { buildApp } from "../src/app";
import { InMemoryToolRepo } from "../src/repo/memoryToolRepo";
import { ToolService } from "../src/services/toolService";
import { expectOK, expectProblem } from "./helpers/http";

const BASE = "/api/v1/tools";

let service: ToolService;
let app: Express;

beforeEach(() => {
  const repo = new InMemoryToolRepo();
  service = new ToolService(repo);
  app = buildApp({ repo, service });
});

describe("ToolController", () => {
  it("GET /all returns what the service lists", async () => {
    const getAll = vi.spyOn(service, "getAll").mockResolvedValue([
      { id: 11, name: "Hammer", description: "A heavy tool" },
      { id: 12, name: "Screwdriver", description: "A precision tool" },
    ]);

    const res = await expectOK(request(app).get(`${BASE}/all`));
    expect(res.headers["content-type"]).toMatch(/^application\/json/);
    expect(res.body[0].name).toBe("Hammer");
    expect(res.body[1].name).toBe("Screwdriver");
    expect(getAll).toHaveBeenCalledTimes(1);
  });

  it("GET /count wraps the number", async () => {
    vi.spyOn(service, "count").mockResolvedValue(3);
    const res = await expectOK(request(app).get(`${BASE}/count`));
    expect(res.body).toEqual({ count: 3 });
  });

  it("GET /:id passes the numeric id", async () => {
    const getById = vi.spyOn(service, "getById").mockResolvedValue({
      ok: true,
      value: { id: 8, name: "Level", description: "" },
    });
    await expectOK(request(app).get(`${BASE}/8`));
    expect(getById).toHaveBeenCalledWith(8);
  });

  it("POST /add hands the parsed body to the service", async () => {
    const addSpy = vi.spyOn(service, "add").mockResolvedValue({
      ok: true,
      value: { id: 1, name: "Hammer", description: "" },
    });
    await expectOK(
      request(app).post(`${BASE}/add`).send({ id: 5, name: "Hammer" })
    );
    expect(addSpy).toHaveBeenCalledWith({ name: "Hammer", description: "" });
  });

  it("POST /add maps Conflict to 400", async () => {
    vi.spyOn(service, "add").mockResolvedValue({
      ok: false,
      failure: { kind: "Conflict", message: "Tool name already exists" },
    });
    const p = await expectProblem(
      request(app).post(`${BASE}/add`).send({ name: "Hamm" }),
      400,
      "CONFLICT"
    );
    expect(p.detail).toBe("Tool name already exists");
  });

  it("PUT /update/:id passes id and body and maps NotFound to 404", async () => {
    const update = vi.spyOn(service, "update").mockResolvedValue({
      ok: false,
      failure: { kind: "NotFound", message: "Tool not found" },
    });
    await expectProblem(
      request(app)
        .put(`${BASE}/update/4`)
        .send({ name: "Wrench", description: "Adjustable" }),
      404,
      "NOT_FOUND"
    );
    expect(update).toHaveBeenCalledWith(4, {
      name: "Wrench",
      description: "Adjustable",
    });
  });

  it("DELETE /delete/:id binds the id from the path", async () => {
    const del = vi
      .spyOn(service, "deleteById")
      .mockResolvedValue({ ok: true, value: undefined });
    const res = await expectOK(request(app).delete(`${BASE}/delete/6`));
    expect(res.text).toBe("");
    expect(del).toHaveBeenCalledWith(6);
  });

  it("does not call the service when the id is malformed", async () => {
    const del = vi.spyOn(service, "deleteById");
    await expectProblem(
      request(app).delete(`${BASE}/delete/six`),
      400,
      "VALIDATION_ERROR"
    );
    expect(del).not.toHaveBeenCalled();
  });

  it("turns a service rejection into a 500 problem without leaking it", async () => {
    vi.spyOn(service, "getById").mockRejectedValue(
      new Error("connection reset by peer")
    );
    const p = await expectProblem(
      request(app).get(`${BASE}/1`),
      500,
      "INTERNAL_ERROR"
    );
    expect(p.title).toBe("Internal Server Error");
    expect(p.detail).toBe("Unexpected error");
  });
});
