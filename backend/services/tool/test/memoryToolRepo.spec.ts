// backend/services/tool/test/memoryToolRepo.spec.ts
import { describe, it, expect } from "vitest";
import { InMemoryToolRepo } from "../src/repo/memoryToolRepo";

describe("InMemoryToolRepo", () => {
  it("assigns increasing ids on insert", async () => {
    const repo = new InMemoryToolRepo();
    const a = await repo.save({ name: "Hammer", description: "" });
    const b = await repo.save({ name: "Saw", description: "" });
    expect([a.id, b.id]).toEqual([1, 2]);
  });

  it("never reuses an id after a delete", async () => {
    const repo = new InMemoryToolRepo();
    await repo.save({ name: "Hammer", description: "" });
    await repo.save({ name: "Saw", description: "" });
    await repo.deleteById(2);
    const c = await repo.save({ name: "Drill", description: "" });
    expect(c.id).toBe(3);
  });

  it("overwrites by id when the draft carries one", async () => {
    const repo = new InMemoryToolRepo([{ name: "Hammer", description: "old" }]);
    await repo.save({ id: 1, name: "Hammer", description: "new" });
    expect(await repo.count()).toBe(1);
    expect(await repo.findById(1)).toEqual({
      id: 1,
      name: "Hammer",
      description: "new",
    });
  });

  it("continues numbering past seeded ids", async () => {
    const repo = new InMemoryToolRepo([
      { id: 10, name: "Level", description: "" },
    ]);
    const next = await repo.save({ name: "Chisel", description: "" });
    expect(next.id).toBe(11);
  });

  it("returns copies that do not alias stored rows", async () => {
    const repo = new InMemoryToolRepo([{ name: "Hammer", description: "" }]);
    const got = await repo.findById(1);
    if (!got) throw new Error("seeded row missing");
    got.name = "Mutated";
    const [listed] = await repo.findAll();
    listed.description = "mutated too";
    expect(await repo.findById(1)).toEqual({
      id: 1,
      name: "Hammer",
      description: "",
    });
  });

  it("lists by ascending id and reports existence and count", async () => {
    const repo = new InMemoryToolRepo([
      { id: 5, name: "Wrench", description: "" },
      { id: 2, name: "Saw", description: "" },
    ]);
    expect((await repo.findAll()).map((t) => t.id)).toEqual([2, 5]);
    expect(await repo.existsById(5)).toBe(true);
    expect(await repo.existsById(3)).toBe(false);
    expect(await repo.count()).toBe(2);
    await repo.deleteAll();
    expect(await repo.count()).toBe(0);
    expect(await repo.findById(5)).toBeNull();
  });
});
