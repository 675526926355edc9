// backend/services/tool/test/tool.mapper.spec.ts
import { describe, it, expect } from "vitest";
import { dbToDomain, domainToDb } from "../src/mappers/tool.mapper";
import { ToolModel } from "../src/models/Tool";

describe("tool.mapper", () => {
  it("maps _id to id and back", () => {
    const tool = { id: 4, name: "Hammer", description: "A heavy tool" };
    expect(domainToDb(tool)).toEqual({
      _id: 4,
      name: "Hammer",
      description: "A heavy tool",
    });
    expect(dbToDomain(domainToDb(tool))).toEqual(tool);
  });
});

// No connection needed: document construction and validateSync are local.
describe("ToolModel schema", () => {
  it("defaults description and keeps the numeric _id", () => {
    const doc = new ToolModel({ _id: 3, name: "Saw" });
    expect(doc.validateSync()).toBeUndefined();
    expect(dbToDomain(doc.toObject())).toEqual({
      id: 3,
      name: "Saw",
      description: "",
    });
  });

  it("requires a name", () => {
    const doc = new ToolModel({ _id: 3 });
    const err = doc.validateSync();
    expect(err?.errors.name?.kind).toBe("required");
  });

  it("stores into the tools collection without a version key", () => {
    expect(ToolModel.collection.collectionName).toBe("tools");
    expect(ToolModel.schema.get("versionKey")).toBe(false);
  });
});
