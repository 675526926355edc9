// backend/services/tool/src/mappers/tool.mapper.ts
import type { Tool } from "@shared/contracts/tool.contract";
import type { ToolDoc } from "../models/Tool";

// Domain ↔ DB mappers. Keep thin; no business logic here.
export function dbToDomain(doc: ToolDoc): Tool {
  return {
    id: doc._id,
    name: doc.name,
    description: doc.description ?? "",
  };
}

export function domainToDb(tool: Tool): ToolDoc {
  return {
    _id: tool.id,
    name: tool.name,
    description: tool.description,
  };
}
