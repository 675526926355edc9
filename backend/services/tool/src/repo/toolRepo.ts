// backend/services/tool/src/repo/toolRepo.ts
import type { Tool } from "@shared/contracts/tool.contract";

/** What `save` accepts: a full record, or one still waiting for its id. */
export type ToolDraft = Omit<Tool, "id"> & { id?: number };

/**
 * Persistence capability for Tools. The service depends on this interface
 * only; the mongo and in-memory variants are chosen at wiring time.
 */
export interface ToolRepo {
  /** All records, ascending id. */
  findAll(): Promise<Tool[]>;
  findById(id: number): Promise<Tool | null>;
  existsById(id: number): Promise<boolean>;
  /** Insert when `id` is absent (id is generated); otherwise overwrite by id. */
  save(tool: ToolDraft): Promise<Tool>;
  deleteById(id: number): Promise<void>;
  deleteAll(): Promise<void>;
  count(): Promise<number>;
}

export type ToolRepoMode = "mongo" | "memory";
export const TOOL_REPO_MODES: readonly ToolRepoMode[] = ["mongo", "memory"];
