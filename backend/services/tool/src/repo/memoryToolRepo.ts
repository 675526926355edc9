// backend/services/tool/src/repo/memoryToolRepo.ts
/**
 * In-memory ToolRepo.
 * - Never touches Mongo; ids come from a local counter so records look
 *   "as if" they were persisted.
 * - Hands out copies; callers never hold a reference into the store.
 */

import type { Tool } from "@shared/contracts/tool.contract";
import type { ToolDraft, ToolRepo } from "./toolRepo";

export class InMemoryToolRepo implements ToolRepo {
  private readonly rows = new Map<number, Tool>();
  private lastId = 0;

  public constructor(seed: ToolDraft[] = []) {
    for (const t of seed) this.put(t);
  }

  public async findAll(): Promise<Tool[]> {
    return [...this.rows.values()]
      .sort((a, b) => a.id - b.id)
      .map((t) => ({ ...t }));
  }

  public async findById(id: number): Promise<Tool | null> {
    const hit = this.rows.get(id);
    return hit ? { ...hit } : null;
  }

  public async existsById(id: number): Promise<boolean> {
    return this.rows.has(id);
  }

  public async save(tool: ToolDraft): Promise<Tool> {
    return { ...this.put(tool) };
  }

  public async deleteById(id: number): Promise<void> {
    this.rows.delete(id);
  }

  public async deleteAll(): Promise<void> {
    this.rows.clear();
  }

  public async count(): Promise<number> {
    return this.rows.size;
  }

  private put(tool: ToolDraft): Tool {
    const id = tool.id ?? this.lastId + 1;
    this.lastId = Math.max(this.lastId, id);
    const row: Tool = { id, name: tool.name, description: tool.description };
    this.rows.set(id, row);
    return row;
  }
}
