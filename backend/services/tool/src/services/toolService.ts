// backend/services/tool/src/services/toolService.ts
/**
 * ToolService: validation + business rules over a ToolRepo.
 *
 * Rule violations come back as values (`{ ok: false, failure }`) so the
 * controller decides the status code. Anything the repo throws is not a rule
 * violation; it rejects the returned promise and surfaces as a 500.
 */

import type { Tool } from "@shared/contracts/tool.contract";
import { logger } from "@shared/utils/logger";
import type { ToolRepo } from "../repo/toolRepo";

export type ToolFailureKind = "InvalidInput" | "Conflict" | "NotFound";

export type ToolFailure = { kind: ToolFailureKind; message: string };

export type Failed = { ok: false; failure: ToolFailure };

export type ServiceResult<T> = { ok: true; value: T } | Failed;

/** Caller-supplied fields; null/undefined name is a validation failure. */
export type ToolInput = {
  name?: string | null;
  description?: string | null;
};

const ok = <T>(value: T): ServiceResult<T> => ({ ok: true, value });
const fail = (kind: ToolFailureKind, message: string): Failed => ({
  ok: false,
  failure: { kind, message },
});

export const MESSAGES = {
  notFound: "Tool not found",
  blankName: "Tool name cannot be null or blank",
  nameTaken: "Tool name already exists",
  nothingToDelete: "No tools to delete",
} as const;

/** The name as given, or null when it is missing or whitespace only. */
function presentName(name: string | null | undefined): string | null {
  return name == null || name.trim() === "" ? null : name;
}

/**
 * Loose uniqueness: two names collide when either one, lower-cased, starts
 * with the other. Exact duplicates collide too.
 */
export function namesCollide(a: string, b: string): boolean {
  const x = a.toLowerCase();
  const y = b.toLowerCase();
  return x.startsWith(y) || y.startsWith(x);
}

export class ToolService {
  public constructor(private readonly repo: ToolRepo) {}

  public async getById(id: number): Promise<ServiceResult<Tool>> {
    const found = await this.repo.findById(id);
    if (!found) {
      logger.debug({ op: "getById", id }, "[ToolService] not_found");
      return fail("NotFound", MESSAGES.notFound);
    }
    return ok(found);
  }

  public async add(input: ToolInput): Promise<ServiceResult<Tool>> {
    const name = presentName(input.name);
    if (name === null) {
      logger.debug({ op: "add" }, "[ToolService] blank name");
      return fail("InvalidInput", MESSAGES.blankName);
    }

    const existing = await this.repo.findAll();
    const clash = existing.find((t) => namesCollide(t.name, name));
    if (clash) {
      logger.debug(
        { op: "add", name, clashId: clash.id },
        "[ToolService] name collides"
      );
      return fail("Conflict", MESSAGES.nameTaken);
    }

    const saved = await this.repo.save({
      name,
      description: input.description ?? "",
    });
    logger.debug({ op: "add", id: saved.id }, "[ToolService] created");
    return ok(saved);
  }

  public async deleteById(id: number): Promise<ServiceResult<void>> {
    if (!(await this.repo.existsById(id))) {
      logger.debug({ op: "deleteById", id }, "[ToolService] not_found");
      return fail("NotFound", MESSAGES.notFound);
    }
    await this.repo.deleteById(id);
    logger.debug({ op: "deleteById", id }, "[ToolService] deleted");
    return ok(undefined);
  }

  public async update(
    id: number,
    input: ToolInput
  ): Promise<ServiceResult<Tool>> {
    const name = presentName(input.name);
    if (name === null) {
      logger.debug({ op: "update", id }, "[ToolService] blank name");
      return fail("InvalidInput", MESSAGES.blankName);
    }

    const current = await this.getById(id);
    if (!current.ok) return current;

    const saved = await this.repo.save({
      ...current.value,
      name,
      description: input.description ?? "",
    });
    logger.debug({ op: "update", id }, "[ToolService] updated");
    return ok(saved);
  }

  public async getAll(): Promise<Tool[]> {
    return this.repo.findAll();
  }

  public async count(): Promise<number> {
    return this.repo.count();
  }

  public async deleteAll(): Promise<ServiceResult<void>> {
    if ((await this.count()) === 0) {
      logger.debug({ op: "deleteAll" }, "[ToolService] nothing to delete");
      return fail("NotFound", MESSAGES.nothingToDelete);
    }
    await this.repo.deleteAll();
    logger.debug({ op: "deleteAll" }, "[ToolService] cleared");
    return ok(undefined);
  }
}
