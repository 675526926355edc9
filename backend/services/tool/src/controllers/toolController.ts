// backend/services/tool/src/controllers/toolController.ts
import type { Request, RequestHandler, Response } from "express";
import { z } from "zod";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { sendProblem, zValidationError } from "@shared/http/errors";
import { respond } from "@shared/contracts/common";
import { toolContract, zToolList } from "@shared/contracts/tool.contract";
import type {
  ToolFailure,
  ToolFailureKind,
  ToolService,
} from "../services/toolService";
import { findByIdDto, toolBodyDto } from "../validators/tool.dto";

const zToolCount = z.object({ count: z.number().int().min(0) });

type FailureStatus = { status: number; code: string };

const FAILURE_STATUS: Record<ToolFailureKind, FailureStatus> = {
  InvalidInput: { status: 400, code: "INVALID_INPUT" },
  Conflict: { status: 400, code: "CONFLICT" },
  NotFound: { status: 404, code: "NOT_FOUND" },
};

function failed(req: Request, res: Response, failure: ToolFailure) {
  const { status, code } = FAILURE_STATUS[failure.kind];
  req.log.debug(
    { kind: failure.kind, status, path: req.originalUrl },
    "[ToolController] failure"
  );
  return sendProblem(req, res, { status, code, detail: failure.message });
}

/**
 * HTTP face of ToolService. One handler per route; each parses its input,
 * makes exactly one service call and maps the outcome to one response.
 */
export class ToolController {
  public constructor(private readonly service: ToolService) {}

  // GET /all
  public readonly list: RequestHandler = asyncHandler(async (_req, res) => {
    respond(res, zToolList, await this.service.getAll());
  });

  // GET /count
  public readonly count: RequestHandler = asyncHandler(async (_req, res) => {
    respond(res, zToolCount, { count: await this.service.count() });
  });

  // GET /:id
  public readonly getById: RequestHandler = asyncHandler(async (req, res) => {
    const params = findByIdDto.safeParse(req.params);
    if (!params.success) return zValidationError(req, res, params.error);

    const result = await this.service.getById(params.data.id);
    if (!result.ok) return failed(req, res, result.failure);
    respond(res, toolContract, result.value);
  });

  // POST /add
  public readonly add: RequestHandler = asyncHandler(async (req, res) => {
    const body = toolBodyDto.safeParse(req.body ?? {});
    if (!body.success) return zValidationError(req, res, body.error);

    const result = await this.service.add(body.data);
    if (!result.ok) return failed(req, res, result.failure);
    respond(res, toolContract, result.value);
  });

  // PUT /update/:id
  public readonly update: RequestHandler = asyncHandler(async (req, res) => {
    const params = findByIdDto.safeParse(req.params);
    if (!params.success) return zValidationError(req, res, params.error);
    const body = toolBodyDto.safeParse(req.body ?? {});
    if (!body.success) return zValidationError(req, res, body.error);

    const result = await this.service.update(params.data.id, body.data);
    if (!result.ok) return failed(req, res, result.failure);
    respond(res, toolContract, result.value);
  });

  // DELETE /delete/:id
  public readonly remove: RequestHandler = asyncHandler(async (req, res) => {
    const params = findByIdDto.safeParse(req.params);
    if (!params.success) return zValidationError(req, res, params.error);

    const result = await this.service.deleteById(params.data.id);
    if (!result.ok) return failed(req, res, result.failure);
    res.status(200).end();
  });

  // DELETE /all
  public readonly removeAll: RequestHandler = asyncHandler(async (req, res) => {
    const result = await this.service.deleteAll();
    if (!result.ok) return failed(req, res, result.failure);
    res.status(200).end();
  });
}
