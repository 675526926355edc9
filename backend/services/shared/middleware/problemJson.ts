// backend/services/shared/middleware/problemJson.ts

/**
 * Why:
 * - Error responses are RFC 7807 Problem+JSON so clients/tests can rely on a
 *   stable shape.
 * - 404s are common and noisy; only routes under known prefixes get a
 *   Problem+JSON body.
 *
 * Notes:
 * - Transport-level formatting, not business logic.
 * - 5xx bodies never carry the underlying error message.
 */

import type { ErrorRequestHandler, Request, Response } from "express";
import { notFound, sendProblem } from "../http/errors";
import { extractLogContext } from "../utils/logger";

/**
 * 404 formatter: only emits Problem+JSON for known API/health prefixes.
 * Everything else returns a bare 404 to keep noise down for static assets, etc.
 */
export function notFoundProblemJson(validPrefixes: string[]) {
  return (req: Request, res: Response) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      return notFound(req, res, "Route not found");
    }
    return res.status(404).end();
  };
}

function field(err: unknown, key: string): unknown {
  if (err && typeof err === "object" && key in err) {
    return Reflect.get(err, key);
  }
  return undefined;
}

/** Status carried by an error (`status` or `statusCode`), else 500. */
export function statusOf(err: unknown): number {
  const raw = Number(field(err, "statusCode") ?? field(err, "status") ?? 500);
  return Number.isInteger(raw) && raw >= 400 && raw < 600 ? raw : 500;
}

/**
 * Error formatter: converts any thrown/next(err) into Problem+JSON and logs it
 * through the request logger.
 */
export function errorProblemJson(): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    const status = statusOf(err);
    const message =
      err instanceof Error ? err.message : String(field(err, "message") ?? "");

    const ctx = { ...extractLogContext(req), status, err };
    if (status >= 500) req.log.error(ctx, "request error");
    else req.log.warn(ctx, "request error");

    if (res.headersSent) return next(err);

    const code = field(err, "code");
    sendProblem(req, res, {
      status,
      code:
        status >= 500
          ? "INTERNAL_ERROR"
          : typeof code === "string"
          ? code
          : "REQUEST_ERROR",
      detail: status >= 500 ? "Unexpected error" : message || "Request error",
    });
  };
}
