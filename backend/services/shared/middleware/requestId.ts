// backend/services/shared/middleware/requestId.ts

/**
 * Every inbound request carries a stable correlation key so that logs and
 * Problem+JSON bodies can be tied together.
 *
 * Notes:
 * - Must run **before** the http logger.
 * - Never overwrites a caller-supplied ID; mints a UUID only if the request
 *   lacks all recognized headers.
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 *   The response always echoes `x-request-id`.
 */

import type { RequestHandler } from "express";
import { randomUUID } from "crypto";

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const hdr =
      req.headers["x-request-id"] ||
      req.headers["x-correlation-id"] ||
      req.headers["x-amzn-trace-id"];

    const id = (Array.isArray(hdr) ? hdr[0] : hdr) || randomUUID();

    req.requestId = String(id);
    res.setHeader("x-request-id", req.requestId);
    next();
  };
}
