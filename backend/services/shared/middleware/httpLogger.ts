// backend/services/shared/middleware/httpLogger.ts
import pinoHttp from "pino-http";
import { randomUUID } from "crypto";
import type { IncomingMessage, ServerResponse } from "http";
import { logger } from "../utils/logger";

const QUIET_PATHS = new Set([
  "/health",
  "/health/live",
  "/health/ready",
  "/healthz",
  "/readyz",
  "/favicon.ico",
]);

// requestIdMiddleware runs first and has already echoed the id on the response.
function requestIdOf(res: ServerResponse): string | undefined {
  const h = res.getHeader("x-request-id");
  return typeof h === "string" && h ? h : undefined;
}

export function makeHttpLogger(serviceName: string) {
  return pinoHttp({
    logger,
    genReqId: (_req, res) => {
      const id = requestIdOf(res) || randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },
    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },
    customProps: () => ({ service: serviceName }),
    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },
    serializers: {
      req(req: { id?: unknown; method?: string; url?: string }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: { statusCode?: number }) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
