// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, {
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";
import { requireEnv } from "../config/env";

/**
 * Shared logger (authoritative)
 *
 * ❗️Each service MUST call `initLogger(SERVICE_NAME)` at bootstrap
 *    BEFORE creating any request loggers (e.g., pino-http).
 *
 * Usage:
 *   import { initLogger } from "@shared/utils/logger";
 *   initLogger(SERVICE_NAME);
 */

const validLevels = new Set<string>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

function requireLevel(raw: string): LevelWithSilent {
  if (!isLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

const LOG_LEVEL = requireLevel(requireEnv("LOG_LEVEL"));

// NOTE: no base.service until initLogger() runs; avoids stamping "unknown".
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

export let logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): void {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({ ...pinoOptions, base: { service: SERVICE_NAME } });
}

// ───────────────────────────── Request context helper ─────────────────────────
export type LogContext = {
  requestId: string | null;
  path: string;
  method: string;
  entityId?: string;
  service?: string;
};

export function extractLogContext(req: Request): LogContext {
  const hdr =
    req.headers["x-request-id"] ||
    req.headers["x-correlation-id"] ||
    req.headers["x-amzn-trace-id"];
  const hdrId = Array.isArray(hdr) ? hdr[0] : hdr;
  return {
    requestId: req.id ? String(req.id) : hdrId || null,
    path: req.originalUrl,
    method: req.method,
    entityId: req.params?.id,
    service: SERVICE_NAME || undefined,
  };
}
