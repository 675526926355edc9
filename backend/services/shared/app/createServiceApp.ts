// backend/services/shared/app/createServiceApp.ts

/**
 * Why:
 * - Every service assembles the same internal stack in the same order:
 *   requestId → http logger → health → json parser → routes → 404 → error.
 *
 * Notes:
 * - Health endpoints stay open and are mounted before the body parser.
 * - Routes are mounted by the service through `mountRoutes`, one-liners only.
 */

import express, { type Express } from "express";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "../middleware/problemJson";
import { createHealthRouter, type ReadinessFn } from "../health";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "tool"). Used in logs & health bodies. */
  serviceName: string;
  /** API base path (e.g., "/api/v1"). */
  apiPrefix: string;
  /** Mounts the service’s routes onto the provided Router. */
  mountRoutes: (router: express.Router) => void;
  /** Health readiness hook (optional). */
  readiness?: ReadinessFn;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, apiPrefix, mountRoutes, readiness } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & Telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));

  // ── Health (public, no auth) ────────────────────────────────────────────────
  app.use(createHealthRouter({ service: serviceName, readiness }));

  // ── Body parsers ────────────────────────────────────────────────────────────
  app.use(express.json({ limit: "1mb" }));

  // ── Routes ──────────────────────────────────────────────────────────────────
  const api = express.Router();
  mountRoutes(api);
  app.use(apiPrefix, api);

  // ── Tails: 404 + error formatter ────────────────────────────────────────────
  app.use(notFoundProblemJson([apiPrefix, "/health", "/healthz", "/readyz"]));
  app.use(errorProblemJson());

  return app;
}
