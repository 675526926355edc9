// backend/services/tool/src/app.ts
/**
 * Why:
 * - Assemble via the shared builder: requestId → httpLogger → health →
 *   parsers → routes → 404 → error.
 * - Wiring is explicit: repo → ToolService → ToolController → router. Tests
 *   pass their own repo (or a stubbed service) through buildApp.
 */

import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { ReadinessFn } from "@shared/health";
import type { ToolRepo } from "./repo/toolRepo";
import { ToolService } from "./services/toolService";
import { ToolController } from "./controllers/toolController";
import { createToolRouter } from "./routes/toolRoutes";
import { API_PREFIX, SERVICE_NAME } from "./config";

export type BuildAppDeps = {
  repo: ToolRepo;
  /** Overrides the service built from `repo` (controller tests). */
  service?: ToolService;
  readiness?: ReadinessFn;
};

export function buildApp(deps: BuildAppDeps): Express {
  const service = deps.service ?? new ToolService(deps.repo);
  const controller = new ToolController(service);

  return createServiceApp({
    serviceName: SERVICE_NAME,
    apiPrefix: API_PREFIX,
    readiness: deps.readiness,
    // Mount routes (one-liners only)
    mountRoutes: (api) => {
      api.use("/tools", createToolRouter(controller));
    },
  });
}
