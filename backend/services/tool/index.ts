// backend/services/tool/index.ts
/**
 * Why:
 * - Keep start-up boring and reliable: load env (bootstrap), init logs,
 *   connect DB (mongo mode), then start HTTP with shared startHttpService.
 */

import "./src/bootstrap"; // loads env
import "./src/log.init";

import { logger } from "@shared/utils/logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";
import { buildApp } from "./src/app";
import { SERVICE_NAME, loadConfig } from "./src/config";
import { connectDb, disconnectDb, mongoReadiness } from "./src/db";
import { createToolRepo } from "./src/repo/createToolRepo";

// Top-level guards
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start(): Promise<void> {
  const config = loadConfig();

  if (config.mongoUri) await connectDb(config.mongoUri);

  const app = buildApp({
    repo: createToolRepo(config.dbMode),
    readiness:
      config.dbMode === "mongo"
        ? mongoReadiness
        : () => ({ repo: config.dbMode }),
  });

  await startHttpService({
    app,
    port: config.port,
    serviceName: SERVICE_NAME,
    logger,
    onShutdown: disconnectDb,
  });
}

start().catch((err: unknown) => {
  logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});
