// backend/services/tool/src/log.init.ts
import { initLogger } from "@shared/utils/logger";
import { SERVICE_NAME } from "./config";

/**
 * Side-effect module: tags the shared logger with { service: "tool" }.
 * Import this ONCE, right after bootstrap, in index.ts.
 */
initLogger(SERVICE_NAME);
