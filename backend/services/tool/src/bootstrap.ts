// backend/services/tool/src/bootstrap.ts
/**
 * Why:
 * - Load env from a single file (ENV_FILE, default .env.dev at repo root) and
 *   assert the minimum required variables before anything else imports.
 */
import path from "path";
import {
  loadEnvFromFileOrThrow,
  assertRequiredEnv,
} from "@shared/config/env";

const envFile =
  (process.env.ENV_FILE && process.env.ENV_FILE.trim()) || ".env.dev";
const resolved = path.resolve(__dirname, "../../../..", envFile);

console.log(`[bootstrap] Loading env from: ${resolved}`);
loadEnvFromFileOrThrow(resolved);

assertRequiredEnv(["LOG_LEVEL", "TOOL_PORT", "TOOL_DB_MODE"]);
