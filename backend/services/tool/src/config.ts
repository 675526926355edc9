// backend/services/tool/src/config.ts
/**
 * SOP-compliant config:
 * - No dotenv loading here (bootstrap.ts loads env).
 * - No hardcoded defaults; all required vars must be present.
 * - Fail fast: loadConfig() throws on the first missing/invalid var.
 */
import {
  requireEnv,
  requireNumber,
  requireOneOf,
} from "@shared/config/env";
import { TOOL_REPO_MODES, type ToolRepoMode } from "./repo/toolRepo";

export const SERVICE_NAME = "tool" as const;
export const API_PREFIX = "/api/v1" as const;

export type ToolConfig = {
  env: string | undefined;
  port: number;
  logLevel: string;
  dbMode: ToolRepoMode;
  /** Present iff dbMode === "mongo". */
  mongoUri: string | undefined;
};

export function loadConfig(): ToolConfig {
  const dbMode = requireOneOf("TOOL_DB_MODE", TOOL_REPO_MODES);
  return {
    // pass-through (optional)
    env: process.env.NODE_ENV,

    // required
    port: requireNumber("TOOL_PORT"),
    logLevel: requireEnv("LOG_LEVEL"),
    dbMode,
    mongoUri: dbMode === "mongo" ? requireEnv("TOOL_MONGO_URI") : undefined,
  };
}
