// backend/services/shared/config/env.ts

import path from "path";
import fs from "fs";
import * as dotenv from "dotenv";
import { expand } from "dotenv-expand";

/** Load a specific env file. Throws if the file is missing or invalid. */
export function loadEnvFromFileOrThrow(envFilePath: string): void {
  if (!envFilePath || envFilePath.trim() === "") {
    throw new Error("ENV_FILE is required but was not provided.");
  }
  const resolved = path.resolve(process.cwd(), envFilePath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`ENV_FILE not found at: ${resolved}`);
  }

  const parsed = dotenv.config({ path: resolved });
  if (parsed.error) {
    throw new Error(
      `Failed to load ENV_FILE: ${resolved}: ${String(parsed.error)}`
    );
  }
  expand(parsed);
}

/** Assert required environment variables are present (non-empty). */
export function assertRequiredEnv(keys: string[]): void {
  const missing: string[] = [];
  for (const k of keys) {
    const v = process.env[k];
    if (!v || v.trim() === "") missing.push(k);
  }
  if (missing.length) {
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
  }
}

/** Require a non-empty env var; returns trimmed string. */
export function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

/** Require an env var that parses to a finite number. */
export function requireNumber(name: string): number {
  const raw = requireEnv(name);
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`Invalid number for env var ${name}: "${raw}"`);
  }
  return n;
}

/** Require an env var whose value is one of `allowed`. */
export function requireOneOf<T extends string>(
  name: string,
  allowed: readonly T[]
): T {
  const raw = requireEnv(name);
  const hit = allowed.find((a) => a === raw);
  if (!hit) {
    throw new Error(
      `Invalid value for env var ${name}: "${raw}" (expected ${allowed.join(
        " | "
      )})`
    );
  }
  return hit;
}
