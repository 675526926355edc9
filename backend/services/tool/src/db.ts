// backend/services/tool/src/db.ts
import mongoose from "mongoose";
import { logger } from "@shared/utils/logger";

function redactMongoUri(uri: string): string {
  try {
    const u = new URL(uri);
    if (u.password) u.password = "***";
    if (u.username) u.username = "***";
    return u.toString();
  } catch {
    return uri.replace(/\/\/([^@]+)@/, "//***:***@");
  }
}

let connected = false;

export async function connectDb(uri: string): Promise<void> {
  if (connected) return;

  // Be explicit; disable buffering so errors surface immediately
  mongoose.set("bufferCommands", false);
  mongoose.set("strictQuery", true);

  logger.info({ uri: redactMongoUri(uri) }, "[tool] connecting to Mongo");

  await mongoose.connect(uri).catch((err: unknown) => {
    logger.error({ err }, "[tool] mongoose.connect failed");
    throw err;
  });

  if (mongoose.connection.readyState !== 1) {
    await mongoose.connection.asPromise();
  }

  connected = true;
  logger.info("[tool] Mongo connected");
}

export async function disconnectDb(): Promise<void> {
  try {
    if (mongoose.connection.readyState !== 0) {
      await mongoose.disconnect();
    }
  } finally {
    connected = false;
  }
}

/** Readiness detail for /readyz; throws (→ 503) unless connected. */
export function mongoReadiness(): { mongo: "ok" } {
  const state = mongoose.connection.readyState; // 1 = connected
  if (state !== 1) throw new Error(`mongo not ready (state=${state})`);
  return { mongo: "ok" };
}
