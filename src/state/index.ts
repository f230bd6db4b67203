// src/state/index.ts

import { UploadConfig } from "../config/uploads.config.js";
import type { Env } from "../utils/env.js";
import { initRedis } from "./client.js";
import { InMemoryUploadTracker } from "./memory.tracker.js";
import { RedisUploadTracker, type RedisUploadTrackerOptions } from "./redis.tracker.js";

export function createInMemoryUploadTracker(): InMemoryUploadTracker {
  return new InMemoryUploadTracker({ ttlMs: UploadConfig.trackerTtlMs });
}

export async function createRedisUploadTracker(
  options: RedisUploadTrackerOptions = {},
  env: Env = process.env
): Promise<RedisUploadTracker> {
  const redis = await initRedis(env);
  return new RedisUploadTracker(redis, {
    ttlMs: UploadConfig.trackerTtlMs,
    ...options,
  });
}

export * from "./tracker.js";
export * from "./memory.tracker.js";
export * from "./redis.tracker.js";
export * from "./keys.js";
export { initRedis, getRedis } from "./client.js";
export { runUploadGc } from "./gc/upload.gc.worker.js";
export type { ExpiringTracker, UploadGcDeps } from "./gc/upload.gc.worker.js";
export { startUploadGc } from "./gc/upload.gc.scheduler.js";
export type { UploadGcHandle } from "./gc/upload.gc.scheduler.js";
