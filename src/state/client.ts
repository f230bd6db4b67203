// src/state/client.ts

import { Redis } from "@upstash/redis";
import { type Env, requireEnv } from "../utils/env.js";

let redis: Redis | null = null;

export async function initRedis(env: Env = process.env): Promise<Redis> {
  if (redis) return redis;

  const url = requireEnv(env, "UPSTASH_REDIS_REST_URL");
  const token = requireEnv(env, "UPSTASH_REDIS_REST_TOKEN");

  const client = new Redis({
    url,
    token,
    // Part tags and ids must come back exactly as written, never JSON-parsed.
    automaticDeserialization: false,
    retry: {
      retries: 3,
      backoff: (attempt) => Math.min(100 * 2 ** attempt, 1000),
    },
  });

  await client.ping();

  redis = client;
  return redis;
}

export function getRedis(): Redis {
  if (!redis) {
    throw new Error(
      "Redis not initialized. initRedis() must be awaited during startup."
    );
  }
  return redis;
}
