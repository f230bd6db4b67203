// src/state/redis.tracker.ts

import type { CompletedPart, UploadStatus } from "../types/upload.js";
import { UploadError, alreadyExists, notFound } from "../utils/uploadError.js";
import { createUploadKeys, type UploadKeys } from "./keys.js";
import { assertValidUpload, toStatus, type UploadTracker } from "./tracker.js";

/**
 * The subset of the Upstash client the tracker needs. `Redis` from
 * @upstash/redis satisfies it; tests substitute an in-process fake.
 */
export interface RedisTrackerClient {
  eval(script: string, keys: string[], args: string[]): Promise<unknown>;
  hget(key: string, field: string): Promise<unknown>;
  del(...keys: string[]): Promise<unknown>;
}

export interface RedisUploadTrackerOptions {
  keyPrefix?: string;

  // 0 or unset: records never expire.
  ttlMs?: number;

  now?: () => number;
}

/**
 * Every write (and every read spanning both hashes) is a single script, so
 * Redis runs it atomically. KEYS[1] is the meta hash, KEYS[2] the parts hash.
 */
export const uploadScripts = {
  // ARGV: uploadID, totalParts, createdAt, ttlMs
  create: `
if redis.call('EXISTS', KEYS[1]) == 1 then return 0 end
redis.call('DEL', KEYS[2])
redis.call('HSET', KEYS[1], 'uploadID', ARGV[1], 'totalParts', ARGV[2], 'createdAt', ARGV[3])
if tonumber(ARGV[4]) > 0 then redis.call('PEXPIRE', KEYS[1], ARGV[4]) end
return 1
`,

  // ARGV: partNumber, etag
  addPart: `
if redis.call('EXISTS', KEYS[1]) == 0 then return 0 end
redis.call('HSET', KEYS[2], ARGV[1], ARGV[2])
local ttl = redis.call('PTTL', KEYS[1])
if ttl > 0 then redis.call('PEXPIRE', KEYS[2], ttl) end
return 1
`,

  complete: `
if redis.call('EXISTS', KEYS[1]) == 0 then return 0 end
redis.call('DEL', KEYS[1], KEYS[2])
return 1
`,

  parts: `
if redis.call('EXISTS', KEYS[1]) == 0 then return nil end
return redis.call('HGETALL', KEYS[2])
`,

  status: `
if redis.call('EXISTS', KEYS[1]) == 0 then return nil end
return { redis.call('HGET', KEYS[1], 'totalParts'), redis.call('HLEN', KEYS[2]) }
`,
} as const;

const corrupt = (key: string, reason: string) =>
  new UploadError("CORRUPT_UPLOAD_RECORD", "upload record is corrupt", {
    details: { key, reason },
  });

export class RedisUploadTracker implements UploadTracker {
  private readonly keys: UploadKeys;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly redis: RedisTrackerClient,
    options: RedisUploadTrackerOptions = {}
  ) {
    this.keys = createUploadKeys(options.keyPrefix);
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  async createUpload(key: string, uploadID: string, totalParts: number): Promise<void> {
    assertValidUpload(key, totalParts);

    const created = await this.run(uploadScripts.create, key, [
      uploadID,
      String(totalParts),
      String(this.now()),
      String(this.ttlMs),
    ]);

    if (Number(created) !== 1) {
      throw alreadyExists(key);
    }
  }

  async addPart(key: string, partNumber: number, etag: string): Promise<void> {
    const added = await this.run(uploadScripts.addPart, key, [
      String(partNumber),
      etag,
    ]);

    if (Number(added) !== 1) {
      throw notFound(key);
    }
  }

  async completeUpload(key: string): Promise<void> {
    const removed = await this.run(uploadScripts.complete, key, []);

    if (Number(removed) !== 1) {
      throw notFound(key);
    }
  }

  async abortUpload(key: string): Promise<void> {
    await this.redis.del(this.keys.meta(key), this.keys.parts(key));
  }

  async getUploadID(key: string): Promise<string> {
    const uploadID = await this.redis.hget(this.keys.meta(key), "uploadID");
    if (uploadID === null || uploadID === undefined) {
      throw notFound(key);
    }
    return String(uploadID);
  }

  async getParts(key: string): Promise<CompletedPart[]> {
    const raw = await this.run(uploadScripts.parts, key, []);
    if (raw === null || raw === undefined) {
      throw notFound(key);
    }
    if (!Array.isArray(raw) || raw.length % 2 !== 0) {
      throw corrupt(key, "parts");
    }

    const parts: CompletedPart[] = [];
    for (let i = 0; i < raw.length; i += 2) {
      const partNumber = Number(raw[i]);
      if (!Number.isInteger(partNumber)) {
        throw corrupt(key, "partNumber");
      }
      parts.push({ partNumber, etag: String(raw[i + 1]) });
    }
    return parts;
  }

  async getStatus(key: string): Promise<UploadStatus> {
    const raw = await this.run(uploadScripts.status, key, []);
    if (raw === null || raw === undefined) {
      throw notFound(key);
    }
    if (!Array.isArray(raw) || raw.length !== 2) {
      throw corrupt(key, "status");
    }

    const totalParts = Number(raw[0]);
    const completedParts = Number(raw[1]);
    if (!Number.isInteger(totalParts) || totalParts <= 0) {
      throw corrupt(key, "totalParts");
    }
    if (!Number.isInteger(completedParts)) {
      throw corrupt(key, "completedParts");
    }

    return toStatus(totalParts, completedParts);
  }

  private run(script: string, key: string, args: string[]): Promise<unknown> {
    return this.redis.eval(script, [this.keys.meta(key), this.keys.parts(key)], args);
  }
}
