// src/state/memory.tracker.ts

import type { CompletedPart, ExpiredUpload, UploadStatus } from "../types/upload.js";
import { alreadyExists, notFound } from "../utils/uploadError.js";
import { assertValidUpload, toStatus, type UploadTracker } from "./tracker.js";

interface MemoryRecord {
  readonly uploadID: string;
  readonly totalParts: number;
  readonly parts: Map<number, string>;
  readonly createdAt: number;
  readonly expiresAt?: number;
}

export interface InMemoryUploadTrackerOptions {
  // 0 or unset keeps records until they are completed or aborted.
  ttlMs?: number;
  now?: () => number;
}

/**
 * Default tracker backend, scoped to the process.
 *
 * Critical section: every method body touches `records` synchronously and
 * never awaits before it returns, so the event loop runs each operation to
 * completion before any other starts. Readers never see a partial write and
 * concurrent `addPart` calls cannot lose each other's updates.
 */
export class InMemoryUploadTracker implements UploadTracker {
  private readonly records = new Map<string, MemoryRecord>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: InMemoryUploadTrackerOptions = {}) {
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.records.size;
  }

  async createUpload(key: string, uploadID: string, totalParts: number): Promise<void> {
    assertValidUpload(key, totalParts);

    if (this.records.has(key)) {
      throw alreadyExists(key);
    }

    const createdAt = this.now();
    this.records.set(key, {
      uploadID,
      totalParts,
      parts: new Map(),
      createdAt,
      ...(this.ttlMs > 0 ? { expiresAt: createdAt + this.ttlMs } : {}),
    });
  }

  async addPart(key: string, partNumber: number, etag: string): Promise<void> {
    this.mustGet(key).parts.set(partNumber, etag);
  }

  async completeUpload(key: string): Promise<void> {
    if (!this.records.delete(key)) {
      throw notFound(key);
    }
  }

  async abortUpload(key: string): Promise<void> {
    this.records.delete(key);
  }

  async getUploadID(key: string): Promise<string> {
    return this.mustGet(key).uploadID;
  }

  async getParts(key: string): Promise<CompletedPart[]> {
    const record = this.mustGet(key);
    return Array.from(record.parts, ([partNumber, etag]) => ({ partNumber, etag }));
  }

  async getStatus(key: string): Promise<UploadStatus> {
    const record = this.mustGet(key);
    return toStatus(record.totalParts, record.parts.size);
  }

  /**
   * Drops every record whose TTL has elapsed and reports what was dropped, so
   * the caller can abort the matching remote sessions. Keys for which `keep`
   * returns true stay even when expired.
   */
  evictExpired(
    now: number = this.now(),
    keep: (key: string) => boolean = () => false
  ): ExpiredUpload[] {
    const evicted: ExpiredUpload[] = [];

    for (const [key, record] of this.records) {
      if (record.expiresAt !== undefined && record.expiresAt <= now && !keep(key)) {
        this.records.delete(key);
        evicted.push({ key, uploadID: record.uploadID });
      }
    }

    return evicted;
  }

  private mustGet(key: string): MemoryRecord {
    const record = this.records.get(key);
    if (!record) {
      throw notFound(key);
    }
    return record;
  }
}
