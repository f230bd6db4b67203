// src/state/gc/upload.gc.worker.ts

import type { Logger } from "pino";

import type { ObjectStore } from "../../store/object.store.js";
import type { ExpiredUpload } from "../../types/upload.js";

export interface ExpiringTracker {
  evictExpired(now?: number, keep?: (key: string) => boolean): ExpiredUpload[];
}

export interface UploadGcDeps {
  tracker: ExpiringTracker;
  objectStore: Pick<ObjectStore, "abortMultipartUpload">;
  log: Logger;

  // True while an upload is being finalized. Such uploads are never touched.
  isFinalizing?: (key: string) => boolean;
}

/**
 * Evicts tracking records past their TTL and aborts the matching remote
 * sessions. Returns the number of records evicted.
 */
export async function runUploadGc(deps: UploadGcDeps): Promise<number> {
  const { tracker, objectStore, log, isFinalizing } = deps;

  // Eviction is synchronous and happens before any network call.
  const expired = tracker.evictExpired(undefined, isFinalizing);
  if (expired.length === 0) return 0;

  for (const { key, uploadID } of expired) {
    log.warn({ key, uploadID }, "GC evicting expired upload");

    try {
      await objectStore.abortMultipartUpload(key, uploadID);
    } catch (err) {
      log.error({ key, uploadID, err }, "GC failed to abort remote upload");
    }

    // Yield between aborts when the backlog is large.
    await new Promise((r) => setImmediate(r));
  }

  return expired.length;
}
