// src/state/tracker.ts

import { MAX_TOTAL_PARTS } from "../config/uploads.config.js";
import type { CompletedPart, UploadStatus } from "../types/upload.js";
import { invalidArgument } from "../utils/uploadError.js";

/**
 * Tracks in-flight multipart uploads by upload key.
 *
 * A record lives from a successful `createUpload` until `completeUpload` or
 * `abortUpload`. Every backend must make each operation atomic with respect to
 * the others: no caller ever sees a half-created record or loses a part added
 * concurrently under a different part number.
 *
 * Failures are `UploadError`s: `INVALID_ARGUMENT`, `NOT_FOUND` or
 * `ALREADY_EXISTS`.
 */
export interface UploadTracker {
  createUpload(key: string, uploadID: string, totalParts: number): Promise<void>;

  /**
   * Inserts or overwrites one part (last write wins). The part number is not
   * checked against `totalParts` here; callers validate before dispatch.
   */
  addPart(key: string, partNumber: number, etag: string): Promise<void>;

  /** Removes the record. Does not check that every part arrived. */
  completeUpload(key: string): Promise<void>;

  /** Removes the record if present. Never fails on a missing key. */
  abortUpload(key: string): Promise<void>;

  getUploadID(key: string): Promise<string>;

  /** Parts in no particular order. */
  getParts(key: string): Promise<CompletedPart[]>;

  getStatus(key: string): Promise<UploadStatus>;
}

export function assertValidTotalParts(totalParts: number) {
  if (
    !Number.isInteger(totalParts) ||
    totalParts <= 0 ||
    totalParts > MAX_TOTAL_PARTS
  ) {
    throw invalidArgument(
      `total parts must be greater than zero and not more than ${MAX_TOTAL_PARTS}`,
      { totalParts }
    );
  }
}

export function assertValidUpload(key: string, totalParts: number) {
  if (!key) {
    throw invalidArgument("file uploading key cannot be empty");
  }
  assertValidTotalParts(totalParts);
}

export function toStatus(totalParts: number, completedParts: number): UploadStatus {
  return {
    isCompleted: completedParts === totalParts,
    totalParts,
    completedParts,
  };
}
