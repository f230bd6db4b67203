// src/config/uploads.config.ts

import { parseNonNegativeIntEnv, parsePositiveIntEnv } from "../utils/env.js";

// Hard limit of the S3 multipart protocol.
export const MAX_TOTAL_PARTS = 10_000;

export const UploadConfig = {
  maxTotalParts: MAX_TOTAL_PARTS,

  // 0 disables expiry of in-memory tracking records.
  trackerTtlMs: parseNonNegativeIntEnv("UPLOAD_TRACKER_TTL_MS", 0),

  partConcurrency: parsePositiveIntEnv("UPLOAD_PART_CONCURRENCY", 4),
};

// 5 MB, S3 minimum for every part but the last
const MIN_PART_BYTES = 5 * 1024 * 1024;

export const PartConfig = {
  minBytes: MIN_PART_BYTES,
  defaultBytes: parsePositiveIntEnv(
    "UPLOAD_PART_SIZE_BYTES",
    MIN_PART_BYTES,
    process.env,
    MIN_PART_BYTES
  ),
};

export const GcConfig = {
  gcInterval: parsePositiveIntEnv("UPLOAD_GC_INTERVAL_MS", 5 * 60 * 1000), // 5 minutes
};
