// src/services/upload/upload.limiter.ts

import PQueue from "p-queue";

/**
 * Bounded queue for the part uploads of one file.
 */
export function createPartQueue(concurrency: number): PQueue {
  return new PQueue({ concurrency });
}
