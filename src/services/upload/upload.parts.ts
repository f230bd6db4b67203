// src/services/upload/upload.parts.ts

import { UploadConfig } from "../../config/uploads.config.js";
import type { CompletedPart } from "../../types/upload.js";
import { invalidArgument } from "../../utils/uploadError.js";

export interface PartSlice {
  partNumber: number;
  body: Uint8Array;
}

function assertPartSize(partSize: number) {
  if (!Number.isInteger(partSize) || partSize <= 0) {
    throw invalidArgument("part size must be a positive integer", { partSize });
  }
}

/**
 * Number of parts a payload of `sizeBytes` needs at `partSize` bytes per part.
 */
export function countParts(sizeBytes: number, partSize: number): number {
  if (!Number.isInteger(sizeBytes) || sizeBytes <= 0) {
    throw invalidArgument("file is empty", { sizeBytes });
  }
  assertPartSize(partSize);

  const totalParts = Math.ceil(sizeBytes / partSize);
  if (totalParts > UploadConfig.maxTotalParts) {
    throw invalidArgument(
      `file needs ${totalParts} parts at ${partSize} bytes; the limit is ${UploadConfig.maxTotalParts}`,
      { sizeBytes, partSize, totalParts }
    );
  }
  return totalParts;
}

/**
 * Splits `body` into 1-based parts. Slices are views, not copies.
 */
export function splitIntoParts(body: Uint8Array, partSize: number): PartSlice[] {
  const totalParts = countParts(body.byteLength, partSize);
  const parts: PartSlice[] = [];

  for (let i = 0; i < totalParts; i++) {
    const start = i * partSize;
    parts.push({
      partNumber: i + 1,
      body: body.subarray(start, Math.min(start + partSize, body.byteLength)),
    });
  }

  return parts;
}

/**
 * Parts may be stored in any order (network delivery is not ordered), but the
 * object store only accepts them ascending by part number.
 */
export function sortParts(parts: readonly CompletedPart[]): CompletedPart[] {
  return [...parts].sort((a, b) => a.partNumber - b.partNumber);
}
