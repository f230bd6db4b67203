// src/state/keys.ts

export const DEFAULT_KEY_PREFIX = "mpt:v1";

export function createUploadKeys(prefix: string = DEFAULT_KEY_PREFIX) {
  const key = (suffix: string) => `${prefix}:${suffix}`;

  return {
    // Hash: uploadID, totalParts, createdAt
    meta: (uploadKey: string) => key(`upload:${uploadKey}:meta`),

    // Hash: partNumber -> etag
    parts: (uploadKey: string) => key(`upload:${uploadKey}:parts`),
  };
}

export type UploadKeys = ReturnType<typeof createUploadKeys>;

export const uploadKeys = createUploadKeys();
