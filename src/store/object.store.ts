// src/store/object.store.ts

import type { Readable } from "stream";
import type { CompletedPart } from "../types/upload.js";

export const ObjectAcl = {
  Public: "public-read",
  Private: "private",
} as const;

export type ObjectAcl = (typeof ObjectAcl)[keyof typeof ObjectAcl];

export interface StoredObject {
  body: Readable;
  contentType: string | null;
}

/**
 * Remote object storage with a chunked-upload protocol. Part numbers are
 * 1-based; `uploadPart` returns the integrity tag the store expects back,
 * in ascending part order, when the upload is completed.
 */
export interface ObjectStore {
  putObject(
    path: string,
    body: Uint8Array,
    acl: ObjectAcl,
    contentType: string
  ): Promise<void>;

  getObject(path: string): Promise<StoredObject>;

  deleteObject(path: string): Promise<void>;

  createMultipartUpload(
    path: string,
    contentType: string,
    acl: ObjectAcl
  ): Promise<string>;

  abortMultipartUpload(path: string, uploadID: string): Promise<void>;

  completeMultipartUpload(
    path: string,
    uploadID: string,
    parts: readonly CompletedPart[]
  ): Promise<void>;

  uploadPart(
    path: string,
    uploadID: string,
    body: Uint8Array,
    partNumber: number
  ): Promise<string>;
}
