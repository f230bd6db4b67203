// src/services/upload/upload.orchestrator.ts

import type { Logger } from "pino";

import { PartConfig, UploadConfig } from "../../config/uploads.config.js";
import { assertValidTotalParts, assertValidUpload, type UploadTracker } from "../../state/tracker.js";
import { ObjectAcl, type ObjectStore } from "../../store/object.store.js";
import type {
  CompletedUpload,
  StartedUpload,
  UploadedPart,
  UploadStatus,
} from "../../types/upload.js";
import { UploadError, invalidArgument, isUploadError } from "../../utils/uploadError.js";
import { createPartQueue } from "./upload.limiter.js";
import { sortParts, splitIntoParts } from "./upload.parts.js";

export interface MultipartUploadServiceDeps {
  tracker: UploadTracker;
  objectStore: ObjectStore;
  log: Logger;
  partConcurrency?: number;
}

export interface StartUploadInput {
  key: string;
  contentType: string;
  totalParts: number;
  acl?: ObjectAcl;
}

export interface UploadPartInput {
  key: string;
  partNumber: number;
  body: Uint8Array;
}

export interface UploadFileInput {
  key: string;
  body: Uint8Array;
  contentType: string;
  acl?: ObjectAcl;
  partSize?: number;
}

const finalizationInProgress = (key: string) =>
  new UploadError(
    "UPLOAD_FINALIZATION_IN_PROGRESS",
    "Upload is currently finalizing",
    { retryable: true, details: { key } }
  );

/**
 * Drives chunked uploads against an object store, recording progress in an
 * UploadTracker. Only this service talks to both; the tracker never sees an
 * object-store error.
 */
export class MultipartUploadService {
  private readonly tracker: UploadTracker;
  private readonly objectStore: ObjectStore;
  private readonly log: Logger;
  private readonly partConcurrency: number;

  // Keys with a complete() in flight in this process.
  private readonly finalizing = new Set<string>();

  constructor(deps: MultipartUploadServiceDeps) {
    this.tracker = deps.tracker;
    this.objectStore = deps.objectStore;
    this.log = deps.log;
    this.partConcurrency = deps.partConcurrency ?? UploadConfig.partConcurrency;
  }

  async start(input: StartUploadInput): Promise<StartedUpload> {
    const { key, contentType, totalParts } = input;
    const acl = input.acl ?? ObjectAcl.Private;

    assertValidUpload(key, totalParts);

    const uploadID = await this.objectStore.createMultipartUpload(key, contentType, acl);

    try {
      await this.tracker.createUpload(key, uploadID, totalParts);
    } catch (err) {
      // Only the session started above is ours to abort; an existing record
      // for the same key belongs to another upload.
      await this.abortRemoteQuietly(key, uploadID);
      throw err;
    }

    this.log.info({ key, uploadID, totalParts }, "Multipart upload started");
    return { key, uploadID, totalParts };
  }

  /**
   * Sends one chunk. A failed send leaves the upload open so the part can be
   * sent again.
   */
  async uploadPart(input: UploadPartInput): Promise<UploadedPart> {
    const { key, partNumber, body } = input;

    // A resent part would replace the tag the finalize call is sending.
    if (this.finalizing.has(key)) {
      throw finalizationInProgress(key);
    }

    const { totalParts } = await this.tracker.getStatus(key);
    assertValidTotalParts(totalParts);

    if (!Number.isInteger(partNumber) || partNumber < 1 || partNumber > totalParts) {
      throw invalidArgument("part number can be between 1 and total parts", {
        key,
        partNumber,
        totalParts,
      });
    }
    if (body.byteLength === 0) {
      throw invalidArgument("file is empty", { key, partNumber });
    }

    const uploadID = await this.tracker.getUploadID(key);
    const etag = await this.objectStore.uploadPart(key, uploadID, body, partNumber);
    await this.tracker.addPart(key, partNumber, etag);

    this.log.debug({ key, partNumber, sizeBytes: body.byteLength }, "Part uploaded");
    return { key, partNumber, etag };
  }

  async complete(key: string): Promise<CompletedUpload> {
    if (this.finalizing.has(key)) {
      throw finalizationInProgress(key);
    }
    this.finalizing.add(key);

    try {
      const status = await this.tracker.getStatus(key);
      if (!status.isCompleted) {
        throw new UploadError(
          "UPLOAD_INCOMPLETE",
          `Only ${status.completedParts}/${status.totalParts} parts uploaded`,
          {
            retryable: true,
            details: {
              key,
              completedParts: status.completedParts,
              totalParts: status.totalParts,
            },
          }
        );
      }

      const [uploadID, stored] = await Promise.all([
        this.tracker.getUploadID(key),
        this.tracker.getParts(key),
      ]);
      const parts = sortParts(stored);

      try {
        await this.objectStore.completeMultipartUpload(key, uploadID, parts);
      } catch (err) {
        this.log.error({ key, uploadID, err }, "Multipart upload completion failed");
        await this.cleanup(key, uploadID);
        throw err;
      }

      try {
        await this.tracker.completeUpload(key);
      } catch (err) {
        // The object is assembled; a record already gone changes nothing.
        if (!isUploadError(err, "NOT_FOUND")) throw err;
        this.log.warn({ key, uploadID }, "Upload record was gone after completion");
      }

      this.log.info({ key, uploadID, totalParts: parts.length }, "Multipart upload completed");
      return { key, uploadID, parts };
    } finally {
      this.finalizing.delete(key);
    }
  }

  /**
   * Aborts the remote session and forgets the upload. A key with no record is
   * a no-op. The record is removed even when the remote abort fails.
   */
  async abort(key: string): Promise<void> {
    if (this.finalizing.has(key)) {
      throw finalizationInProgress(key);
    }

    let uploadID: string;
    try {
      uploadID = await this.tracker.getUploadID(key);
    } catch (err) {
      if (isUploadError(err, "NOT_FOUND")) return;
      throw err;
    }

    try {
      await this.objectStore.abortMultipartUpload(key, uploadID);
    } catch (err) {
      await this.forgetQuietly(key);
      throw err;
    }

    await this.tracker.abortUpload(key);
    this.log.info({ key, uploadID }, "Multipart upload aborted");
  }

  /** True while `complete(key)` is in flight in this service. */
  isFinalizing(key: string): boolean {
    return this.finalizing.has(key);
  }

  status(key: string): Promise<UploadStatus> {
    return this.tracker.getStatus(key);
  }

  /**
   * Uploads a whole payload: split, start, send every part with bounded
   * concurrency, complete. Any failure aborts the upload.
   */
  async uploadFile(input: UploadFileInput): Promise<CompletedUpload> {
    const { key, body, contentType, acl } = input;
    const partSize = input.partSize ?? PartConfig.defaultBytes;

    const slices = splitIntoParts(body, partSize);
    const { uploadID } = await this.start({
      key,
      contentType,
      totalParts: slices.length,
      acl,
    });

    const queue = createPartQueue(this.partConcurrency);

    try {
      await Promise.all(
        slices.map((slice) =>
          queue.add(() =>
            this.uploadPart({ key, partNumber: slice.partNumber, body: slice.body })
          )
        )
      );
    } catch (err) {
      queue.clear();
      await queue.onIdle();

      this.log.error({ key, uploadID, err }, "Part upload failed");
      await this.cleanup(key, uploadID);
      throw err;
    }

    return this.complete(key);
  }

  // Cleanup after a failure. Never throws, so the failure that triggered it
  // is the one the caller sees.
  private async cleanup(key: string, uploadID: string): Promise<void> {
    await this.abortRemoteQuietly(key, uploadID);
    await this.forgetQuietly(key);
  }

  private async abortRemoteQuietly(key: string, uploadID: string): Promise<void> {
    try {
      await this.objectStore.abortMultipartUpload(key, uploadID);
    } catch (err) {
      this.log.warn({ key, uploadID, err }, "Abort of remote multipart upload failed");
    }
  }

  private async forgetQuietly(key: string): Promise<void> {
    try {
      await this.tracker.abortUpload(key);
    } catch (err) {
      this.log.warn({ key, err }, "Removing upload record failed");
    }
  }
}
