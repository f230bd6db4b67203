// src/store/s3.object.store.ts

import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CreateMultipartUploadCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  PutObjectCommand,
  S3Client,
  UploadPartCommand,
} from "@aws-sdk/client-s3";
import { Readable } from "stream";

import type { StorageOptions } from "../config/storage.config.js";
import type { CompletedPart } from "../types/upload.js";
import { ObjectStoreError, UploadError } from "../utils/uploadError.js";
import type { ObjectAcl, ObjectStore, StoredObject } from "./object.store.js";

export type S3Sender = Pick<S3Client, "send">;

export function createS3Client(options: StorageOptions): S3Client {
  const endpoint = /^https?:\/\//i.test(options.endpoint)
    ? options.endpoint
    : `${options.disableSSL ? "http" : "https"}://${options.endpoint}`;

  return new S3Client({
    endpoint,
    region: options.region,
    credentials: {
      accessKeyId: options.key,
      secretAccessKey: options.secret,
    },
    forcePathStyle: options.forcePathStyle,
  });
}

const missingUploadId = () =>
  new UploadError("MISSING_UPLOAD_ID", "upload id is missed or empty");

function stripQuotes(etag: string): string {
  return etag.replace(/^"+|"+$/g, "");
}

export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly s3: S3Sender,
    private readonly bucket: string,
    private readonly publicUrl: string,
    private readonly forcePathStyle = false
  ) {}

  static fromOptions(options: StorageOptions): S3ObjectStore {
    return new S3ObjectStore(
      createS3Client(options),
      options.bucket,
      options.publicUrl,
      options.forcePathStyle
    );
  }

  fileURL(path: string): string {
    const base = this.publicUrl.replace(/\/$/, "");
    if (this.forcePathStyle) {
      return `${base}/${this.bucket}/${path}`;
    }
    return `${base}/${path}`;
  }

  async putObject(
    path: string,
    body: Uint8Array,
    acl: ObjectAcl,
    contentType: string
  ): Promise<void> {
    await this.call("storage.upload", () =>
      this.s3.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: path,
          Body: body,
          ACL: acl,
          ContentType: contentType,
        })
      )
    );
  }

  async getObject(path: string): Promise<StoredObject> {
    const response = await this.call("storage.download", () =>
      this.s3.send(new GetObjectCommand({ Bucket: this.bucket, Key: path }))
    );

    if (!(response.Body instanceof Readable)) {
      throw new ObjectStoreError(
        "storage.download",
        new Error(`Expected Readable stream from S3, got ${typeof response.Body}`)
      );
    }

    return {
      body: response.Body,
      contentType: response.ContentType ?? null,
    };
  }

  async deleteObject(path: string): Promise<void> {
    await this.call("storage.remove", () =>
      this.s3.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: path }))
    );
  }

  async createMultipartUpload(
    path: string,
    contentType: string,
    acl: ObjectAcl
  ): Promise<string> {
    const result = await this.call("storage.createMultipartUpload", () =>
      this.s3.send(
        new CreateMultipartUploadCommand({
          Bucket: this.bucket,
          Key: path,
          ACL: acl,
          ContentType: contentType,
        })
      )
    );

    if (!result.UploadId) {
      throw missingUploadId();
    }
    return result.UploadId;
  }

  async abortMultipartUpload(path: string, uploadID: string): Promise<void> {
    if (!uploadID) throw missingUploadId();

    await this.call("storage.abortMultipartUpload", () =>
      this.s3.send(
        new AbortMultipartUploadCommand({
          Bucket: this.bucket,
          Key: path,
          UploadId: uploadID,
        })
      )
    );
  }

  /** `parts` must already be in ascending part order. */
  async completeMultipartUpload(
    path: string,
    uploadID: string,
    parts: readonly CompletedPart[]
  ): Promise<void> {
    if (!uploadID) throw missingUploadId();
    if (parts.length === 0) {
      throw new UploadError(
        "NO_COMPLETED_PARTS",
        "no completed parts, nothing to upload"
      );
    }

    await this.call("storage.completeMultipartUpload", () =>
      this.s3.send(
        new CompleteMultipartUploadCommand({
          Bucket: this.bucket,
          Key: path,
          UploadId: uploadID,
          MultipartUpload: {
            Parts: parts.map((p) => ({ PartNumber: p.partNumber, ETag: p.etag })),
          },
        })
      )
    );
  }

  async uploadPart(
    path: string,
    uploadID: string,
    body: Uint8Array,
    partNumber: number
  ): Promise<string> {
    if (!uploadID) throw missingUploadId();

    const result = await this.call("storage.uploadPart", () =>
      this.s3.send(
        new UploadPartCommand({
          Bucket: this.bucket,
          Key: path,
          UploadId: uploadID,
          PartNumber: partNumber,
          Body: body,
        })
      )
    );

    if (!result.ETag) {
      throw new UploadError("MISSING_ETAG", "object store returned no ETag for part", {
        details: { path, partNumber },
      });
    }
    return stripQuotes(result.ETag);
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new ObjectStoreError(operation, err);
    }
  }
}
