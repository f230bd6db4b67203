// src/utils/uploadError.ts

/**
 * Canonical upload error codes.
 * MUST stay in sync with the tracker backends, the orchestrator and the S3 adapter.
 */
export type UploadErrorCode =
  | "INVALID_ARGUMENT"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "UPLOAD_INCOMPLETE"
  | "UPLOAD_FINALIZATION_IN_PROGRESS"
  | "CORRUPT_UPLOAD_RECORD"
  | "MISSING_UPLOAD_ID"
  | "NO_COMPLETED_PARTS"
  | "MISSING_ETAG"
  | "OBJECT_STORE_FAILED";

export interface UploadErrorOptions {
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class UploadError extends Error {
  readonly code: UploadErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(code: UploadErrorCode, message: string, options?: UploadErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "UploadError";
    this.code = code;
    this.retryable = options?.retryable ?? false;
    if (options?.details) this.details = options.details;
  }
}

/**
 * Raised by object-store adapters. `operation` names the call that failed
 * (e.g. "storage.uploadPart"); the provider's own error is kept as `cause`.
 */
export class ObjectStoreError extends UploadError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("OBJECT_STORE_FAILED", `${operation}: ${reason}`, { cause });
    this.name = "ObjectStoreError";
    this.operation = operation;
  }
}

export function isUploadError(err: unknown, code?: UploadErrorCode): err is UploadError {
  if (!(err instanceof UploadError)) return false;
  return code === undefined || err.code === code;
}

export const notFound = (key: string) =>
  new UploadError("NOT_FOUND", "not found", { details: { key } });

export const alreadyExists = (key: string) =>
  new UploadError("ALREADY_EXISTS", "already exists", { details: { key } });

export const invalidArgument = (message: string, details?: Record<string, unknown>) =>
  new UploadError("INVALID_ARGUMENT", message, { details });
