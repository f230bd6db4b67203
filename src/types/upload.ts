// src/types/upload.ts

/**
 * One received chunk. `etag` is the integrity tag the object store returned
 * for the chunk; it is passed back verbatim when the upload is finalized.
 */
export interface CompletedPart {
  partNumber: number;
  etag: string;
}

export interface UploadStatus {
  isCompleted: boolean;
  totalParts: number;
  completedParts: number;
}

export interface StartedUpload {
  key: string;
  uploadID: string;
  totalParts: number;
}

export interface UploadedPart {
  key: string;
  partNumber: number;
  etag: string;
}

export interface CompletedUpload {
  key: string;
  uploadID: string;

  // Ascending by partNumber.
  parts: CompletedPart[];
}

export interface ExpiredUpload {
  key: string;
  uploadID: string;
}
