import { describe, expect, it } from "vitest";

import {
  ObjectStoreError,
  UploadError,
  alreadyExists,
  invalidArgument,
  isUploadError,
  notFound,
} from "../uploadError.js";

describe("UploadError", () => {
  it("defaults to not retryable", () => {
    const err = new UploadError("NOT_FOUND", "not found");

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("UploadError");
    expect(err.retryable).toBe(false);
    expect(err.details).toBeUndefined();
  });

  it("builds the tracker errors", () => {
    expect(notFound("a.bin")).toMatchObject({
      code: "NOT_FOUND",
      message: "not found",
      details: { key: "a.bin" },
    });
    expect(alreadyExists("a.bin")).toMatchObject({
      code: "ALREADY_EXISTS",
      message: "already exists",
    });
    expect(invalidArgument("bad", { field: "x" })).toMatchObject({
      code: "INVALID_ARGUMENT",
      details: { field: "x" },
    });
  });

  it("narrows by code", () => {
    const err: unknown = notFound("a.bin");

    expect(isUploadError(err)).toBe(true);
    expect(isUploadError(err, "NOT_FOUND")).toBe(true);
    expect(isUploadError(err, "ALREADY_EXISTS")).toBe(false);
    expect(isUploadError(new Error("not found"))).toBe(false);
  });
});

describe("ObjectStoreError", () => {
  it("names the failed operation and keeps the cause", () => {
    const cause = new Error("AccessDenied");
    const err = new ObjectStoreError("storage.uploadPart", cause);

    expect(err.name).toBe("ObjectStoreError");
    expect(err.code).toBe("OBJECT_STORE_FAILED");
    expect(err.operation).toBe("storage.uploadPart");
    expect(err.message).toBe("storage.uploadPart: AccessDenied");
    expect(err.cause).toBe(cause);
    expect(isUploadError(err, "OBJECT_STORE_FAILED")).toBe(true);
  });

  it("describes non-error causes", () => {
    expect(new ObjectStoreError("storage.remove", "timeout").message).toBe(
      "storage.remove: timeout"
    );
  });
});
