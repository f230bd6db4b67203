import { describe, expect, it } from "vitest";

import { UploadError } from "../../utils/uploadError.js";
import { createInMemoryUploadTracker } from "../index.js";
import { InMemoryUploadTracker } from "../memory.tracker.js";

async function codeOf(p: Promise<unknown>): Promise<string> {
  try {
    await p;
  } catch (err) {
    if (err instanceof UploadError) return err.code;
    throw err;
  }
  throw new Error("expected rejection");
}

describe("InMemoryUploadTracker", () => {
  it("creates a record with no parts", async () => {
    const tracker = new InMemoryUploadTracker();
    await tracker.createUpload("a.bin", "u-1", 3);

    expect(await tracker.getUploadID("a.bin")).toBe("u-1");
    expect(await tracker.getParts("a.bin")).toEqual([]);
    expect(await tracker.getStatus("a.bin")).toEqual({
      isCompleted: false,
      totalParts: 3,
      completedParts: 0,
    });
  });

  it("rejects an empty key", async () => {
    const tracker = new InMemoryUploadTracker();
    await expect(tracker.createUpload("", "u-1", 1)).rejects.toThrow(
      "file uploading key cannot be empty"
    );
    expect(tracker.size).toBe(0);
  });

  it.each([0, -1, 10_001, 1.5])("rejects totalParts %s", async (totalParts) => {
    const tracker = new InMemoryUploadTracker();
    await expect(tracker.createUpload("a.bin", "u-1", totalParts)).rejects.toThrow(
      "total parts must be greater than zero and not more than 10000"
    );
    expect(tracker.size).toBe(0);
  });

  it("accepts the part limit", async () => {
    const tracker = new InMemoryUploadTracker();
    await tracker.createUpload("a.bin", "u-1", 10_000);
    expect((await tracker.getStatus("a.bin")).totalParts).toBe(10_000);
  });

  it("rejects a duplicate key and keeps the first record", async () => {
    const tracker = new InMemoryUploadTracker();
    await tracker.createUpload("a.bin", "u-1", 2);
    await tracker.addPart("a.bin", 1, "e1");

    expect(await codeOf(tracker.createUpload("a.bin", "u-2", 5))).toBe("ALREADY_EXISTS");
    expect(await tracker.getUploadID("a.bin")).toBe("u-1");
    expect(await tracker.getStatus("a.bin")).toEqual({
      isCompleted: false,
      totalParts: 2,
      completedParts: 1,
    });
  });

  it("overwrites a part with the same number", async () => {
    const tracker = new InMemoryUploadTracker();
    await tracker.createUpload("a.bin", "u-1", 2);
    await tracker.addPart("a.bin", 1, "old");
    await tracker.addPart("a.bin", 1, "new");

    expect(await tracker.getParts("a.bin")).toEqual([{ partNumber: 1, etag: "new" }]);
    expect((await tracker.getStatus("a.bin")).completedParts).toBe(1);
  });

  it("reports completion once every part is in", async () => {
    const tracker = new InMemoryUploadTracker();
    await tracker.createUpload("a.bin", "u-1", 2);
    await tracker.addPart("a.bin", 2, "e2");
    expect((await tracker.getStatus("a.bin")).isCompleted).toBe(false);

    await tracker.addPart("a.bin", 1, "e1");
    expect(await tracker.getStatus("a.bin")).toEqual({
      isCompleted: true,
      totalParts: 2,
      completedParts: 2,
    });
  });

  it("keeps every part added concurrently", async () => {
    const tracker = new InMemoryUploadTracker();
    await tracker.createUpload("big.bin", "u-1", 100);

    await Promise.all(
      Array.from({ length: 100 }, (_, i) => tracker.addPart("big.bin", i + 1, `e${i + 1}`))
    );

    const parts = await tracker.getParts("big.bin");
    expect(parts).toHaveLength(100);
    expect(new Set(parts.map((p) => p.partNumber)).size).toBe(100);
    expect((await tracker.getStatus("big.bin")).isCompleted).toBe(true);
  });

  it("returns NOT_FOUND for unknown keys", async () => {
    const tracker = new InMemoryUploadTracker();

    expect(await codeOf(tracker.addPart("nope", 1, "e"))).toBe("NOT_FOUND");
    expect(await codeOf(tracker.getUploadID("nope"))).toBe("NOT_FOUND");
    expect(await codeOf(tracker.getParts("nope"))).toBe("NOT_FOUND");
    expect(await codeOf(tracker.getStatus("nope"))).toBe("NOT_FOUND");
    expect(await codeOf(tracker.completeUpload("nope"))).toBe("NOT_FOUND");
  });

  it("completes regardless of received parts", async () => {
    const tracker = new InMemoryUploadTracker();
    await tracker.createUpload("a.bin", "u-1", 3);
    await tracker.addPart("a.bin", 1, "e1");

    await tracker.completeUpload("a.bin");

    expect(tracker.size).toBe(0);
    expect(await codeOf(tracker.getStatus("a.bin"))).toBe("NOT_FOUND");
  });

  it("aborts silently, even twice", async () => {
    const tracker = new InMemoryUploadTracker();
    await tracker.createUpload("a.bin", "u-1", 1);

    await tracker.abortUpload("a.bin");
    await expect(tracker.abortUpload("a.bin")).resolves.toBeUndefined();
    await expect(tracker.abortUpload("never")).resolves.toBeUndefined();
    expect(tracker.size).toBe(0);
  });

  it("allows a key to be reused after it is removed", async () => {
    const tracker = new InMemoryUploadTracker();
    await tracker.createUpload("a.bin", "u-1", 1);
    await tracker.addPart("a.bin", 1, "e1");
    await tracker.abortUpload("a.bin");

    await tracker.createUpload("a.bin", "u-2", 4);
    expect(await tracker.getUploadID("a.bin")).toBe("u-2");
    expect(await tracker.getParts("a.bin")).toEqual([]);
  });

  it("does not bound part numbers", async () => {
    const tracker = new InMemoryUploadTracker();
    await tracker.createUpload("a.bin", "u-1", 2);
    await tracker.addPart("a.bin", 7, "e7");

    expect(await tracker.getStatus("a.bin")).toEqual({
      isCompleted: false,
      totalParts: 2,
      completedParts: 1,
    });
  });

  it("keeps uploads independent", async () => {
    const tracker = new InMemoryUploadTracker();
    await tracker.createUpload("a.bin", "u-a", 1);
    await tracker.createUpload("b.bin", "u-b", 2);
    await tracker.addPart("a.bin", 1, "ea");

    expect((await tracker.getStatus("a.bin")).isCompleted).toBe(true);
    expect((await tracker.getStatus("b.bin")).completedParts).toBe(0);
    expect(tracker.size).toBe(2);
  });

  describe("expiry", () => {
    it("never evicts without a ttl", async () => {
      const tracker = new InMemoryUploadTracker({ now: () => 0 });
      await tracker.createUpload("a.bin", "u-1", 1);

      expect(tracker.evictExpired(Number.MAX_SAFE_INTEGER)).toEqual([]);
      expect(tracker.size).toBe(1);
    });

    it("evicts records whose ttl elapsed", async () => {
      let clock = 1_000;
      const tracker = new InMemoryUploadTracker({ ttlMs: 500, now: () => clock });

      await tracker.createUpload("old.bin", "u-old", 1);
      clock = 1_300;
      await tracker.createUpload("new.bin", "u-new", 1);

      clock = 1_499;
      expect(tracker.evictExpired()).toEqual([]);

      clock = 1_500;
      expect(tracker.evictExpired()).toEqual([{ key: "old.bin", uploadID: "u-old" }]);
      expect(tracker.size).toBe(1);
      expect(await tracker.getUploadID("new.bin")).toBe("u-new");

      expect(tracker.evictExpired(1_800)).toEqual([{ key: "new.bin", uploadID: "u-new" }]);
      expect(tracker.size).toBe(0);
    });

    it("keeps expired records the caller asks to keep", async () => {
      const tracker = new InMemoryUploadTracker({ ttlMs: 100, now: () => 0 });
      await tracker.createUpload("busy.bin", "u-busy", 1);
      await tracker.createUpload("idle.bin", "u-idle", 1);

      expect(tracker.evictExpired(100, (key) => key === "busy.bin")).toEqual([
        { key: "idle.bin", uploadID: "u-idle" },
      ]);
      expect(await tracker.getUploadID("busy.bin")).toBe("u-busy");
    });
  });

  it("is what the default factory builds", () => {
    const tracker = createInMemoryUploadTracker();

    expect(tracker).toBeInstanceOf(InMemoryUploadTracker);
    expect(tracker.size).toBe(0);
  });
});
