import { describe, expect, it } from "vitest";

import { createLogger } from "../logger.js";

describe("createLogger", () => {
  it("uses the requested level", () => {
    expect(createLogger({ level: "warn" }).level).toBe("warn");
  });

  it("binds the service name", () => {
    expect(createLogger({ level: "silent" }).bindings()).toMatchObject({
      name: "multipart-tracker",
    });
    expect(createLogger({ name: "gc", level: "silent" }).bindings()).toMatchObject({
      name: "gc",
    });
  });
});
