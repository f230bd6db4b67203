// src/logger.ts

import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(options?: { name?: string; level?: string }): Logger {
  return pino({
    name: options?.name ?? "multipart-tracker",
    level:
      options?.level ??
      process.env.LOG_LEVEL ??
      (process.env.NODE_ENV === "production" ? "info" : "debug"),
    redact: {
      paths: ["secret", "*.secret", "token", "*.token"],
      remove: true,
    },
  });
}
