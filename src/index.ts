// src/index.ts

export * from "./state/index.js";
export * from "./store/index.js";
export * from "./services/upload/upload.orchestrator.js";
export * from "./services/upload/upload.parts.js";
export { createPartQueue } from "./services/upload/upload.limiter.js";
export * from "./config/uploads.config.js";
export * from "./config/storage.config.js";
export * from "./utils/uploadError.js";
export * from "./utils/env.js";
export * from "./types/upload.js";
export { createLogger, type Logger } from "./logger.js";
