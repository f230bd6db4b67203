// src/state/gc/upload.gc.scheduler.ts

import { GcConfig } from "../../config/uploads.config.js";
import { runUploadGc, type UploadGcDeps } from "./upload.gc.worker.js";

export interface UploadGcHandle {
  stop(): Promise<void>;
}

export function startUploadGc(
  deps: UploadGcDeps,
  intervalMs: number = GcConfig.gcInterval
): UploadGcHandle {
  let running: Promise<void> | null = null;

  deps.log.info({ intervalMs }, "Upload GC started");

  const timer = setInterval(() => {
    if (running) return; // prevent overlap

    running = runUploadGc(deps)
      .then(() => undefined)
      .catch((err: unknown) => {
        deps.log.error({ err }, "Upload GC failed");
      })
      .finally(() => {
        running = null;
      });
  }, intervalMs);

  timer.unref();

  let stopped = false;

  return {
    async stop() {
      if (!stopped) {
        clearInterval(timer);
        stopped = true;
      }

      if (running) {
        await running;
      }
    },
  };
}
