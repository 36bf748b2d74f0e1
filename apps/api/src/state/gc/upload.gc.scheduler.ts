// src/state/gc/upload.gc.scheduler.ts

import type { UploadDeps } from "../../services/upload/upload.deps.js";
import { runUploadGc } from "./upload.gc.worker.js";

let timer: NodeJS.Timeout | null = null;
let running: Promise<void> | null = null;

export function startUploadGc(deps: UploadDeps): boolean {
  if (timer) return true;

  const { enabled, intervalMs } = deps.config.gc;
  if (!enabled) {
    deps.log.info("Upload GC disabled");
    return false;
  }

  deps.log.info({ intervalMs }, "Upload GC started");

  timer = setInterval(() => {
    if (running) return; // prevent overlap

    running = runUploadGc(deps)
      .then((report) => {
        deps.log.debug({ report }, "Upload GC run finished");
      })
      .catch((err: unknown) => {
        deps.log.error({ err }, "Upload GC failed");
      })
      .finally(() => {
        running = null;
      });
  }, intervalMs);

  timer.unref();
  return true;
}

export async function stopUploadGc(): Promise<void> {
  if (timer) {
    clearInterval(timer);
    timer = null;
  }

  if (running) {
    await running;
    running = null;
  }
}
