// src/services/upload/upload.deps.ts

import type { UploadConfig } from "../../config/uploads.config.js";
import type { SessionStore } from "../../state/session.store.js";
import type { AccessLogStore } from "../../store/access.log.store.js";
import type { BlobStore } from "../../store/blob.store.js";
import type { FileStore } from "../../store/file.store.js";
import type { Log } from "../../utils/logger.js";
import type { BlobLimiter } from "./blob.limiter.js";
import type { BlobOperationContext } from "./blob.metrics.js";

export interface UploadDeps {
  sessions: SessionStore;
  files: FileStore;
  blobs: BlobStore;
  accessLog: AccessLogStore;
  limiter: BlobLimiter;
  config: UploadConfig;
  log: Log;
  now: () => number;
}

export function blobContext(deps: UploadDeps): BlobOperationContext {
  return { log: deps.log, limits: deps.config.blob };
}
