// src/services/upload/blob.limiter.ts

import PQueue from "p-queue";

import type { BlobOperationLimits } from "../../config/uploads.config.js";

export interface BlobLimiter {
  /** Compose calls; each one can be long-running upstream work. */
  compose: PQueue;
  /** Background deletion of chunk objects after a commit. */
  cleanup: PQueue;
}

export function createBlobLimiter(limits: BlobOperationLimits): BlobLimiter {
  return {
    compose: new PQueue({
      concurrency: limits.composeConcurrency,
      carryoverConcurrencyCount: true,
    }),
    cleanup: new PQueue({ concurrency: limits.cleanupConcurrency }),
  };
}
