// src/services/upload/blob.metrics.ts

import type PQueue from "p-queue";

import type { BlobOperationLimits } from "../../config/uploads.config.js";
import {
  classifyBlobError,
  extractHttpStatus,
  isRetryableOutcome,
  recordBlobOperationMetric,
  type BlobOperation,
} from "../../types/blob.metrics.js";
import { UploadError, UpstreamError } from "../../utils/apiError.js";
import type { Log } from "../../utils/logger.js";

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error("BLOB_OPERATION_TIMEOUT")), timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface BlobOperationContext {
  log: Log;
  limits: BlobOperationLimits;
}

export interface BlobOperationOptions {
  operation: BlobOperation;
  key: string;
  queue?: PQueue;
  /**
   * Streamed bodies cannot be replayed and compose must not overlap itself;
   * both get exactly one attempt.
   */
  maxAttempts?: number;
}

/**
 * Runs one blob-store call with a per-attempt timeout and bounded
 * retry/backoff for transient failures, except timeouts. Whatever is not
 * repeated surfaces as `BLOB_STORE_UNAVAILABLE`.
 */
export async function runBlobOperation<T>(
  ctx: BlobOperationContext,
  options: BlobOperationOptions,
  fn: () => Promise<T>
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? ctx.limits.maxRetries;

  const attemptAll = async (): Promise<T> => {
    const start = Date.now();

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await withTimeout(fn, ctx.limits.timeoutMs);

        recordBlobOperationMetric(ctx.log, {
          operation: options.operation,
          key: options.key,
          attempt,
          durationMs: Date.now() - start,
          outcome: "success",
          timestamp: Date.now(),
        });

        return result;
      } catch (err) {
        // Our own errors (bad key and the like) are not upstream failures.
        if (err instanceof UploadError) throw err;

        const outcome = classifyBlobError(err);
        recordBlobOperationMetric(ctx.log, {
          operation: options.operation,
          key: options.key,
          attempt,
          durationMs: Date.now() - start,
          outcome,
          error: err instanceof Error ? err.message : String(err),
          httpStatus: extractHttpStatus(err),
          timestamp: Date.now(),
        });

        const retryable = isRetryableOutcome(outcome);
        // A timed-out call may still be running; repeating it would race it.
        const repeat = retryable && outcome !== "timeout" && attempt < maxAttempts;
        if (!repeat) {
          throw new UpstreamError(
            "BLOB_STORE_UNAVAILABLE",
            `Blob store ${options.operation} failed (${outcome})`,
            {
              retryable,
              cause: err,
              details: { operation: options.operation, key: options.key, outcome, attempts: attempt },
            }
          );
        }

        await sleep(ctx.limits.baseRetryDelayMs * attempt);
      }
    }
  };

  if (!options.queue) return attemptAll();

  const queued = await options.queue.add(attemptAll, { throwOnTimeout: true });
  return queued;
}
