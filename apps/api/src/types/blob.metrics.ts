// src/types/blob.metrics.ts

import type { Log } from "../utils/logger.js";

export type BlobOperation =
  | "put"
  | "compose"
  | "delete"
  | "exists"
  | "stat"
  | "list"
  | "sign";

export type BlobOperationOutcome =
  | "success"
  | "auth_failed"
  | "not_found"
  | "rate_limited"
  | "network_error"
  | "timeout"
  | "client_error"
  | "server_error"
  | "unknown_error";

export interface BlobOperationMetric {
  operation: BlobOperation;
  key: string;
  attempt: number;
  durationMs: number;
  outcome: BlobOperationOutcome;
  error?: string;
  httpStatus?: number;
  timestamp: number;
}

const RETRYABLE_OUTCOMES = new Set<BlobOperationOutcome>([
  "rate_limited",
  "network_error",
  "timeout",
  "server_error",
]);

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EPIPE",
]);

export function recordBlobOperationMetric(
  log: Log,
  metric: BlobOperationMetric
) {
  if (metric.outcome === "success") {
    log.debug({ metric }, "blob.operation.metric");
  } else {
    log.warn({ metric }, "blob.operation.metric");
  }
}

export function extractHttpStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  const code = err.code;
  if (typeof code === "number" && code >= 100 && code <= 599) return code;
  return undefined;
}

export function classifyBlobError(err: unknown): BlobOperationOutcome {
  if (!(err instanceof Error)) return "unknown_error";

  if (err.name === "AbortError" || err.message === "BLOB_OPERATION_TIMEOUT") {
    return "timeout";
  }

  const status = extractHttpStatus(err);
  if (status !== undefined) {
    if (status === 401 || status === 403) return "auth_failed";
    if (status === 404) return "not_found";
    if (status === 408) return "timeout";
    if (status === 429) return "rate_limited";
    if (status >= 400 && status <= 499) return "client_error";
    if (status >= 500) return "server_error";
  }

  const code = "code" in err ? err.code : undefined;
  if (typeof code === "string") {
    if (NETWORK_ERROR_CODES.has(code)) return "network_error";
    if (code === "ENOENT") return "not_found";
  }

  const msg = err.message.toUpperCase();
  if (msg.includes("FETCH FAILED") || msg.includes("SOCKET HANG UP")) {
    return "network_error";
  }

  return "unknown_error";
}

export function isRetryableOutcome(outcome: BlobOperationOutcome): boolean {
  return RETRYABLE_OUTCOMES.has(outcome);
}
