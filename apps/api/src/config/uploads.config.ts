// src/config/uploads.config.ts

import { type Env, parseBooleanEnv, parsePositiveIntEnv } from "./env.js";

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const MB = 1024 * 1024;

export interface ChunkLimits {
  minBytes: number;
  maxBytes: number;
  defaultBytes: number;
}

export interface FinalizeLimits {
  /** A commit claim older than this may be taken over by another caller. */
  leaseMs: number;
  /** How long a losing caller polls for the winner's terminal status. */
  waitMs: number;
  pollMs: number;
}

export interface BlobOperationLimits {
  maxRetries: number;
  baseRetryDelayMs: number;
  timeoutMs: number;
  composeConcurrency: number;
  cleanupConcurrency: number;
}

export interface GcSettings {
  enabled: boolean;
  intervalMs: number;
  graceMs: number;
  failedRetentionMs: number;
  accessLogRetentionMs: number;
}

export interface UploadConfig {
  maxFileSizeBytes: number;
  maxSingleUploadBytes: number;
  maxActiveUploads: number;
  maxTotalChunks: number;
  sessionTtlMs: number;
  chunkUrlTtlMs: number;
  downloadTtl: { minMs: number; maxMs: number; defaultMs: number };
  chunk: ChunkLimits;
  finalize: FinalizeLimits;
  blob: BlobOperationLimits;
  gc: GcSettings;
}

export function loadUploadConfig(env: Env = process.env): UploadConfig {
  const chunk: ChunkLimits = {
    minBytes: parsePositiveIntEnv(env, "CHUNK_MIN_BYTES", 256 * 1024),
    maxBytes: parsePositiveIntEnv(env, "CHUNK_MAX_BYTES", 20 * MB),
    defaultBytes: parsePositiveIntEnv(env, "CHUNK_DEFAULT_BYTES", 5 * MB),
  };

  if (chunk.minBytes > chunk.maxBytes) {
    throw new Error("CHUNK_MIN_BYTES must not exceed CHUNK_MAX_BYTES");
  }
  if (chunk.defaultBytes < chunk.minBytes || chunk.defaultBytes > chunk.maxBytes) {
    throw new Error("CHUNK_DEFAULT_BYTES must lie within [CHUNK_MIN_BYTES, CHUNK_MAX_BYTES]");
  }

  const downloadTtl = {
    minMs: 60 * 1000,
    maxMs: 7 * DAY,
    defaultMs: parsePositiveIntEnv(env, "DOWNLOAD_URL_TTL_MS", HOUR),
  };
  if (downloadTtl.defaultMs < downloadTtl.minMs || downloadTtl.defaultMs > downloadTtl.maxMs) {
    throw new Error("DOWNLOAD_URL_TTL_MS must lie between 60 seconds and 7 days");
  }

  const finalize: FinalizeLimits = {
    leaseMs: parsePositiveIntEnv(env, "FINALIZE_LEASE_MS", 15 * MINUTE),
    waitMs: parsePositiveIntEnv(env, "FINALIZE_WAIT_MS", 30 * 1000),
    pollMs: parsePositiveIntEnv(env, "FINALIZE_POLL_MS", 250),
  };

  const blob: BlobOperationLimits = {
    maxRetries: parsePositiveIntEnv(env, "BLOB_MAX_RETRIES", 3),
    baseRetryDelayMs: parsePositiveIntEnv(env, "BLOB_RETRY_DELAY_MS", 500),
    timeoutMs: parsePositiveIntEnv(env, "BLOB_OPERATION_TIMEOUT_MS", 10 * MINUTE),
    composeConcurrency: parsePositiveIntEnv(env, "BLOB_COMPOSE_CONCURRENCY", 3),
    cleanupConcurrency: parsePositiveIntEnv(env, "BLOB_CLEANUP_CONCURRENCY", 8),
  };

  // Compose runs once under the claim; the claim must outlive it.
  if (finalize.leaseMs <= blob.timeoutMs) {
    throw new Error("FINALIZE_LEASE_MS must exceed BLOB_OPERATION_TIMEOUT_MS");
  }

  return {
    maxFileSizeBytes: parsePositiveIntEnv(env, "UPLOAD_MAX_FILE_BYTES", 15 * 1024 * MB),
    maxSingleUploadBytes: parsePositiveIntEnv(env, "UPLOAD_MAX_SINGLE_BYTES", 10 * MB),
    maxActiveUploads: parsePositiveIntEnv(env, "UPLOAD_MAX_ACTIVE", 100),
    maxTotalChunks: parsePositiveIntEnv(env, "UPLOAD_MAX_TOTAL_CHUNKS", 10_000, 2),
    sessionTtlMs: parsePositiveIntEnv(env, "UPLOAD_SESSION_TTL_MS", 6 * HOUR),
    chunkUrlTtlMs: parsePositiveIntEnv(env, "CHUNK_URL_TTL_MS", 15 * MINUTE),
    downloadTtl,
    chunk,

    finalize,
    blob,

    gc: {
      enabled: parseBooleanEnv(env, "GC_ENABLED", true),
      intervalMs: parsePositiveIntEnv(env, "GC_INTERVAL_MS", 5 * MINUTE),
      graceMs: parsePositiveIntEnv(env, "GC_GRACE_MS", 15 * MINUTE),
      failedRetentionMs: parsePositiveIntEnv(env, "FAILED_UPLOAD_RETENTION_MS", 7 * DAY),
      accessLogRetentionMs: parsePositiveIntEnv(env, "ACCESS_LOG_RETENTION_MS", 90 * DAY),
    },
  };
}
