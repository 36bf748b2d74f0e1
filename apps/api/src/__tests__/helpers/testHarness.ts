import crypto from "crypto";

import { loadUploadConfig, type UploadConfig } from "../../config/uploads.config.js";
import { createBlobLimiter } from "../../services/upload/blob.limiter.js";
import { initiateUpload, writeChunk } from "../../services/upload/upload.coordinator.js";
import type { UploadDeps } from "../../services/upload/upload.deps.js";
import { MemorySessionStore } from "../../state/memory.session.store.js";
import type { BlobStat } from "../../store/blob.store.js";
import { BlobUrlSigner } from "../../store/blob.token.js";
import { MemoryAccessLogStore } from "../../store/memory.access.log.store.js";
import { MemoryBlobStore } from "../../store/memory.blob.store.js";
import { MemoryFileStore } from "../../store/memory.file.store.js";
import type { FileRecord, InitiateUploadInput } from "../../types/upload.js";
import { silentLogger } from "../../utils/logger.js";

export const BASE_TIME = Date.UTC(2026, 0, 15, 12, 0, 0);
export const TEST_SECRET = "test-secret-value";
export const TEST_BUCKET = "test-bucket";
export const BLOB_BASE_URL = "http://blobs.test";

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

export class TestClock {
  constructor(public current = BASE_TIME) {}

  now = () => this.current;

  advance(ms: number) {
    this.current += ms;
  }
}

/**
 * Memory blob store that counts compose calls and can be told to fail or
 * stall them.
 */
export class ScriptedBlobStore extends MemoryBlobStore {
  composeCalls = 0;
  composeDelayMs = 0;
  private composeFailures: Error[] = [];

  failNextCompose(err: Error) {
    this.composeFailures.push(err);
  }

  async compose(keys: string[], destination: string): Promise<BlobStat> {
    this.composeCalls++;
    if (this.composeDelayMs > 0) {
      await new Promise((r) => setTimeout(r, this.composeDelayMs));
    }
    const failure = this.composeFailures.shift();
    if (failure) throw failure;
    return super.compose(keys, destination);
  }
}

export function testUploadConfig(): UploadConfig {
  const base = loadUploadConfig({});
  return {
    ...base,
    maxSingleUploadBytes: 64,
    chunk: { minBytes: 4, maxBytes: 64, defaultBytes: 8 },
    finalize: { leaseMs: MINUTE, waitMs: 250, pollMs: 5 },
    blob: {
      ...base.blob,
      maxRetries: 2,
      baseRetryDelayMs: 1,
      timeoutMs: 2_000,
    },
  };
}

export interface TestHarness {
  deps: UploadDeps;
  clock: TestClock;
  sessions: MemorySessionStore;
  files: MemoryFileStore;
  blobs: ScriptedBlobStore;
  accessLog: MemoryAccessLogStore;
  signer: BlobUrlSigner;
}

export function createHarness(
  configure: (config: UploadConfig) => UploadConfig = (config) => config
): TestHarness {
  const clock = new TestClock();
  const config = configure(testUploadConfig());
  const signer = new BlobUrlSigner(TEST_SECRET, BLOB_BASE_URL, clock.now);

  const sessions = new MemorySessionStore(clock.now);
  const files = new MemoryFileStore();
  const blobs = new ScriptedBlobStore(TEST_BUCKET, signer, clock.now);
  const accessLog = new MemoryAccessLogStore();

  const deps: UploadDeps = {
    sessions,
    files,
    blobs,
    accessLog,
    limiter: createBlobLimiter(config.blob),
    config,
    log: silentLogger,
    now: clock.now,
  };

  return { deps, clock, sessions, files, blobs, accessLog, signer };
}

export function sha256(content: Buffer | string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

/** `length` bytes of a repeating alphabet, so chunk boundaries are visible. */
export function bytes(length: number): Buffer {
  const alphabet = "abcdefghijklmnopqrstuvwxyz";
  return Buffer.from(Array.from({ length }, (_, i) => alphabet[i % alphabet.length]).join(""));
}

export function makeRecord(overrides: Partial<FileRecord> = {}): FileRecord {
  const fileId = overrides.fileId ?? crypto.randomUUID();
  return {
    fileId,
    fileName: "fixture.bin",
    contentHash: null,
    size: 10,
    mimeType: "application/octet-stream",
    bucket: TEST_BUCKET,
    objectKey: `files/team-a/2026-01-15/${fileId}/fixture.bin`,
    storageLocation: null,
    status: "PENDING",
    scope: "team-a",
    createdBy: "alice",
    uploadId: null,
    error: null,
    createdAt: BASE_TIME,
    updatedAt: BASE_TIME,
    expiresAt: null,
    ...overrides,
  };
}

/** Opens a session for `content` and optionally writes some or all of its chunks. */
export async function openUpload(
  deps: UploadDeps,
  content: Buffer,
  options: Partial<InitiateUploadInput> & { writeChunks?: number[] | "all" } = {}
): Promise<{ uploadId: string; fileId: string; totalChunks: number }> {
  const { writeChunks = "all", ...input } = options;

  const result = await initiateUpload(deps, {
    fileName: "report.bin",
    totalSize: content.length,
    scope: "team-a",
    createdBy: "alice",
    ...input,
  });
  if (result.isDuplicate) {
    throw new Error(`expected a new session, got duplicate of ${result.fileId}`);
  }

  const { uploadId, fileId, chunkSize, totalChunks } = result;
  const numbers =
    writeChunks === "all" ? Array.from({ length: totalChunks }, (_, i) => i + 1) : writeChunks;

  for (const n of numbers) {
    await writeChunk(deps, uploadId, n, content.subarray((n - 1) * chunkSize, n * chunkSize));
  }

  return { uploadId, fileId, totalChunks };
}
