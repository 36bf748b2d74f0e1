import path from "path";
import { describe, expect, it } from "vitest";

import { loggerSettings } from "../../utils/logger.js";
import { loadStorageConfig } from "../storage.config.js";
import { loadUploadConfig } from "../uploads.config.js";

const MB = 1024 * 1024;
const SECRET = "test-signing-secret";

describe("loadUploadConfig", () => {
  it("falls back to defaults", () => {
    const config = loadUploadConfig({});

    expect(config.chunk).toEqual({ minBytes: 256 * 1024, maxBytes: 20 * MB, defaultBytes: 5 * MB });
    expect(config.maxSingleUploadBytes).toBe(10 * MB);
    expect(config.sessionTtlMs).toBe(6 * 60 * 60 * 1000);
    expect(config.downloadTtl).toEqual({
      minMs: 60 * 1000,
      maxMs: 7 * 24 * 60 * 60 * 1000,
      defaultMs: 60 * 60 * 1000,
    });
    expect(config.gc.enabled).toBe(true);
  });

  it("reads overrides", () => {
    const config = loadUploadConfig({
      CHUNK_DEFAULT_BYTES: String(8 * MB),
      UPLOAD_MAX_ACTIVE: "5",
      BLOB_MAX_RETRIES: "7",
      GC_ENABLED: "false",
    });

    expect(config.chunk.defaultBytes).toBe(8 * MB);
    expect(config.maxActiveUploads).toBe(5);
    expect(config.blob.maxRetries).toBe(7);
    expect(config.gc.enabled).toBe(false);
  });

  it("rejects values it cannot use", () => {
    expect(() => loadUploadConfig({ UPLOAD_MAX_ACTIVE: "0" })).toThrow(
      "UPLOAD_MAX_ACTIVE must be an integer >= 1"
    );
    expect(() => loadUploadConfig({ UPLOAD_MAX_TOTAL_CHUNKS: "1" })).toThrow(
      "UPLOAD_MAX_TOTAL_CHUNKS must be an integer >= 2"
    );
    expect(() => loadUploadConfig({ GC_ENABLED: "yes" })).toThrow(
      "GC_ENABLED must be one of true, false, 1, 0"
    );
    expect(() => loadUploadConfig({ CHUNK_MIN_BYTES: String(30 * MB) })).toThrow(
      "CHUNK_MIN_BYTES must not exceed CHUNK_MAX_BYTES"
    );
    expect(() => loadUploadConfig({ CHUNK_DEFAULT_BYTES: "1024" })).toThrow(
      "CHUNK_DEFAULT_BYTES must lie within [CHUNK_MIN_BYTES, CHUNK_MAX_BYTES]"
    );
    expect(() =>
      loadUploadConfig({ FINALIZE_LEASE_MS: "600000", BLOB_OPERATION_TIMEOUT_MS: "600000" })
    ).toThrow("FINALIZE_LEASE_MS must exceed BLOB_OPERATION_TIMEOUT_MS");
    expect(() => loadUploadConfig({ DOWNLOAD_URL_TTL_MS: "1000" })).toThrow(
      "DOWNLOAD_URL_TTL_MS must lie between 60 seconds and 7 days"
    );
  });
});

describe("loadStorageConfig", () => {
  it("defaults to Redis state and GCS blobs", () => {
    const config = loadStorageConfig({
      UPSTASH_REDIS_REST_URL: "https://redis.example.test",
      UPSTASH_REDIS_REST_TOKEN: "test-token",
      STORAGE_BUCKET: "uploads",
    });

    expect(config).toEqual({
      state: { backend: "redis", url: "https://redis.example.test", token: "test-token" },
      blob: { backend: "gcs", bucket: "uploads", projectId: undefined, keyFilename: undefined },
      port: 3000,
    });
  });

  it("builds a self-contained memory setup", () => {
    const config = loadStorageConfig({
      STATE_BACKEND: "memory",
      BLOB_BACKEND: "memory",
      BLOB_SIGNING_SECRET: SECRET,
      PORT: "8080",
    });

    expect(config).toEqual({
      state: { backend: "memory" },
      blob: {
        backend: "memory",
        bucket: "filedock-uploads",
        signingSecret: SECRET,
        publicBaseUrl: "http://localhost:8080",
      },
      port: 8080,
    });
  });

  it("resolves the disk root", () => {
    const config = loadStorageConfig({
      STATE_BACKEND: "memory",
      BLOB_BACKEND: "disk",
      BLOB_SIGNING_SECRET: SECRET,
      BLOB_DISK_ROOT: "./data/blobs",
      PUBLIC_BASE_URL: "https://files.example.test/",
    });

    expect(config.blob).toMatchObject({
      backend: "disk",
      rootDir: path.resolve("./data/blobs"),
      publicBaseUrl: "https://files.example.test",
    });
  });

  it("fails fast on missing or malformed settings", () => {
    expect(() => loadStorageConfig({ STATE_BACKEND: "memory" })).toThrow(
      "Missing required env: STORAGE_BUCKET"
    );
    expect(() =>
      loadStorageConfig({ UPSTASH_REDIS_REST_URL: "redis://x", UPSTASH_REDIS_REST_TOKEN: "t" })
    ).toThrow("UPSTASH_REDIS_REST_URL must start with http:// or https://");
    expect(() =>
      loadStorageConfig({ STATE_BACKEND: "memory", BLOB_BACKEND: "memory", BLOB_SIGNING_SECRET: "short" })
    ).toThrow("BLOB_SIGNING_SECRET must be at least 16 characters");
    expect(() => loadStorageConfig({ STATE_BACKEND: "sqlite" })).toThrow(
      "STATE_BACKEND must be one of redis, memory"
    );
  });
});

describe("loggerSettings", () => {
  it("picks the level from the environment", () => {
    expect(loggerSettings({ LOG_LEVEL: "warn" }).level).toBe("warn");
    expect(loggerSettings({ NODE_ENV: "production" }).level).toBe("info");
    expect(loggerSettings({}).level).toBe("debug");
  });

  it("keeps credentials out of request logs", () => {
    expect(loggerSettings({}).redact).toEqual({
      paths: ["req.headers.authorization"],
      remove: true,
    });
  });
});
