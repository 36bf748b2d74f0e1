import PQueue from "p-queue";
import { describe, expect, it, vi } from "vitest";

import { classifyBlobError, extractHttpStatus, isRetryableOutcome } from "../../../types/blob.metrics.js";
import { UploadError, ValidationError } from "../../../utils/apiError.js";
import { silentLogger } from "../../../utils/logger.js";
import { runBlobOperation, type BlobOperationContext } from "../blob.metrics.js";

const ctx: BlobOperationContext = {
  log: silentLogger,
  limits: {
    maxRetries: 3,
    baseRetryDelayMs: 1,
    timeoutMs: 50,
    composeConcurrency: 1,
    cleanupConcurrency: 1,
  },
};

const withStatus = (status: number) => Object.assign(new Error(`status ${status}`), { code: status });

describe("classifyBlobError", () => {
  it("maps HTTP statuses", () => {
    expect(classifyBlobError(withStatus(403))).toBe("auth_failed");
    expect(classifyBlobError(withStatus(404))).toBe("not_found");
    expect(classifyBlobError(withStatus(429))).toBe("rate_limited");
    expect(classifyBlobError(withStatus(412))).toBe("client_error");
    expect(classifyBlobError(withStatus(503))).toBe("server_error");
  });

  it("maps socket codes and timeouts", () => {
    expect(classifyBlobError(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe(
      "network_error"
    );
    expect(classifyBlobError(Object.assign(new Error("gone"), { code: "ENOENT" }))).toBe("not_found");
    expect(classifyBlobError(new Error("BLOB_OPERATION_TIMEOUT"))).toBe("timeout");
    expect(classifyBlobError(new Error("socket hang up"))).toBe("network_error");
    expect(classifyBlobError("boom")).toBe("unknown_error");
  });

  it("only retries transient outcomes", () => {
    expect(isRetryableOutcome("server_error")).toBe(true);
    expect(isRetryableOutcome("timeout")).toBe(true);
    expect(isRetryableOutcome("client_error")).toBe(false);
    expect(isRetryableOutcome("unknown_error")).toBe(false);
  });

  it("reads numeric codes only", () => {
    expect(extractHttpStatus(withStatus(500))).toBe(500);
    expect(extractHttpStatus({ code: "EPIPE" })).toBeUndefined();
    expect(extractHttpStatus(null)).toBeUndefined();
  });
});

describe("runBlobOperation", () => {
  it("retries transient failures until one succeeds", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(withStatus(503))
      .mockRejectedValueOnce(withStatus(429))
      .mockResolvedValueOnce("ok");

    await expect(runBlobOperation(ctx, { operation: "put", key: "k" }, fn)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("stops at maxRetries with a retryable upstream error", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(withStatus(500));

    await expect(runBlobOperation(ctx, { operation: "compose", key: "k" }, fn)).rejects.toMatchObject({
      code: "BLOB_STORE_UNAVAILABLE",
      statusCode: 502,
      retryable: true,
      details: { operation: "compose", key: "k", outcome: "server_error", attempts: 3 },
    });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry permanent failures", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(withStatus(403));

    await expect(runBlobOperation(ctx, { operation: "stat", key: "k" }, fn)).rejects.toMatchObject({
      code: "BLOB_STORE_UNAVAILABLE",
      retryable: false,
      details: { outcome: "auth_failed", attempts: 1 },
    });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives streamed bodies a single attempt", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(withStatus(503));

    await expect(
      runBlobOperation(ctx, { operation: "put", key: "k", maxAttempts: 1 }, fn)
    ).rejects.toMatchObject({ details: { attempts: 1 } });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("passes its own errors through untouched", async () => {
    const own = new ValidationError("INVALID_CHUNK", "bad key");
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(own);

    const err = await runBlobOperation(ctx, { operation: "put", key: "k" }, fn).catch(
      (e: unknown) => e
    );
    expect(err).toBe(own);
    expect(err).toBeInstanceOf(UploadError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("times out each attempt", async () => {
    const fn = vi.fn(() => new Promise<string>(() => undefined));

    await expect(
      runBlobOperation(ctx, { operation: "list", key: "k", maxAttempts: 1 }, fn)
    ).rejects.toMatchObject({ details: { outcome: "timeout" } });
  });

  it("does not repeat an attempt that timed out", async () => {
    const fn = vi.fn(() => new Promise<string>(() => undefined));

    await expect(runBlobOperation(ctx, { operation: "compose", key: "k" }, fn)).rejects.toMatchObject({
      code: "BLOB_STORE_UNAVAILABLE",
      retryable: true,
      details: { outcome: "timeout", attempts: 1 },
    });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("runs through the queue when one is given", async () => {
    const queue = new PQueue({ concurrency: 1 });

    const result = await runBlobOperation(ctx, { operation: "delete", key: "k", queue }, async () => 7);

    expect(result).toBe(7);
    expect(queue.size).toBe(0);
  });
});
