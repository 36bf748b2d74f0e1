import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { buildApp } from "../app.js";
import { createUploadEngine, type UploadEngine } from "../services/engine.js";
import {
  BLOB_BASE_URL,
  bytes,
  createHarness,
  sha256,
  type TestHarness,
} from "./helpers/testHarness.js";

const BOUNDARY = "----chunk-boundary";

function multipartBody(data: Buffer): Buffer {
  return Buffer.concat([
    Buffer.from(
      `--${BOUNDARY}\r\n` +
        'Content-Disposition: form-data; name="chunk"; filename="chunk.bin"\r\n' +
        "Content-Type: application/octet-stream\r\n\r\n"
    ),
    data,
    Buffer.from(`\r\n--${BOUNDARY}--\r\n`),
  ]);
}

function pathOf(url: string): string {
  return url.slice(BLOB_BASE_URL.length);
}

describe("HTTP API", () => {
  let h: TestHarness;
  let app: FastifyInstance;
  let engine: UploadEngine;

  beforeEach(async () => {
    h = createHarness();
    ({ app, engine } = await buildApp({
      config: h.deps.config,
      signer: h.signer,
      engine: () => createUploadEngine(h.deps),
    }));
  });

  afterEach(async () => {
    await app.close();
  });

  describe("chunked uploads", () => {
    async function putThroughSignedUrl(uploadId: string, chunkNumber: number, data: Buffer) {
      const authorized = await app.inject({
        method: "POST",
        url: `/v1/uploads/${uploadId}/chunks/${chunkNumber}/authorize`,
      });
      expect(authorized.statusCode).toBe(200);

      const stored = await app.inject({
        method: "PUT",
        url: pathOf(authorized.json<{ url: string }>().url),
        headers: { "content-type": "application/octet-stream" },
        payload: data,
      });
      expect(stored.statusCode).toBe(200);
      const { size, etag } = stored.json<{ size: number; etag: string }>();

      return app.inject({
        method: "POST",
        url: `/v1/uploads/${uploadId}/chunks/${chunkNumber}/ack`,
        payload: { size, tag: etag },
      });
    }

    it("goes from create to download", async () => {
      const content = bytes(20);

      const created = await app.inject({
        method: "POST",
        url: "/v1/uploads/create",
        payload: { fileName: "report.bin", totalSize: 20, scope: "team-a", createdBy: "alice" },
      });
      expect(created.statusCode).toBe(201);
      const { uploadId, fileId, totalChunks } = created.json<{
        uploadId: string;
        fileId: string;
        totalChunks: number;
      }>();
      expect(totalChunks).toBe(3);

      const first = await putThroughSignedUrl(uploadId, 1, content.subarray(0, 8));
      expect(first.json()).toEqual({ chunkNumber: 1, receivedChunks: 1, totalChunks: 3, complete: false });

      const second = await app.inject({
        method: "PUT",
        url: `/v1/uploads/${uploadId}/chunk/2`,
        headers: { "content-type": `multipart/form-data; boundary=${BOUNDARY}` },
        payload: multipartBody(content.subarray(8, 16)),
      });
      expect(second.statusCode).toBe(200);
      expect(second.json()).toEqual({
        accepted: true,
        chunkNumber: 2,
        receivedChunks: 2,
        totalChunks: 3,
        complete: false,
      });

      const third = await putThroughSignedUrl(uploadId, 3, content.subarray(16));
      expect(third.json<{ complete: boolean }>().complete).toBe(true);

      const completed = await app.inject({ method: "POST", url: `/v1/uploads/${uploadId}/complete` });
      expect(completed.statusCode).toBe(200);
      expect(completed.json()).toEqual({
        fileId,
        status: "COMPLETED",
        size: 20,
        storageLocation: `test-bucket/files/team-a/2026-01-15/${fileId}/report.bin`,
      });

      const status = await app.inject({ method: "GET", url: `/v1/uploads/${uploadId}/status` });
      expect(status.json()).toEqual({ uploadId, fileId, status: "COMPLETED", error: null });

      const link = await app.inject({
        method: "GET",
        url: `/v1/files/${fileId}/download?ttlMs=60000`,
        headers: { "x-user-id": "bob" },
      });
      expect(link.statusCode).toBe(200);

      const download = await app.inject({ method: "GET", url: pathOf(link.json<{ url: string }>().url) });
      expect(download.statusCode).toBe(200);
      expect(download.body).toBe(content.toString());
      expect(download.headers["content-disposition"]).toBe(
        "attachment; filename=\"report.bin\"; filename*=UTF-8''report.bin"
      );

      const log = await h.accessLog.listForFile(fileId);
      expect(log.map((e) => [e.accessType, e.userId])).toEqual([
        ["UPLOAD", "alice"],
        ["DOWNLOAD", "bob"],
      ]);
    });

    it("cancels through DELETE", async () => {
      const created = await app.inject({
        method: "POST",
        url: "/v1/uploads/create",
        payload: { fileName: "report.bin", totalSize: 20, scope: "team-a", createdBy: "alice" },
      });
      const { uploadId, fileId } = created.json<{ uploadId: string; fileId: string }>();

      const canceled = await app.inject({ method: "DELETE", url: `/v1/uploads/${uploadId}` });

      expect(canceled.statusCode).toBe(200);
      expect(canceled.json()).toEqual({ uploadId, fileId, status: "FAILED" });
    });

    it("answers incomplete uploads with a retryable conflict", async () => {
      const created = await app.inject({
        method: "POST",
        url: "/v1/uploads/create",
        payload: { fileName: "report.bin", totalSize: 20, scope: "team-a", createdBy: "alice" },
      });
      const { uploadId } = created.json<{ uploadId: string }>();

      const completed = await app.inject({ method: "POST", url: `/v1/uploads/${uploadId}/complete` });

      expect(completed.statusCode).toBe(409);
      expect(completed.json()).toEqual({
        error: {
          code: "UPLOAD_INCOMPLETE",
          message: "Only 0/3 chunks uploaded",
          retryable: true,
          details: { receivedChunks: 0, totalChunks: 3 },
        },
      });
    });
  });

  describe("single-shot files", () => {
    const content = Buffer.from("meeting notes");

    function postFile(query: string, headers: Record<string, string> = {}) {
      return app.inject({
        method: "POST",
        url: `/v1/files?${query}`,
        headers: {
          "content-type": "application/octet-stream",
          "x-content-sha256": sha256(content),
          "x-user-id": "carol",
          ...headers,
        },
        payload: content,
      });
    }

    it("stores, deduplicates, lists and deletes", async () => {
      const first = await postFile("fileName=notes.txt&scope=team-a&mimeType=text/plain");
      expect(first.statusCode).toBe(201);
      const { fileId } = first.json<{ fileId: string }>();

      const again = await postFile("fileName=other.txt&scope=team-a");
      expect(again.statusCode).toBe(200);
      expect(again.json()).toEqual({ fileId, isDuplicate: true });

      const meta = await app.inject({ method: "GET", url: `/v1/files/${fileId}` });
      expect(meta.json()).toMatchObject({
        fileId,
        fileName: "notes.txt",
        mimeType: "text/plain",
        createdBy: "carol",
        status: "COMPLETED",
      });

      const listed = await app.inject({ method: "GET", url: "/v1/files?scope=team-a&status=COMPLETED" });
      expect(listed.json()).toMatchObject({ total: 1, page: 1, size: 20 });

      const removed = await app.inject({ method: "DELETE", url: `/v1/files/${fileId}` });
      expect(removed.statusCode).toBe(204);

      const gone = await app.inject({ method: "GET", url: `/v1/files/${fileId}` });
      expect(gone.statusCode).toBe(404);
      expect(gone.json<{ error: { code: string } }>().error.code).toBe("FILE_NOT_FOUND");
    });

    it("requires the content hash header and metadata", async () => {
      const noHash = await app.inject({
        method: "POST",
        url: "/v1/files?fileName=a.txt&scope=team-a",
        headers: { "content-type": "application/octet-stream" },
        payload: content,
      });
      expect(noHash.statusCode).toBe(400);
      expect(noHash.json<{ error: { code: string } }>().error.code).toBe("INVALID_CONTENT_HASH");

      const noScope = await postFile("fileName=a.txt");
      expect(noScope.statusCode).toBe(400);
      expect(noScope.json<{ error: { code: string } }>().error.code).toBe("INVALID_REQUEST");
    });

    it("rejects a body that does not match its hash", async () => {
      const res = await postFile("fileName=a.txt&scope=team-a", { "x-content-sha256": sha256("other") });

      expect(res.statusCode).toBe(400);
      expect(res.json<{ error: { code: string } }>().error.code).toBe("HASH_MISMATCH");
    });

    it("rejects unknown status filters", async () => {
      const res = await app.inject({ method: "GET", url: "/v1/files?status=COMPLETED,LOST" });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: {
          code: "INVALID_QUERY",
          message: "Unknown status filter",
          retryable: false,
          details: { status: ["COMPLETED", "LOST"] },
        },
      });
    });
  });

  describe("error envelope", () => {
    it("reports a body that is not the expected shape", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/uploads/create",
        payload: { fileName: "a.bin" },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: {
          code: "INVALID_REQUEST_BODY",
          message: "Body must be JSON with fileName, totalSize, scope and createdBy",
          retryable: false,
        },
      });
    });

    it("reports malformed JSON as an invalid request", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/uploads/create",
        headers: { "content-type": "application/json" },
        payload: "{",
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<{ error: { code: string } }>().error.code).toBe("INVALID_REQUEST");
    });

    it("maps engine errors to their status", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/uploads/00000000-0000-4000-8000-000000000000/status",
      });

      expect(res.statusCode).toBe(404);
      expect(res.json<{ error: { code: string } }>().error.code).toBe("UPLOAD_NOT_FOUND");
    });

    it("hides unexpected failures", async () => {
      vi.spyOn(engine, "getFileMetadata").mockRejectedValueOnce(new Error("disk on fire"));

      const res = await app.inject({
        method: "GET",
        url: "/v1/files/00000000-0000-4000-8000-000000000000",
      });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({
        error: { code: "INTERNAL_ERROR", message: "Unexpected server error", retryable: false },
      });
    });
  });

  describe("blob URLs", () => {
    it("rejects tokens that do not verify", async () => {
      const res = await app.inject({ method: "GET", url: "/v1/blobs/not-a-token" });

      expect(res.statusCode).toBe(400);
      expect(res.json<{ error: { code: string } }>().error.code).toBe("INVALID_TOKEN");
    });

    it("stores a chunk of any content type as raw bytes", async () => {
      const { url } = h.signer.sign("chunks/u1/1", "PUT", 60_000);

      const res = await app.inject({
        method: "PUT",
        url: pathOf(url),
        headers: { "content-type": "application/json" },
        payload: '{"a":1}',
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ key: "chunks/u1/1", size: 7 });
    });

    it("refuses a body larger than one chunk", async () => {
      const { url } = h.signer.sign("chunks/u1/1", "PUT", 60_000);

      const res = await app.inject({
        method: "PUT",
        url: pathOf(url),
        headers: { "content-type": "application/octet-stream" },
        payload: bytes(65),
      });

      expect(res.statusCode).toBe(413);
      expect(res.json<{ error: { code: string } }>().error.code).toBe("FILE_TOO_LARGE");
      expect(await h.blobs.exists("chunks/u1/1")).toBe(false);
    });

    it("answers 404 for a signed key with no object", async () => {
      const { url } = h.signer.sign("files/team-a/missing.bin", "GET", 60_000);

      const res = await app.inject({ method: "GET", url: pathOf(url) });

      expect(res.statusCode).toBe(404);
      expect(res.json<{ error: { code: string } }>().error.code).toBe("BLOB_NOT_FOUND");
    });
  });

  describe("health", () => {
    it("is UP while the state store answers", async () => {
      const res = await app.inject({ method: "GET", url: "/health" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        status: "UP",
        service: "filedock-api-v1",
        ready: true,
        checks: { state: { ok: true } },
      });
    });

    it("is DOWN when it does not", async () => {
      vi.spyOn(h.sessions, "ping").mockRejectedValueOnce(new Error("connection refused"));

      const res = await app.inject({ method: "GET", url: "/health" });

      expect(res.statusCode).toBe(503);
      expect(res.json()).toMatchObject({
        status: "DOWN",
        ready: false,
        checks: { state: { ok: false, latencyMs: null } },
      });
    });
  });
});
