// src/routes/uploads.routes.ts

import type { FastifyInstance } from "fastify";

import type { UploadEngine } from "../services/engine.js";
import type { InitiateUploadInput } from "../types/upload.js";
import { sendApiError } from "../utils/apiError.js";
import { isRecord, isUuid } from "../utils/guards.js";

interface UploadParams {
  uploadId: string;
}

interface ChunkParams extends UploadParams {
  chunkNumber: string;
}

type Field<T> = { ok: true; value: T | undefined } | { ok: false };

function optionalField<T>(
  value: unknown,
  check: (v: unknown) => v is T
): Field<T> {
  if (value === undefined || value === null) return { ok: true, value: undefined };
  return check(value) ? { ok: true, value } : { ok: false };
}

const isString = (v: unknown): v is string => typeof v === "string";
const isNumber = (v: unknown): v is number => typeof v === "number";
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";

/**
 * Shape check only. Value rules (limits, name syntax, hash format) belong to
 * the coordinator so direct callers get them too.
 */
function parseInitiateBody(body: unknown): InitiateUploadInput | null {
  if (!isRecord(body)) return null;

  const { fileName, totalSize, scope, createdBy } = body;
  if (!isString(fileName) || !isNumber(totalSize) || !isString(scope) || !isString(createdBy)) {
    return null;
  }

  const chunkSize = optionalField(body.chunkSize, isNumber);
  const mimeType = optionalField(body.mimeType, isString);
  const contentHash = optionalField(body.contentHash, isString);
  const allowDeduplication = optionalField(body.allowDeduplication, isBoolean);
  const retentionMs = optionalField(body.retentionMs, isNumber);

  if (!chunkSize.ok || !mimeType.ok || !contentHash.ok || !allowDeduplication.ok || !retentionMs.ok) {
    return null;
  }

  return {
    fileName,
    totalSize,
    scope,
    createdBy,
    chunkSize: chunkSize.value,
    mimeType: mimeType.value,
    contentHash: contentHash.value,
    allowDeduplication: allowDeduplication.value,
    retentionMs: retentionMs.value,
  };
}

export default async function uploadRoutes(
  app: FastifyInstance,
  opts: { engine: UploadEngine }
) {
  const { engine } = opts;

  app.post("/v1/uploads/create", async (req, reply) => {
    const input = parseInitiateBody(req.body);
    if (!input) {
      return sendApiError(
        reply,
        400,
        "INVALID_REQUEST_BODY",
        "Body must be JSON with fileName, totalSize, scope and createdBy"
      );
    }

    const result = await engine.initiateUpload(input);
    return reply.code(result.isDuplicate ? 200 : 201).send(result);
  });

  app.post<{ Params: ChunkParams }>(
    "/v1/uploads/:uploadId/chunks/:chunkNumber/authorize",
    async (req) => {
      const { uploadId, chunkNumber } = req.params;
      return engine.authorizeChunk(uploadId, Number(chunkNumber));
    }
  );

  app.post<{ Params: ChunkParams }>(
    "/v1/uploads/:uploadId/chunks/:chunkNumber/ack",
    async (req, reply) => {
      const { uploadId, chunkNumber } = req.params;
      const body = req.body;

      if (!isRecord(body) || !isNumber(body.size) || !isString(body.tag)) {
        return sendApiError(reply, 400, "INVALID_REQUEST_BODY", "Body must be JSON with size and tag");
      }

      return engine.acknowledgeChunk(uploadId, Number(chunkNumber), body.size, body.tag);
    }
  );

  app.put<{ Params: ChunkParams }>("/v1/uploads/:uploadId/chunk/:chunkNumber", async (req, reply) => {
    const { uploadId, chunkNumber } = req.params;

    if (!isUuid(uploadId)) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
    }

    const part = await req.file();
    if (!part || part.type !== "file") {
      return sendApiError(reply, 400, "INVALID_CHUNK", "Multipart file field required");
    }

    const content = await part.toBuffer();
    const result = await engine.writeChunk(uploadId, Number(chunkNumber), content);

    req.log.debug({ uploadId, chunkNumber: result.chunkNumber }, "Chunk stored");
    return result;
  });

  app.get<{ Params: UploadParams }>("/v1/uploads/:uploadId/status", async (req) => {
    return engine.getUploadStatus(req.params.uploadId);
  });

  app.post<{ Params: UploadParams }>("/v1/uploads/:uploadId/complete", async (req) => {
    const record = await engine.completeUpload(req.params.uploadId);
    return {
      fileId: record.fileId,
      status: record.status,
      size: record.size,
      storageLocation: record.storageLocation,
    };
  });

  app.delete<{ Params: UploadParams }>("/v1/uploads/:uploadId", async (req) => {
    return engine.cancelUpload(req.params.uploadId);
  });
}
