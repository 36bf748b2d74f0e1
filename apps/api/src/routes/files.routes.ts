// src/routes/files.routes.ts

import type { FastifyInstance, FastifyRequest } from "fastify";

import type { UploadEngine } from "../services/engine.js";
import { isFileStatus, type FileQueryFilters, type FileStatus } from "../types/upload.js";
import { sendApiError } from "../utils/apiError.js";
import { isRecord } from "../utils/guards.js";

interface FileParams {
  fileId: string;
}

const ANONYMOUS_USER = "anonymous";

function requestUser(req: FastifyRequest): string {
  const header = req.headers["x-user-id"];
  return typeof header === "string" && header.trim() ? header.trim() : ANONYMOUS_USER;
}

function queryString(query: unknown, name: string): string | undefined {
  if (!isRecord(query)) return undefined;
  const value = query[name];
  return typeof value === "string" && value !== "" ? value : undefined;
}

function queryNumber(query: unknown, name: string): number | undefined {
  const raw = queryString(query, name);
  return raw === undefined ? undefined : Number(raw);
}

function queryList(query: unknown, name: string): string[] | undefined {
  const raw = queryString(query, name);
  if (raw === undefined) return undefined;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function queryBoolean(query: unknown, name: string): boolean | undefined {
  const raw = queryString(query, name);
  if (raw === undefined) return undefined;
  return raw === "1" || raw === "true";
}

export async function filesRoutes(
  app: FastifyInstance,
  opts: { engine: UploadEngine }
) {
  const { engine } = opts;
  const { maxSingleUploadBytes } = engine.deps.config;

  // Single-shot uploads send the raw bytes.
  app.addContentTypeParser(
    "application/octet-stream",
    { parseAs: "buffer", bodyLimit: maxSingleUploadBytes },
    (_req, body, done) => {
      done(null, body);
    }
  );

  app.post("/v1/files", async (req, reply) => {
    const hash = req.headers["x-content-sha256"];
    if (typeof hash !== "string") {
      return sendApiError(reply, 400, "INVALID_CONTENT_HASH", "x-content-sha256 header required");
    }
    if (!Buffer.isBuffer(req.body)) {
      return sendApiError(
        reply,
        400,
        "INVALID_REQUEST_BODY",
        "Body must be application/octet-stream"
      );
    }

    const fileName = queryString(req.query, "fileName");
    const scope = queryString(req.query, "scope");
    if (!fileName || !scope) {
      return sendApiError(reply, 400, "INVALID_REQUEST", "fileName and scope are required");
    }

    const result = await engine.uploadSmall(
      {
        fileName,
        scope,
        createdBy: requestUser(req),
        mimeType: queryString(req.query, "mimeType"),
        allowDeduplication: queryBoolean(req.query, "allowDeduplication"),
        retentionMs: queryNumber(req.query, "retentionMs"),
      },
      hash,
      req.body
    );

    return reply.code(result.isDuplicate ? 200 : 201).send(result);
  });

  app.get("/v1/files", async (req, reply) => {
    const statuses = queryList(req.query, "status");
    const validStatuses: FileStatus[] = (statuses ?? []).filter(isFileStatus);
    if (statuses && validStatuses.length !== statuses.length) {
      return sendApiError(reply, 400, "INVALID_QUERY", "Unknown status filter", {
        details: { status: statuses },
      });
    }

    const filters: FileQueryFilters = {
      scope: queryString(req.query, "scope"),
      createdBy: queryString(req.query, "createdBy"),
      mimeTypes: queryList(req.query, "mimeType"),
      statuses: statuses ? validStatuses : undefined,
      createdAfter: queryNumber(req.query, "createdAfter"),
      createdBefore: queryNumber(req.query, "createdBefore"),
    };

    return engine.queryFiles(filters, {
      page: queryNumber(req.query, "page"),
      size: queryNumber(req.query, "size"),
    });
  });

  app.get<{ Params: FileParams }>("/v1/files/:fileId", async (req) => {
    return engine.getFileMetadata(req.params.fileId, requestUser(req));
  });

  app.get<{ Params: FileParams }>("/v1/files/:fileId/download", async (req) => {
    const ttlMs = queryNumber(req.query, "ttlMs") ?? engine.deps.config.downloadTtl.defaultMs;
    return engine.getDownloadUrl(req.params.fileId, ttlMs, requestUser(req));
  });

  app.delete<{ Params: FileParams }>("/v1/files/:fileId", async (req, reply) => {
    await engine.deleteFile(req.params.fileId, requestUser(req));
    return reply.code(204).send();
  });
}
