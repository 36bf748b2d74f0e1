// src/routes/blobs.routes.ts

import type { FastifyInstance } from "fastify";

import type { UploadEngine } from "../services/engine.js";
import { runBlobOperation } from "../services/upload/blob.metrics.js";
import { blobContext } from "../services/upload/upload.deps.js";
import { contentDisposition } from "../store/blob.store.js";
import type { BlobUrlSigner } from "../store/blob.token.js";
import { sendApiError } from "../utils/apiError.js";

interface TokenParams {
  token: string;
}

/**
 * Serves the signed URLs of backends that have no signing scheme of their own
 * (disk, memory). The token is the whole authorization.
 */
export async function blobsRoutes(
  app: FastifyInstance,
  opts: { engine: UploadEngine; signer: BlobUrlSigner }
) {
  const { engine, signer } = opts;
  const { blobs, config } = engine.deps;

  // Signed PUTs only ever carry one chunk; every content type is raw bytes.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser(
    "*",
    { parseAs: "buffer", bodyLimit: config.chunk.maxBytes },
    (_req, body, done) => {
      done(null, body);
    }
  );

  app.get<{ Params: TokenParams }>("/v1/blobs/:token", async (req, reply) => {
    const { key, fileName } = signer.verify(req.params.token, "GET");

    const stat = await blobs.stat(key);
    if (!stat) {
      return sendApiError(reply, 404, "BLOB_NOT_FOUND", "Object not found");
    }

    const stream = await blobs.read(key);

    reply.header("Content-Type", "application/octet-stream");
    reply.header("Content-Length", String(stat.size));
    reply.header("ETag", `"${stat.etag}"`);
    if (fileName) reply.header("Content-Disposition", contentDisposition(fileName));

    return reply.send(stream);
  });

  app.put<{ Params: TokenParams }>("/v1/blobs/:token", async (req, reply) => {
    const { key } = signer.verify(req.params.token, "PUT");

    const body: unknown = req.body;
    if (!Buffer.isBuffer(body)) {
      return sendApiError(reply, 400, "INVALID_REQUEST_BODY", "Body must be the chunk bytes");
    }

    const stored = await runBlobOperation(
      blobContext(engine.deps),
      { operation: "put", key },
      () => blobs.put(key, body)
    );

    return { key: stored.key, size: stored.size, etag: stored.etag };
  });
}
