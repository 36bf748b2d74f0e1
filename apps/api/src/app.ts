// src/app.ts

import Fastify, {
  type FastifyBaseLogger,
  type FastifyInstance,
  type FastifyServerOptions,
} from "fastify";
import multipart from "@fastify/multipart";

import { blobsRoutes } from "./routes/blobs.routes.js";
import { filesRoutes } from "./routes/files.routes.js";
import healthRoute from "./routes/health.js";
import uploadRoutes from "./routes/uploads.routes.js";
import type { UploadConfig } from "./config/uploads.config.js";
import type { UploadEngine } from "./services/engine.js";
import type { BlobUrlSigner } from "./store/blob.token.js";
import { sendApiError, sendUploadError, UploadError } from "./utils/apiError.js";
import type { LoggerSettings } from "./utils/logger.js";

export interface BuildAppOptions {
  config: UploadConfig;
  /** Receives the request logger so the engine writes through the same pino instance. */
  engine: (log: FastifyBaseLogger) => UploadEngine;
  signer?: BlobUrlSigner;
  logger?: LoggerSettings | false;
}

export async function buildApp(
  options: BuildAppOptions
): Promise<{ app: FastifyInstance; engine: UploadEngine }> {
  const { config } = options;

  const serverOptions: FastifyServerOptions = {
    logger: options.logger ?? false,
    // Requests should be chunk-sized (multipart) or small JSON.
    bodyLimit: Math.max(config.chunk.maxBytes, config.maxSingleUploadBytes) + 1024 * 1024,
  };
  const app = Fastify(serverOptions);

  await app.register(multipart, {
    limits: {
      // One chunk per request.
      fileSize: config.chunk.maxBytes,
      files: 1,
    },
  });

  const engine = options.engine(app.log);

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof UploadError) {
      if (err.statusCode >= 500) {
        req.log.error({ err, url: req.url, method: req.method }, "Request failed");
      } else {
        req.log.info({ code: err.code, url: req.url }, "Request rejected");
      }
      return sendUploadError(reply, err);
    }

    const statusCode =
      typeof err.statusCode === "number" && Number.isInteger(err.statusCode)
        ? err.statusCode
        : 500;

    if (statusCode === 413) {
      return sendApiError(reply, 413, "FILE_TOO_LARGE", err.message);
    }
    if (statusCode < 500) {
      return sendApiError(reply, statusCode, "INVALID_REQUEST", err.message);
    }

    req.log.error(
      { err, url: req.url, method: req.method, requestId: req.id },
      "Request error"
    );
    return sendApiError(reply, 500, "INTERNAL_ERROR", "Unexpected server error");
  });

  await app.register(uploadRoutes, { engine });
  await app.register(filesRoutes, { engine });
  await app.register(healthRoute, { engine });
  if (options.signer) {
    await app.register(blobsRoutes, { engine, signer: options.signer });
  }

  return { app, engine };
}
