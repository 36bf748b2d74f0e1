// src/server.ts

import { buildApp } from "./app.js";
import { loadStorageConfig } from "./config/storage.config.js";
import { loadUploadConfig } from "./config/uploads.config.js";
import { createUploadEngine } from "./services/engine.js";
import { createBlobLimiter } from "./services/upload/blob.limiter.js";
import { reconcileOrphanChunks } from "./state/gc/upload.gc.reconcile.js";
import { startUploadGc, stopUploadGc } from "./state/gc/upload.gc.scheduler.js";
import { createBlobBackend, createStateStores } from "./store/index.js";
import { loggerSettings } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled promise rejection:", reason);
});

process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});

const uploadConfig = loadUploadConfig();
const storageConfig = loadStorageConfig();

const stores = await createStateStores(storageConfig.state);
const { blobs, signer } = createBlobBackend(storageConfig.blob);

const { app, engine } = await buildApp({
  config: uploadConfig,
  signer,
  logger: loggerSettings(),
  engine: (log) =>
    createUploadEngine({
      ...stores,
      blobs,
      limiter: createBlobLimiter(uploadConfig.blob),
      config: uploadConfig,
      log,
      now: Date.now,
    }),
});

app.log.info(
  { state: storageConfig.state.backend, blob: storageConfig.blob.backend },
  "Storage backends initialized"
);

try {
  const removed = await reconcileOrphanChunks(engine.deps);
  if (removed > 0) app.log.warn({ removed }, "Removed orphan chunk objects");
} catch (err) {
  app.log.error({ err }, "Orphan chunk reconcile failed");
}

startUploadGc(engine.deps);

try {
  await app.listen({
    port: storageConfig.port,
    host: "0.0.0.0",
  });

  app.log.info(
    { port: storageConfig.port, env: process.env.NODE_ENV ?? "development" },
    "API server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}

async function shutdown(signal: string) {
  app.log.info({ signal }, "Shutting down server");

  try {
    await stopUploadGc();
    await app.close();
    await engine.deps.limiter.cleanup.onIdle();
    process.exit(0);
  } catch (err) {
    app.log.error(err, "Shutdown failed");
    process.exit(1);
  }
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
