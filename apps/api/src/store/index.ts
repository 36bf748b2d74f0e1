// src/store/index.ts

import type { BlobConfig, StateConfig } from "../config/storage.config.js";
import { initRedis } from "../state/client.js";
import { MemorySessionStore } from "../state/memory.session.store.js";
import { RedisSessionStore } from "../state/redis.session.store.js";
import type { SessionStore } from "../state/session.store.js";
import type { AccessLogStore } from "./access.log.store.js";
import type { BlobStore } from "./blob.store.js";
import { BlobUrlSigner } from "./blob.token.js";
import { DiskBlobStore } from "./disk.blob.store.js";
import type { FileStore } from "./file.store.js";
import { GcsBlobStore } from "./gcs.blob.store.js";
import { MemoryAccessLogStore } from "./memory.access.log.store.js";
import { MemoryBlobStore } from "./memory.blob.store.js";
import { MemoryFileStore } from "./memory.file.store.js";
import { RedisAccessLogStore } from "./redis.access.log.store.js";
import { RedisFileStore } from "./redis.file.store.js";

export interface StateStores {
  sessions: SessionStore;
  files: FileStore;
  accessLog: AccessLogStore;
}

export interface BlobBackend {
  blobs: BlobStore;
  /** Present when the API serves the backend's signed URLs itself. */
  signer?: BlobUrlSigner;
}

export async function createStateStores(config: StateConfig): Promise<StateStores> {
  if (config.backend === "memory") {
    return {
      sessions: new MemorySessionStore(),
      files: new MemoryFileStore(),
      accessLog: new MemoryAccessLogStore(),
    };
  }

  const redis = await initRedis(config);
  return {
    sessions: new RedisSessionStore(redis),
    files: new RedisFileStore(redis),
    accessLog: new RedisAccessLogStore(redis),
  };
}

export function createBlobBackend(config: BlobConfig): BlobBackend {
  switch (config.backend) {
    case "gcs":
      return {
        blobs: new GcsBlobStore(config.bucket, {
          projectId: config.projectId,
          keyFilename: config.keyFilename,
        }),
      };
    case "disk": {
      const signer = new BlobUrlSigner(config.signingSecret, config.publicBaseUrl);
      return { blobs: new DiskBlobStore(config.bucket, config.rootDir, signer), signer };
    }
    case "memory": {
      const signer = new BlobUrlSigner(config.signingSecret, config.publicBaseUrl);
      return { blobs: new MemoryBlobStore(config.bucket, signer), signer };
    }
  }
}
