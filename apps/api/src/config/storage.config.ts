// src/config/storage.config.ts

import path from "path";

import {
  type Env,
  assertHttpUrl,
  parseEnumEnv,
  parsePositiveIntEnv,
  requireEnv,
} from "./env.js";

export const STATE_BACKENDS = ["redis", "memory"] as const;
export const BLOB_BACKENDS = ["gcs", "disk", "memory"] as const;

export type StateBackend = (typeof STATE_BACKENDS)[number];
export type BlobBackend = (typeof BLOB_BACKENDS)[number];

export type StateConfig =
  | { backend: "redis"; url: string; token: string }
  | { backend: "memory" };

export type BlobConfig =
  | {
      backend: "gcs";
      bucket: string;
      projectId?: string;
      keyFilename?: string;
    }
  | {
      backend: "disk";
      bucket: string;
      rootDir: string;
      signingSecret: string;
      publicBaseUrl: string;
    }
  | {
      backend: "memory";
      bucket: string;
      signingSecret: string;
      publicBaseUrl: string;
    };

export interface StorageConfig {
  state: StateConfig;
  blob: BlobConfig;
  port: number;
}

function loadStateConfig(env: Env): StateConfig {
  const backend = parseEnumEnv(env, "STATE_BACKEND", STATE_BACKENDS, "redis");
  if (backend === "memory") return { backend };

  const url = requireEnv(env, "UPSTASH_REDIS_REST_URL");
  assertHttpUrl("UPSTASH_REDIS_REST_URL", url);
  return {
    backend,
    url,
    token: requireEnv(env, "UPSTASH_REDIS_REST_TOKEN"),
  };
}

function loadBlobConfig(env: Env, port: number): BlobConfig {
  const backend = parseEnumEnv(env, "BLOB_BACKEND", BLOB_BACKENDS, "gcs");
  const bucket = env.STORAGE_BUCKET || "filedock-uploads";

  if (backend === "gcs") {
    return {
      backend,
      bucket: requireEnv(env, "STORAGE_BUCKET"),
      projectId: env.GCS_PROJECT_ID || undefined,
      keyFilename: env.GCS_KEY_FILE || undefined,
    };
  }

  const signingSecret = requireEnv(env, "BLOB_SIGNING_SECRET");
  if (signingSecret.length < 16) {
    throw new Error("BLOB_SIGNING_SECRET must be at least 16 characters");
  }

  const publicBaseUrl = (env.PUBLIC_BASE_URL || `http://localhost:${port}`).replace(/\/+$/, "");
  assertHttpUrl("PUBLIC_BASE_URL", publicBaseUrl);

  if (backend === "memory") {
    return { backend, bucket, signingSecret, publicBaseUrl };
  }

  const rootDir = path.resolve(requireEnv(env, "BLOB_DISK_ROOT"));
  return { backend, bucket, rootDir, signingSecret, publicBaseUrl };
}

export function loadStorageConfig(env: Env = process.env): StorageConfig {
  const port = parsePositiveIntEnv(env, "PORT", 3000);
  return {
    state: loadStateConfig(env),
    blob: loadBlobConfig(env, port),
    port,
  };
}
