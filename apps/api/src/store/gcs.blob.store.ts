// src/store/gcs.blob.store.ts

import crypto from "crypto";
import { pipeline } from "stream/promises";
import { Readable } from "stream";
import { Storage, type Bucket, type FileMetadata } from "@google-cloud/storage";

import {
  BlobMissingError,
  contentDisposition,
  type BlobStat,
  type BlobStore,
  type SignedUrl,
} from "./blob.store.js";
import { extractHttpStatus } from "../types/blob.metrics.js";

/** Maximum number of source objects a single GCS compose request accepts. */
export const GCS_COMPOSE_LIMIT = 32;

function statFromMetadata(key: string, metadata: FileMetadata): BlobStat {
  const updated = metadata.updated ? Date.parse(metadata.updated) : NaN;
  return {
    key,
    size: Number(metadata.size ?? 0),
    etag: metadata.etag ?? "",
    updatedAt: Number.isFinite(updated) ? updated : 0,
  };
}

export class GcsBlobStore implements BlobStore {
  private readonly gcsBucket: Bucket;

  constructor(
    readonly bucket: string,
    options: { projectId?: string; keyFilename?: string } = {}
  ) {
    this.gcsBucket = new Storage(options).bucket(bucket);
  }

  async issueWriteAuthorization(key: string, ttlMs: number): Promise<SignedUrl> {
    const expiresAt = Date.now() + ttlMs;
    const [url] = await this.gcsBucket.file(key).getSignedUrl({
      version: "v4",
      action: "write",
      expires: expiresAt,
    });
    return { url, method: "PUT", expiresAt };
  }

  async issueReadAuthorization(key: string, ttlMs: number, fileName?: string): Promise<SignedUrl> {
    const expiresAt = Date.now() + ttlMs;
    const [url] = await this.gcsBucket.file(key).getSignedUrl({
      version: "v4",
      action: "read",
      expires: expiresAt,
      ...(fileName !== undefined && { responseDisposition: contentDisposition(fileName) }),
    });
    return { url, method: "GET", expiresAt };
  }

  async put(key: string, body: Buffer | Readable): Promise<BlobStat> {
    const file = this.gcsBucket.file(key);
    if (Buffer.isBuffer(body)) {
      await file.save(body, { resumable: false });
    } else {
      await pipeline(body, file.createWriteStream({ resumable: false }));
    }
    return this.requireStat(key);
  }

  /**
   * Composes in stages when there are more sources than one request takes.
   * Intermediate objects live under a fresh `chunks/<id>/` prefix, so any the
   * final cleanup misses are reclaimed by the orphan reconcile.
   */
  async compose(keys: string[], destination: string): Promise<BlobStat> {
    const scratch = `chunks/${crypto.randomUUID()}`;
    const intermediates: string[] = [];
    let sources = keys;
    let stage = 0;

    try {
      while (sources.length > GCS_COMPOSE_LIMIT) {
        const next: string[] = [];
        for (let i = 0; i < sources.length; i += GCS_COMPOSE_LIMIT) {
          const batch = sources.slice(i, i + GCS_COMPOSE_LIMIT);
          if (batch.length === 1) {
            next.push(...batch);
            continue;
          }
          const target = `${scratch}/compose-${stage}-${i / GCS_COMPOSE_LIMIT}`;
          await this.gcsBucket.combine(batch, target);
          intermediates.push(target);
          next.push(target);
        }
        sources = next;
        stage++;
      }

      await this.gcsBucket.combine(sources, destination);
    } finally {
      await Promise.allSettled(
        intermediates.map((key) => this.gcsBucket.file(key).delete({ ignoreNotFound: true }))
      );
    }

    return this.requireStat(destination);
  }

  async delete(key: string): Promise<void> {
    await this.gcsBucket.file(key).delete({ ignoreNotFound: true });
  }

  async exists(key: string): Promise<boolean> {
    const [exists] = await this.gcsBucket.file(key).exists();
    return exists;
  }

  async stat(key: string): Promise<BlobStat | null> {
    try {
      const [metadata] = await this.gcsBucket.file(key).getMetadata();
      return statFromMetadata(key, metadata);
    } catch (err) {
      if (extractHttpStatus(err) === 404) return null;
      throw err;
    }
  }

  private async requireStat(key: string): Promise<BlobStat> {
    const stat = await this.stat(key);
    if (!stat) throw new BlobMissingError(key);
    return stat;
  }

  async list(prefix: string): Promise<BlobStat[]> {
    const [files] = await this.gcsBucket.getFiles({ prefix, autoPaginate: true });
    return files
      .map((file) => statFromMetadata(file.name, file.metadata))
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  async read(key: string): Promise<Readable> {
    const file = this.gcsBucket.file(key);
    const [exists] = await file.exists();
    if (!exists) throw new BlobMissingError(key);
    return file.createReadStream();
  }
}
