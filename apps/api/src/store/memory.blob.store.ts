// src/store/memory.blob.store.ts

import crypto from "crypto";
import { Readable } from "stream";

import {
  BlobMissingError,
  type BlobStat,
  type BlobStore,
  type SignedUrl,
} from "./blob.store.js";
import type { BlobUrlSigner } from "./blob.token.js";

interface StoredObject {
  data: Buffer;
  etag: string;
  updatedAt: number;
}

async function collect(body: Buffer | Readable): Promise<Buffer> {
  if (Buffer.isBuffer(body)) return body;
  const parts: Buffer[] = [];
  for await (const part of body) {
    parts.push(Buffer.isBuffer(part) ? part : Buffer.from(part));
  }
  return Buffer.concat(parts);
}

export class MemoryBlobStore implements BlobStore {
  private readonly objects = new Map<string, StoredObject>();

  constructor(
    readonly bucket: string,
    private readonly signer: BlobUrlSigner,
    private readonly now: () => number = Date.now
  ) {}

  private store(key: string, data: Buffer): BlobStat {
    const stored: StoredObject = {
      data,
      etag: crypto.createHash("md5").update(data).digest("hex"),
      updatedAt: this.now(),
    };
    this.objects.set(key, stored);
    return { key, size: data.length, etag: stored.etag, updatedAt: stored.updatedAt };
  }

  async issueWriteAuthorization(key: string, ttlMs: number): Promise<SignedUrl> {
    return this.signer.sign(key, "PUT", ttlMs);
  }

  async issueReadAuthorization(key: string, ttlMs: number, fileName?: string): Promise<SignedUrl> {
    return this.signer.sign(key, "GET", ttlMs, fileName);
  }

  async put(key: string, body: Buffer | Readable): Promise<BlobStat> {
    return this.store(key, Buffer.from(await collect(body)));
  }

  async compose(keys: string[], destination: string): Promise<BlobStat> {
    const parts = keys.map((key) => {
      const object = this.objects.get(key);
      if (!object) throw new BlobMissingError(key);
      return object.data;
    });
    return this.store(destination, Buffer.concat(parts));
  }

  async delete(key: string): Promise<void> {
    this.objects.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async stat(key: string): Promise<BlobStat | null> {
    const object = this.objects.get(key);
    if (!object) return null;
    return { key, size: object.data.length, etag: object.etag, updatedAt: object.updatedAt };
  }

  async list(prefix: string): Promise<BlobStat[]> {
    return [...this.objects.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .map(([key, object]) => ({
        key,
        size: object.data.length,
        etag: object.etag,
        updatedAt: object.updatedAt,
      }))
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  async read(key: string): Promise<Readable> {
    const object = this.objects.get(key);
    if (!object) throw new BlobMissingError(key);
    return Readable.from([object.data]);
  }
}
