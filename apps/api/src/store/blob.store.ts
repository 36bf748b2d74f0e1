// src/store/blob.store.ts

import type { Readable } from "stream";

export interface BlobStat {
  key: string;
  size: number;
  etag: string;
  updatedAt: number;
}

export interface SignedUrl {
  url: string;
  method: "GET" | "PUT";
  expiresAt: number;
}

/**
 * Object storage bound to one bucket. `compose` is the store's own
 * concatenation primitive; callers never assemble bytes themselves.
 */
export interface BlobStore {
  readonly bucket: string;

  issueWriteAuthorization(key: string, ttlMs: number): Promise<SignedUrl>;

  issueReadAuthorization(key: string, ttlMs: number, fileName?: string): Promise<SignedUrl>;

  put(key: string, body: Buffer | Readable): Promise<BlobStat>;

  compose(keys: string[], destination: string): Promise<BlobStat>;

  /** Missing objects are not an error. */
  delete(key: string): Promise<void>;

  exists(key: string): Promise<boolean>;

  stat(key: string): Promise<BlobStat | null>;

  list(prefix: string): Promise<BlobStat[]>;

  read(key: string): Promise<Readable>;
}

/** Carries the HTTP-style status the blob error classifier reads. */
export class BlobMissingError extends Error {
  readonly code = 404;

  constructor(key: string) {
    super(`No such object: ${key}`);
    this.name = "BlobMissingError";
  }
}

export function storageLocation(bucket: string, key: string): string {
  return `${bucket}/${key}`;
}

/** Download disposition with an ASCII fallback and the RFC 5987 UTF-8 name. */
export function contentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, "_");
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}
