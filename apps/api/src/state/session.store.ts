// src/state/session.store.ts

import type { ChunkRecord, UploadMeta, UploadSession } from "../types/upload.js";

/**
 * Session keys outlive `expiresAt` so an expired upload is reported as
 * expired (not unknown) and the sweeper can still read what it owned.
 */
export const SESSION_KEY_GRACE_MS = 30 * 60 * 1000;

/** The meta pointer outlives the session key by another grace window. */
export const META_KEY_GRACE_MS = 2 * SESSION_KEY_GRACE_MS;

export interface SessionStore {
  create(session: UploadSession): Promise<void>;

  /** Returns the session with `uploadedChunks` read from the chunk set. */
  get(uploadId: string): Promise<UploadSession | null>;

  getMeta(uploadId: string): Promise<UploadMeta | null>;

  /**
   * Atomic set-add. Returns false when the session key no longer exists,
   * in which case nothing is recorded.
   */
  addChunk(uploadId: string, chunkNumber: number): Promise<boolean>;

  hasChunk(uploadId: string, chunkNumber: number): Promise<boolean>;

  countChunks(uploadId: string): Promise<number>;

  listChunks(uploadId: string): Promise<number[]>;

  recordChunk(record: ChunkRecord): Promise<void>;

  listChunkRecords(uploadId: string): Promise<ChunkRecord[]>;

  /** Drops the session, its chunk set and index entry. The meta pointer stays. */
  delete(uploadId: string): Promise<void>;

  listActive(): Promise<string[]>;

  countActive(): Promise<number>;

  ping(): Promise<void>;
}
