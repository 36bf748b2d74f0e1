// src/state/memory.session.store.ts

import {
  META_KEY_GRACE_MS,
  SESSION_KEY_GRACE_MS,
  type SessionStore,
} from "./session.store.js";
import type { ChunkRecord, UploadMeta, UploadSession } from "../types/upload.js";

interface SessionEntry {
  session: Omit<UploadSession, "uploadedChunks">;
  chunks: Set<number>;
  records: Map<number, ChunkRecord>;
  keyExpiresAt: number;
}

/**
 * Single-process stand-in for the Redis layout: key TTLs are applied lazily
 * against the injected clock, and the active index outlives expired keys the
 * same way the Redis set does.
 */
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly metas = new Map<string, { meta: UploadMeta; keyExpiresAt: number }>();
  private readonly active = new Set<string>();

  constructor(private readonly now: () => number = Date.now) {}

  private entry(uploadId: string): SessionEntry | null {
    const entry = this.sessions.get(uploadId);
    if (!entry) return null;
    if (this.now() >= entry.keyExpiresAt) {
      this.sessions.delete(uploadId);
      return null;
    }
    return entry;
  }

  /** Drops every key past its TTL, as Redis would without being read. */
  private pruneExpired() {
    const now = this.now();
    for (const [uploadId, entry] of this.sessions) {
      if (now >= entry.keyExpiresAt) this.sessions.delete(uploadId);
    }
    for (const [uploadId, stored] of this.metas) {
      if (now >= stored.keyExpiresAt) this.metas.delete(uploadId);
    }
  }

  async create(session: UploadSession): Promise<void> {
    const { uploadedChunks: _ignored, ...rest } = session;
    this.sessions.set(session.uploadId, {
      session: rest,
      chunks: new Set(),
      records: new Map(),
      keyExpiresAt: session.expiresAt + SESSION_KEY_GRACE_MS,
    });
    this.metas.set(session.uploadId, {
      meta: {
        uploadId: session.uploadId,
        fileId: session.fileId,
        createdAt: session.createdAt,
        expiresAt: session.expiresAt,
      },
      keyExpiresAt: session.expiresAt + META_KEY_GRACE_MS,
    });
    this.active.add(session.uploadId);
  }

  async get(uploadId: string): Promise<UploadSession | null> {
    const entry = this.entry(uploadId);
    if (!entry) return null;
    return {
      ...entry.session,
      uploadedChunks: [...entry.chunks].sort((a, b) => a - b),
    };
  }

  async getMeta(uploadId: string): Promise<UploadMeta | null> {
    const stored = this.metas.get(uploadId);
    if (!stored) return null;
    if (this.now() >= stored.keyExpiresAt) {
      this.metas.delete(uploadId);
      return null;
    }
    return { ...stored.meta };
  }

  async addChunk(uploadId: string, chunkNumber: number): Promise<boolean> {
    const entry = this.entry(uploadId);
    if (!entry) return false;
    entry.chunks.add(chunkNumber);
    return true;
  }

  async hasChunk(uploadId: string, chunkNumber: number): Promise<boolean> {
    return this.entry(uploadId)?.chunks.has(chunkNumber) ?? false;
  }

  async countChunks(uploadId: string): Promise<number> {
    return this.entry(uploadId)?.chunks.size ?? 0;
  }

  async listChunks(uploadId: string): Promise<number[]> {
    const entry = this.entry(uploadId);
    if (!entry) return [];
    return [...entry.chunks].sort((a, b) => a - b);
  }

  async recordChunk(record: ChunkRecord): Promise<void> {
    this.entry(record.uploadId)?.records.set(record.chunkNumber, { ...record });
  }

  async listChunkRecords(uploadId: string): Promise<ChunkRecord[]> {
    const entry = this.entry(uploadId);
    if (!entry) return [];
    return [...entry.records.values()]
      .map((record) => ({ ...record }))
      .sort((a, b) => a.chunkNumber - b.chunkNumber);
  }

  async delete(uploadId: string): Promise<void> {
    this.sessions.delete(uploadId);
    this.active.delete(uploadId);
  }

  async listActive(): Promise<string[]> {
    this.pruneExpired();
    return [...this.active];
  }

  async countActive(): Promise<number> {
    return this.active.size;
  }

  async ping(): Promise<void> {}
}
