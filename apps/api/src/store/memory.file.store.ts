// src/store/memory.file.store.ts

import {
  byNewestFirst,
  matchesFilters,
  type CasResult,
  type FilePatch,
  type FileStore,
  type StatusExpectation,
} from "./file.store.js";
import type { FileQueryFilters, FileRecord, FileStatus } from "../types/upload.js";
import { ConflictError } from "../utils/apiError.js";

export class MemoryFileStore implements FileStore {
  private readonly records = new Map<string, FileRecord>();
  private readonly canonical = new Map<string, string>();

  private canonicalKey(scope: string, contentHash: string) {
    return `${scope}\u0000${contentHash}`;
  }

  async insert(record: FileRecord): Promise<void> {
    if (this.records.has(record.fileId)) {
      throw new ConflictError("INVALID_FILE_ID", `File ${record.fileId} already exists`);
    }
    this.records.set(record.fileId, { ...record });
  }

  async get(fileId: string): Promise<FileRecord | null> {
    const record = this.records.get(fileId);
    return record ? { ...record } : null;
  }

  async compareAndSetStatus(
    fileId: string,
    expect: StatusExpectation,
    next: FileStatus,
    patch: FilePatch
  ): Promise<CasResult> {
    const current = this.records.get(fileId);
    if (!current) return { ok: false, current: null };

    const statusMatches = expect.statuses.includes(current.status);
    const versionMatches =
      expect.updatedAt === undefined || expect.updatedAt === current.updatedAt;

    if (!statusMatches || !versionMatches) {
      return { ok: false, current: { ...current } };
    }

    const updated: FileRecord = { ...current, ...patch, status: next };
    this.records.set(fileId, updated);
    return { ok: true, record: { ...updated } };
  }

  async delete(fileId: string, ifStatus?: FileStatus): Promise<boolean> {
    const current = this.records.get(fileId);
    if (!current) return false;
    if (ifStatus !== undefined && current.status !== ifStatus) return false;
    this.records.delete(fileId);
    return true;
  }

  async listByStatus(status: FileStatus): Promise<FileRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.status === status)
      .map((record) => ({ ...record }));
  }

  async query(
    filters: FileQueryFilters,
    page: { page: number; size: number }
  ): Promise<{ items: FileRecord[]; total: number }> {
    const matches = [...this.records.values()]
      .filter((record) => matchesFilters(record, filters))
      .sort(byNewestFirst);

    const start = (page.page - 1) * page.size;
    return {
      items: matches.slice(start, start + page.size).map((record) => ({ ...record })),
      total: matches.length,
    };
  }

  async findCanonical(scope: string, contentHash: string): Promise<string | null> {
    return this.canonical.get(this.canonicalKey(scope, contentHash)) ?? null;
  }

  async claimCanonical(scope: string, contentHash: string, fileId: string): Promise<string> {
    const key = this.canonicalKey(scope, contentHash);
    const holder = this.canonical.get(key);
    if (holder !== undefined) return holder;
    this.canonical.set(key, fileId);
    return fileId;
  }

  async releaseCanonical(scope: string, contentHash: string, fileId: string): Promise<boolean> {
    const key = this.canonicalKey(scope, contentHash);
    if (this.canonical.get(key) !== fileId) return false;
    this.canonical.delete(key);
    return true;
  }
}
