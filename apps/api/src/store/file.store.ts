// src/store/file.store.ts

import type {
  FileQueryFilters,
  FileRecord,
  FileStatus,
} from "../types/upload.js";

export interface StatusExpectation {
  statuses: readonly FileStatus[];
  /** Also require this exact `updatedAt`, for taking over a stale claim. */
  updatedAt?: number;
}

export type FilePatch = Partial<
  Pick<FileRecord, "storageLocation" | "size" | "error" | "expiresAt">
> & { updatedAt: number };

export type CasResult =
  | { ok: true; record: FileRecord }
  | { ok: false; current: FileRecord | null };

export interface FileStore {
  insert(record: FileRecord): Promise<void>;

  get(fileId: string): Promise<FileRecord | null>;

  /**
   * The only way a record's status changes. Applies `patch` and `next` iff
   * the stored status (and `updatedAt`, when given) matches `expect`.
   */
  compareAndSetStatus(
    fileId: string,
    expect: StatusExpectation,
    next: FileStatus,
    patch: FilePatch
  ): Promise<CasResult>;

  /** Deletes the record, only while it is in `ifStatus` when one is given. */
  delete(fileId: string, ifStatus?: FileStatus): Promise<boolean>;

  listByStatus(status: FileStatus): Promise<FileRecord[]>;

  /** Newest first. `page` is 1-based. */
  query(
    filters: FileQueryFilters,
    page: { page: number; size: number }
  ): Promise<{ items: FileRecord[]; total: number }>;

  findCanonical(scope: string, contentHash: string): Promise<string | null>;

  /** Set-if-absent. Returns the fileId that holds the pointer afterwards. */
  claimCanonical(scope: string, contentHash: string, fileId: string): Promise<string>;

  /** Compare-and-delete: only removes the pointer while it names `fileId`. */
  releaseCanonical(scope: string, contentHash: string, fileId: string): Promise<boolean>;
}

export function matchesFilters(record: FileRecord, filters: FileQueryFilters): boolean {
  if (filters.scope !== undefined && record.scope !== filters.scope) return false;
  if (filters.createdBy !== undefined && record.createdBy !== filters.createdBy) return false;
  if (filters.mimeTypes?.length && !filters.mimeTypes.includes(record.mimeType)) return false;
  if (filters.statuses?.length && !filters.statuses.includes(record.status)) return false;
  if (filters.createdAfter !== undefined && record.createdAt < filters.createdAfter) return false;
  if (filters.createdBefore !== undefined && record.createdAt > filters.createdBefore) return false;
  return true;
}

export function byNewestFirst(a: FileRecord, b: FileRecord): number {
  return b.createdAt - a.createdAt || a.fileId.localeCompare(b.fileId);
}
