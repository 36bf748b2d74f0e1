// src/types/upload.ts

export const FILE_STATUSES = [
  "PENDING",
  "UPLOADING",
  "COMPLETED",
  "FAILED",
  "EXPIRED",
] as const;

export type FileStatus = (typeof FILE_STATUSES)[number];

export function isFileStatus(value: unknown): value is FileStatus {
  return (
    typeof value === "string" &&
    FILE_STATUSES.some((status) => status === value)
  );
}

export interface UploadSession {
  uploadId: string;
  fileId: string;
  fileName: string;
  mimeType: string;
  totalSize: number;
  chunkSize: number;
  totalChunks: number;
  uploadedChunks: number[];
  scope: string;
  createdBy: string;
  contentHash: string | null;
  /** Whether the finished file may become the canonical copy of its hash. */
  allowDeduplication: boolean;
  createdAt: number;
  expiresAt: number;
}

/**
 * Outlives the session so a late `complete` can still find its file.
 */
export interface UploadMeta {
  uploadId: string;
  fileId: string;
  createdAt: number;
  expiresAt: number;
}

export interface FileRecord {
  fileId: string;
  fileName: string;
  contentHash: string | null;
  size: number;
  mimeType: string;
  bucket: string;
  objectKey: string;
  storageLocation: string | null;
  status: FileStatus;
  scope: string;
  createdBy: string;
  uploadId: string | null;
  error: string | null;
  createdAt: number;
  updatedAt: number;
  expiresAt: number | null;
}

export interface ChunkRecord {
  uploadId: string;
  chunkNumber: number;
  size: number;
  contentTag: string;
  uploadedAt: number;
}

export type AccessType = "UPLOAD" | "DOWNLOAD" | "DELETE" | "VIEW";

export interface AccessLogEntry {
  id: string;
  fileId: string;
  accessType: AccessType;
  userId: string;
  accessedAt: number;
}

export interface InitiateUploadInput {
  fileName: string;
  totalSize: number;
  chunkSize?: number;
  scope: string;
  createdBy: string;
  mimeType?: string;
  contentHash?: string;
  allowDeduplication?: boolean;
  retentionMs?: number;
}

export type InitiateUploadResult =
  | {
      isDuplicate: false;
      fileId: string;
      uploadId: string;
      chunkSize: number;
      totalChunks: number;
      expiresAt: number;
    }
  | {
      isDuplicate: true;
      fileId: string;
    };

export interface ChunkWriteHandle {
  uploadId: string;
  chunkNumber: number;
  key: string;
  url: string;
  method: "PUT";
  expiresAt: number;
}

export interface ChunkAckResult {
  chunkNumber: number;
  receivedChunks: number;
  totalChunks: number;
  complete: boolean;
}

export interface SmallUploadInput {
  fileName: string;
  scope: string;
  createdBy: string;
  mimeType?: string;
  allowDeduplication?: boolean;
  retentionMs?: number;
}

export interface SmallUploadResult {
  fileId: string;
  isDuplicate: boolean;
}

export type UploadStatusView =
  | {
      uploadId: string;
      fileId: string;
      status: FileStatus;
      chunkSize: number;
      totalChunks: number;
      receivedChunks: number[];
      chunks: ChunkRecord[];
      expiresAt: number;
    }
  | {
      uploadId: string;
      fileId: string;
      status: FileStatus;
      error: string | null;
    };

export interface FileQueryFilters {
  scope?: string;
  createdBy?: string;
  mimeTypes?: string[];
  statuses?: FileStatus[];
  createdAfter?: number;
  createdBefore?: number;
}

export interface PageRequest {
  page?: number;
  size?: number;
}

export interface FileQueryResult {
  items: FileRecord[];
  total: number;
  page: number;
  size: number;
}

export interface DownloadLink {
  fileId: string;
  url: string;
  fileName: string;
  size: number;
  mimeType: string;
  expiresAt: number;
}
