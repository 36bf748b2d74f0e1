// src/services/engine.ts

import type { Readable } from "stream";

import type {
  ChunkAckResult,
  ChunkWriteHandle,
  DownloadLink,
  FileQueryFilters,
  FileQueryResult,
  FileRecord,
  InitiateUploadInput,
  InitiateUploadResult,
  PageRequest,
  SmallUploadInput,
  SmallUploadResult,
  UploadStatusView,
} from "../types/upload.js";
import {
  deleteFile,
  getDownloadUrl,
  getFileMetadata,
  queryFiles,
} from "./files/file.service.js";
import {
  acknowledgeChunk,
  authorizeChunk,
  cancelUpload,
  getUploadStatus,
  initiateUpload,
  uploadSmall,
  writeChunk,
} from "./upload/upload.coordinator.js";
import type { UploadDeps } from "./upload/upload.deps.js";
import { Finalizer } from "./upload/upload.finalize.js";

export interface UploadEngine {
  readonly deps: UploadDeps;

  initiateUpload(input: InitiateUploadInput): Promise<InitiateUploadResult>;
  authorizeChunk(uploadId: string, chunkNumber: number): Promise<ChunkWriteHandle>;
  acknowledgeChunk(
    uploadId: string,
    chunkNumber: number,
    size: number,
    tag: string
  ): Promise<ChunkAckResult>;
  writeChunk(
    uploadId: string,
    chunkNumber: number,
    body: Buffer | Readable
  ): Promise<ChunkAckResult & { accepted: true }>;
  completeUpload(uploadId: string): Promise<FileRecord>;
  getUploadStatus(uploadId: string): Promise<UploadStatusView>;
  cancelUpload(uploadId: string): Promise<{ uploadId: string; fileId: string; status: FileRecord["status"] }>;
  uploadSmall(input: SmallUploadInput, contentHash: string, content: Buffer): Promise<SmallUploadResult>;

  getFileMetadata(fileId: string, userId: string): Promise<FileRecord>;
  getDownloadUrl(fileId: string, ttlMs: number, userId: string): Promise<DownloadLink>;
  deleteFile(fileId: string, userId: string): Promise<void>;
  queryFiles(filters: FileQueryFilters, page?: PageRequest): Promise<FileQueryResult>;
}

export function createUploadEngine(deps: UploadDeps): UploadEngine {
  const finalizer = new Finalizer(deps);

  return {
    deps,

    initiateUpload: (input) => initiateUpload(deps, input),
    authorizeChunk: (uploadId, chunkNumber) => authorizeChunk(deps, uploadId, chunkNumber),
    acknowledgeChunk: (uploadId, chunkNumber, size, tag) =>
      acknowledgeChunk(deps, uploadId, chunkNumber, size, tag),
    writeChunk: (uploadId, chunkNumber, body) => writeChunk(deps, uploadId, chunkNumber, body),
    completeUpload: (uploadId) => finalizer.complete(uploadId),
    getUploadStatus: (uploadId) => getUploadStatus(deps, uploadId),
    cancelUpload: (uploadId) => cancelUpload(deps, uploadId),
    uploadSmall: (input, contentHash, content) => uploadSmall(deps, input, contentHash, content),

    getFileMetadata: (fileId, userId) => getFileMetadata(deps, fileId, userId),
    getDownloadUrl: (fileId, ttlMs, userId) => getDownloadUrl(deps, fileId, ttlMs, userId),
    deleteFile: (fileId, userId) => deleteFile(deps, fileId, userId),
    queryFiles: (filters, page) => queryFiles(deps, filters, page),
  };
}
