// src/services/upload/upload.session.ts

import type { FileRecord, UploadSession } from "../../types/upload.js";
import {
  ExpiredError,
  NotFoundError,
  ValidationError,
} from "../../utils/apiError.js";
import { isUuid } from "../../utils/guards.js";
import type { UploadDeps } from "./upload.deps.js";

export const DEFAULT_MIME_TYPE = "application/octet-stream";

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

export function computeTotalChunks(totalSize: number, chunkSize: number): number {
  return Math.ceil(totalSize / chunkSize);
}

/**
 * Every chunk is `chunkSize` bytes except the last, which carries the
 * remainder.
 */
export function expectedChunkSize(
  session: Pick<UploadSession, "totalSize" | "chunkSize" | "totalChunks">,
  chunkNumber: number
): number {
  if (chunkNumber < session.totalChunks) return session.chunkSize;
  return session.totalSize - session.chunkSize * (session.totalChunks - 1);
}

export const chunkPrefix = (uploadId: string) => `chunks/${uploadId}/`;

export const chunkKey = (uploadId: string, chunkNumber: number) =>
  `${chunkPrefix(uploadId)}${chunkNumber}`;

export function chunkKeys(uploadId: string, totalChunks: number): string[] {
  return Array.from({ length: totalChunks }, (_, i) => chunkKey(uploadId, i + 1));
}

export function objectKeyFor(input: {
  scope: string;
  fileId: string;
  fileName: string;
  createdAt: number;
}): string {
  const day = new Date(input.createdAt).toISOString().slice(0, 10);
  return `files/${input.scope}/${day}/${input.fileId}/${input.fileName}`;
}

export function validateFileName(fileName: unknown): string {
  if (
    typeof fileName !== "string" ||
    fileName.trim().length === 0 ||
    fileName.length > 255 ||
    fileName === "." ||
    fileName.includes("..") ||
    fileName.includes("/") ||
    fileName.includes("\\") ||
    CONTROL_CHARS.test(fileName)
  ) {
    throw new ValidationError(
      "INVALID_FILENAME",
      "fileName must be 1-255 characters, not '.', without path separators or '..'"
    );
  }
  return fileName;
}

export function validateScope(scope: unknown): string {
  if (typeof scope !== "string" || !/^[A-Za-z0-9][A-Za-z0-9._:-]{0,127}$/.test(scope)) {
    throw new ValidationError(
      "INVALID_SCOPE",
      "scope must be 1-128 characters of letters, digits, '.', '_', ':' or '-'"
    );
  }
  return scope;
}

export function validateUser(userId: unknown): string {
  if (
    typeof userId !== "string" ||
    userId.trim().length === 0 ||
    userId.length > 128 ||
    CONTROL_CHARS.test(userId)
  ) {
    throw new ValidationError("INVALID_USER", "createdBy must be 1-128 printable characters");
  }
  return userId;
}

export function normalizeMimeType(mimeType: unknown): string {
  if (mimeType === undefined || mimeType === null || mimeType === "") return DEFAULT_MIME_TYPE;
  if (
    typeof mimeType !== "string" ||
    mimeType.length > 128 ||
    !/^[\w.+-]+\/[\w.+-]+$/.test(mimeType)
  ) {
    throw new ValidationError("INVALID_MIME_TYPE", "mimeType must look like type/subtype");
  }
  return mimeType.toLowerCase();
}

export function normalizeContentHash(contentHash: unknown): string {
  if (typeof contentHash !== "string" || !/^[0-9a-fA-F]{64}$/.test(contentHash)) {
    throw new ValidationError(
      "INVALID_CONTENT_HASH",
      "contentHash must be a SHA-256 digest of 64 hex characters"
    );
  }
  return contentHash.toLowerCase();
}

export function validateRetention(retentionMs: unknown): number | undefined {
  if (retentionMs === undefined) return undefined;
  if (typeof retentionMs !== "number" || !Number.isInteger(retentionMs) || retentionMs <= 0) {
    throw new ValidationError("INVALID_TTL", "retentionMs must be a positive integer");
  }
  return retentionMs;
}

export function requireUploadId(uploadId: unknown): string {
  if (!isUuid(uploadId)) {
    throw new ValidationError("INVALID_UPLOAD_ID", "uploadId must be a UUID");
  }
  return uploadId;
}

export function requireChunkNumber(chunkNumber: unknown, totalChunks?: number): number {
  if (
    typeof chunkNumber !== "number" ||
    !Number.isInteger(chunkNumber) ||
    chunkNumber < 1 ||
    (totalChunks !== undefined && chunkNumber > totalChunks)
  ) {
    throw new ValidationError(
      "INVALID_CHUNK",
      totalChunks === undefined
        ? "chunkNumber must be a positive integer"
        : `chunkNumber must be between 1 and ${totalChunks}`,
      totalChunks === undefined ? undefined : { details: { totalChunks } }
    );
  }
  return chunkNumber;
}

/**
 * A commit claim still inside its lease. Anything older is treated as
 * abandoned by a crashed writer.
 */
export function isLiveClaim(record: FileRecord, now: number, leaseMs: number): boolean {
  return record.status === "UPLOADING" && now - record.updatedAt < leaseMs;
}

export async function loadActiveSession(deps: UploadDeps, uploadId: string): Promise<UploadSession> {
  const session = await deps.sessions.get(uploadId);
  if (!session) {
    throw new NotFoundError("UPLOAD_NOT_FOUND", `Upload ${uploadId} not found`);
  }
  if (deps.now() > session.expiresAt) {
    throw new ExpiredError("UPLOAD_EXPIRED", `Upload ${uploadId} has expired`, {
      details: { expiresAt: session.expiresAt },
    });
  }
  return session;
}
