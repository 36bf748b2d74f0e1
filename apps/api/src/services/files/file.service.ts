// src/services/files/file.service.ts

import {
  FILE_STATUSES,
  isFileStatus,
  type DownloadLink,
  type FileQueryFilters,
  type FileQueryResult,
  type FileRecord,
  type PageRequest,
} from "../../types/upload.js";
import {
  ConflictError,
  ExpiredError,
  NotFoundError,
  ValidationError,
} from "../../utils/apiError.js";
import { isUuid } from "../../utils/guards.js";
import { runBlobOperation } from "../upload/blob.metrics.js";
import { cancelUpload } from "../upload/upload.coordinator.js";
import { releaseCanonical } from "../upload/upload.dedup.js";
import { blobContext, type UploadDeps } from "../upload/upload.deps.js";
import { isLiveClaim, validateScope } from "../upload/upload.session.js";

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

async function requireFile(deps: UploadDeps, fileId: string): Promise<FileRecord> {
  if (!isUuid(fileId)) {
    throw new ValidationError("INVALID_FILE_ID", "fileId must be a UUID");
  }
  const record = await deps.files.get(fileId);
  if (!record) {
    throw new NotFoundError("FILE_NOT_FOUND", `File ${fileId} not found`);
  }
  return record;
}

export async function getFileMetadata(
  deps: UploadDeps,
  fileId: string,
  userId: string
): Promise<FileRecord> {
  const record = await requireFile(deps, fileId);
  await deps.accessLog.append({
    fileId,
    accessType: "VIEW",
    userId,
    accessedAt: deps.now(),
  });
  return record;
}

export async function getDownloadUrl(
  deps: UploadDeps,
  fileId: string,
  ttlMs: number,
  userId: string
): Promise<DownloadLink> {
  const { minMs, maxMs } = deps.config.downloadTtl;
  if (!Number.isInteger(ttlMs) || ttlMs < minMs || ttlMs > maxMs) {
    throw new ValidationError("INVALID_TTL", `ttlMs must be between ${minMs} and ${maxMs}`, {
      details: { minMs, maxMs },
    });
  }

  const record = await requireFile(deps, fileId);
  const now = deps.now();

  if (record.status === "EXPIRED" || (record.expiresAt !== null && now > record.expiresAt)) {
    throw new ExpiredError("FILE_EXPIRED", `File ${fileId} has expired`);
  }
  if (record.status !== "COMPLETED") {
    throw new ConflictError("FILE_NOT_READY", `File ${fileId} is ${record.status}`, {
      details: { status: record.status },
    });
  }

  const signed = await runBlobOperation(
    blobContext(deps),
    { operation: "sign", key: record.objectKey },
    () => deps.blobs.issueReadAuthorization(record.objectKey, ttlMs, record.fileName)
  );

  await deps.accessLog.append({
    fileId,
    accessType: "DOWNLOAD",
    userId,
    accessedAt: now,
  });

  return {
    fileId,
    url: signed.url,
    fileName: record.fileName,
    size: record.size,
    mimeType: record.mimeType,
    expiresAt: signed.expiresAt,
  };
}

export async function deleteFile(deps: UploadDeps, fileId: string, userId: string): Promise<void> {
  const record = await requireFile(deps, fileId);

  if (isLiveClaim(record, deps.now(), deps.config.finalize.leaseMs)) {
    throw new ConflictError("UPLOAD_FINALIZATION_IN_PROGRESS", "File is currently being written", {
      retryable: true,
    });
  }

  if (record.uploadId && (record.status === "PENDING" || record.status === "FAILED")) {
    try {
      await cancelUpload(deps, record.uploadId);
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
    }
  }

  await runBlobOperation(
    blobContext(deps),
    { operation: "delete", key: record.objectKey },
    () => deps.blobs.delete(record.objectKey)
  ).catch((err: unknown) => {
    deps.log.warn({ err, fileId }, "Failed to delete stored object; removing record anyway");
  });

  await deps.files.delete(fileId);
  await releaseCanonical(deps, record);

  await deps.accessLog.append({
    fileId,
    accessType: "DELETE",
    userId,
    accessedAt: deps.now(),
  });

  deps.log.info({ fileId, userId }, "File deleted");
}

function normalizeFilters(filters: FileQueryFilters): FileQueryFilters {
  const out: FileQueryFilters = {};

  if (filters.scope !== undefined) out.scope = validateScope(filters.scope);
  if (filters.createdBy !== undefined) out.createdBy = filters.createdBy;
  if (filters.mimeTypes?.length) out.mimeTypes = filters.mimeTypes.map((m) => m.toLowerCase());

  if (filters.statuses?.length) {
    const invalid = filters.statuses.filter((s) => !isFileStatus(s));
    if (invalid.length > 0) {
      throw new ValidationError("INVALID_QUERY", `status must be one of ${FILE_STATUSES.join(", ")}`);
    }
    out.statuses = filters.statuses;
  }

  for (const field of ["createdAfter", "createdBefore"] as const) {
    const value = filters[field];
    if (value === undefined) continue;
    if (!Number.isFinite(value)) {
      throw new ValidationError("INVALID_QUERY", `${field} must be a timestamp in milliseconds`);
    }
    out[field] = value;
  }

  return out;
}

export async function queryFiles(
  deps: UploadDeps,
  filters: FileQueryFilters,
  pageRequest: PageRequest = {}
): Promise<FileQueryResult> {
  const page = pageRequest.page ?? 1;
  const size = pageRequest.size ?? DEFAULT_PAGE_SIZE;

  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError("INVALID_QUERY", "page must be a positive integer");
  }
  if (!Number.isInteger(size) || size < 1 || size > MAX_PAGE_SIZE) {
    throw new ValidationError("INVALID_QUERY", `size must be between 1 and ${MAX_PAGE_SIZE}`);
  }

  const { items, total } = await deps.files.query(normalizeFilters(filters), { page, size });
  return { items, total, page, size };
}
