// src/services/upload/upload.coordinator.ts

import crypto from "crypto";
import type { Readable } from "stream";

import { storageLocation } from "../../store/blob.store.js";
import type {
  ChunkAckResult,
  ChunkWriteHandle,
  FileRecord,
  InitiateUploadInput,
  InitiateUploadResult,
  SmallUploadInput,
  SmallUploadResult,
  UploadSession,
  UploadStatusView,
} from "../../types/upload.js";
import {
  ConflictError,
  NotFoundError,
  UploadError,
  UpstreamError,
  ValidationError,
} from "../../utils/apiError.js";
import { runBlobOperation } from "./blob.metrics.js";
import { ChunkTracker } from "./chunk.tracker.js";
import { deleteChunkObjects } from "./chunk.cleanup.js";
import { registerCanonical, resolveDuplicate } from "./upload.dedup.js";
import { blobContext, type UploadDeps } from "./upload.deps.js";
import {
  chunkKey,
  computeTotalChunks,
  expectedChunkSize,
  isLiveClaim,
  loadActiveSession,
  normalizeContentHash,
  normalizeMimeType,
  objectKeyFor,
  requireChunkNumber,
  requireUploadId,
  validateFileName,
  validateRetention,
  validateScope,
  validateUser,
} from "./upload.session.js";

function requireTotalSize(totalSize: unknown, maxBytes: number): number {
  if (typeof totalSize !== "number" || !Number.isInteger(totalSize) || totalSize <= 0) {
    throw new ValidationError("INVALID_FILE_SIZE", "totalSize must be a positive integer");
  }
  if (totalSize > maxBytes) {
    throw new ValidationError("FILE_TOO_LARGE", `File exceeds maxFileSizeBytes (${maxBytes})`, {
      statusCode: 413,
      details: { maxFileSizeBytes: maxBytes },
    });
  }
  return totalSize;
}

function newFileRecord(
  deps: UploadDeps,
  input: {
    fileId: string;
    fileName: string;
    contentHash: string | null;
    size: number;
    mimeType: string;
    scope: string;
    createdBy: string;
    uploadId: string | null;
    retentionMs?: number;
    createdAt: number;
  },
  status: FileRecord["status"]
): FileRecord {
  return {
    fileId: input.fileId,
    fileName: input.fileName,
    contentHash: input.contentHash,
    size: input.size,
    mimeType: input.mimeType,
    bucket: deps.blobs.bucket,
    objectKey: objectKeyFor(input),
    storageLocation: null,
    status,
    scope: input.scope,
    createdBy: input.createdBy,
    uploadId: input.uploadId,
    error: null,
    createdAt: input.createdAt,
    updatedAt: input.createdAt,
    expiresAt: input.retentionMs === undefined ? null : input.createdAt + input.retentionMs,
  };
}

export async function initiateUpload(
  deps: UploadDeps,
  input: InitiateUploadInput
): Promise<InitiateUploadResult> {
  const { config } = deps;

  const fileName = validateFileName(input.fileName);
  const scope = validateScope(input.scope);
  const createdBy = validateUser(input.createdBy);
  const mimeType = normalizeMimeType(input.mimeType);
  const contentHash =
    input.contentHash === undefined ? null : normalizeContentHash(input.contentHash);
  const retentionMs = validateRetention(input.retentionMs);
  const allowDeduplication = input.allowDeduplication ?? true;

  const totalSize = requireTotalSize(input.totalSize, config.maxFileSizeBytes);

  const chunkSize = input.chunkSize ?? config.chunk.defaultBytes;
  if (
    !Number.isInteger(chunkSize) ||
    chunkSize < config.chunk.minBytes ||
    chunkSize > config.chunk.maxBytes
  ) {
    throw new ValidationError(
      "INVALID_CHUNK_SIZE",
      `chunkSize must be an integer between ${config.chunk.minBytes} and ${config.chunk.maxBytes}`,
      { details: { minBytes: config.chunk.minBytes, maxBytes: config.chunk.maxBytes } }
    );
  }

  const totalChunks = computeTotalChunks(totalSize, chunkSize);
  if (totalChunks < 2) {
    throw new ValidationError(
      "USE_SINGLE_UPLOAD",
      "File fits in a single chunk; use the single-shot upload instead",
      { details: { maxSingleUploadBytes: config.maxSingleUploadBytes } }
    );
  }
  if (totalChunks > config.maxTotalChunks) {
    throw new ValidationError(
      "TOO_MANY_CHUNKS",
      `totalChunks exceeds maxTotalChunks (${config.maxTotalChunks})`,
      { statusCode: 413, details: { totalChunks, maxTotalChunks: config.maxTotalChunks } }
    );
  }

  if (contentHash && allowDeduplication) {
    const existing = await resolveDuplicate(deps, contentHash, scope);
    if (existing) {
      deps.log.info({ fileId: existing.fileId, scope }, "Initiate resolved to existing file");
      return { isDuplicate: true, fileId: existing.fileId };
    }
  }

  const activeUploads = await deps.sessions.countActive();
  if (activeUploads >= config.maxActiveUploads) {
    throw new ConflictError("UPLOAD_CAPACITY_REACHED", "Too many active uploads", {
      statusCode: 429,
      retryable: true,
    });
  }

  const now = deps.now();
  const fileId = crypto.randomUUID();
  const uploadId = crypto.randomUUID();
  const expiresAt = now + config.sessionTtlMs;

  const record = newFileRecord(
    deps,
    {
      fileId,
      fileName,
      contentHash,
      size: totalSize,
      mimeType,
      scope,
      createdBy,
      uploadId,
      retentionMs,
      createdAt: now,
    },
    "PENDING"
  );

  const session: UploadSession = {
    uploadId,
    fileId,
    fileName,
    mimeType,
    totalSize,
    chunkSize,
    totalChunks,
    uploadedChunks: [],
    scope,
    createdBy,
    contentHash,
    allowDeduplication,
    createdAt: now,
    expiresAt,
  };

  await deps.files.insert(record);
  try {
    await deps.sessions.create(session);
  } catch (err) {
    await deps.files.delete(fileId, "PENDING");
    throw err;
  }

  deps.log.info({ uploadId, fileId, totalChunks }, "Upload session created");

  return { isDuplicate: false, fileId, uploadId, chunkSize, totalChunks, expiresAt };
}

async function loadWritableSession(
  deps: UploadDeps,
  uploadId: unknown,
  chunkNumber: unknown
): Promise<{ session: UploadSession; chunkNumber: number }> {
  const id = requireUploadId(uploadId);
  requireChunkNumber(chunkNumber);

  const session = await loadActiveSession(deps, id);
  const n = requireChunkNumber(chunkNumber, session.totalChunks);

  const record = await deps.files.get(session.fileId);
  if (!record) {
    throw new NotFoundError("FILE_NOT_FOUND", `File ${session.fileId} not found`);
  }
  if (record.status !== "PENDING") {
    throw new ConflictError(
      "UPLOAD_NOT_ACCEPTING_CHUNKS",
      `Upload ${id} is ${record.status} and no longer accepts chunks`,
      { details: { status: record.status } }
    );
  }

  return { session, chunkNumber: n };
}

export async function authorizeChunk(
  deps: UploadDeps,
  uploadId: string,
  chunkNumber: number
): Promise<ChunkWriteHandle> {
  const { session } = await loadWritableSession(deps, uploadId, chunkNumber);

  const key = chunkKey(session.uploadId, chunkNumber);
  const ttlMs = Math.min(deps.config.chunkUrlTtlMs, session.expiresAt - deps.now());

  const signed = await runBlobOperation(blobContext(deps), { operation: "sign", key }, () =>
    deps.blobs.issueWriteAuthorization(key, ttlMs)
  );

  return {
    uploadId: session.uploadId,
    chunkNumber,
    key,
    url: signed.url,
    method: "PUT",
    expiresAt: signed.expiresAt,
  };
}

export async function acknowledgeChunk(
  deps: UploadDeps,
  uploadId: string,
  chunkNumber: number,
  size: number,
  tag: string
): Promise<ChunkAckResult> {
  const { session } = await loadWritableSession(deps, uploadId, chunkNumber);

  if (!Number.isInteger(size) || size < 0) {
    throw new ValidationError("INVALID_CHUNK", "size must be a non-negative integer");
  }
  if (typeof tag !== "string" || tag.length > 256) {
    throw new ValidationError("INVALID_CHUNK", "tag must be a string of at most 256 characters");
  }

  const key = chunkKey(session.uploadId, chunkNumber);
  const stored = await runBlobOperation(blobContext(deps), { operation: "stat", key }, () =>
    deps.blobs.stat(key)
  );
  if (!stored) {
    throw new ConflictError(
      "CHUNK_NOT_STORED",
      `Chunk ${chunkNumber} has not been written to the blob store`,
      { retryable: true }
    );
  }

  const expected = expectedChunkSize(session, chunkNumber);
  if (size !== expected || stored.size !== size) {
    deps.log.warn(
      { uploadId, chunkNumber, expected, reported: size, stored: stored.size },
      "Chunk size mismatch"
    );
  }

  const tracker = new ChunkTracker(deps.sessions, session);
  await tracker.add(chunkNumber);
  await deps.sessions.recordChunk({
    uploadId: session.uploadId,
    chunkNumber,
    size,
    contentTag: tag,
    uploadedAt: deps.now(),
  });

  const receivedChunks = await tracker.count();

  return {
    chunkNumber,
    receivedChunks,
    totalChunks: session.totalChunks,
    complete: receivedChunks === session.totalChunks,
  };
}

/**
 * Server-side convenience for clients that cannot PUT to a signed URL.
 * Goes through the same authorize and acknowledge steps.
 */
export async function writeChunk(
  deps: UploadDeps,
  uploadId: string,
  chunkNumber: number,
  body: Buffer | Readable
): Promise<ChunkAckResult & { accepted: true }> {
  const handle = await authorizeChunk(deps, uploadId, chunkNumber);

  const stored = await runBlobOperation(
    blobContext(deps),
    { operation: "put", key: handle.key, maxAttempts: Buffer.isBuffer(body) ? undefined : 1 },
    () => deps.blobs.put(handle.key, body)
  );

  const ack = await acknowledgeChunk(deps, uploadId, chunkNumber, stored.size, stored.etag);
  return { accepted: true, ...ack };
}

export async function uploadSmall(
  deps: UploadDeps,
  input: SmallUploadInput,
  contentHash: string,
  content: Buffer
): Promise<SmallUploadResult> {
  const fileName = validateFileName(input.fileName);
  const scope = validateScope(input.scope);
  const createdBy = validateUser(input.createdBy);
  const mimeType = normalizeMimeType(input.mimeType);
  const hash = normalizeContentHash(contentHash);
  const retentionMs = validateRetention(input.retentionMs);
  const allowDeduplication = input.allowDeduplication ?? true;

  if (content.length === 0) {
    throw new ValidationError("INVALID_FILE_SIZE", "Content must not be empty");
  }
  if (content.length > deps.config.maxSingleUploadBytes) {
    throw new ValidationError(
      "FILE_TOO_LARGE",
      `Single-shot uploads are limited to ${deps.config.maxSingleUploadBytes} bytes`,
      { statusCode: 413, details: { maxSingleUploadBytes: deps.config.maxSingleUploadBytes } }
    );
  }

  const actual = crypto.createHash("sha256").update(content).digest("hex");
  if (actual !== hash) {
    throw new ValidationError("HASH_MISMATCH", "Content does not match contentHash", {
      details: { expected: hash, actual },
    });
  }

  if (allowDeduplication) {
    const existing = await resolveDuplicate(deps, hash, scope);
    if (existing) return { fileId: existing.fileId, isDuplicate: true };
  }

  const now = deps.now();
  // Inserted already holding the commit claim: nobody else ever writes this object.
  const record = newFileRecord(
    deps,
    {
      fileId: crypto.randomUUID(),
      fileName,
      contentHash: hash,
      size: content.length,
      mimeType,
      scope,
      createdBy,
      uploadId: null,
      retentionMs,
      createdAt: now,
    },
    "UPLOADING"
  );
  await deps.files.insert(record);

  const ctx = blobContext(deps);
  try {
    await runBlobOperation(ctx, { operation: "put", key: record.objectKey }, () =>
      deps.blobs.put(record.objectKey, content)
    );
  } catch (err) {
    const code = err instanceof UploadError ? err.code : "INTERNAL_ERROR";
    await deps.files.compareAndSetStatus(record.fileId, { statuses: ["UPLOADING"] }, "FAILED", {
      error: code,
      updatedAt: deps.now(),
    });
    throw err;
  }

  const completed = await deps.files.compareAndSetStatus(
    record.fileId,
    { statuses: ["UPLOADING"] },
    "COMPLETED",
    {
      storageLocation: storageLocation(record.bucket, record.objectKey),
      updatedAt: deps.now(),
    }
  );
  if (!completed.ok) {
    throw new UpstreamError("METADATA_STORE_UNAVAILABLE", "File record changed during upload", {
      details: { fileId: record.fileId, status: completed.current?.status ?? null },
    });
  }

  if (allowDeduplication) {
    const { won, winner } = await registerCanonical(deps, completed.record);
    if (!won) {
      // Lost the race to identical content: keep the winner, drop our copy.
      await runBlobOperation(ctx, { operation: "delete", key: record.objectKey }, () =>
        deps.blobs.delete(record.objectKey)
      ).catch((err: unknown) => {
        deps.log.warn({ err, fileId: record.fileId }, "Failed to delete duplicate object");
      });
      await deps.files.delete(record.fileId);
      deps.log.info(
        { fileId: record.fileId, winner: winner.fileId },
        "Duplicate single-shot upload resolved to existing file"
      );
      return { fileId: winner.fileId, isDuplicate: true };
    }
  }

  await deps.accessLog.append({
    fileId: record.fileId,
    accessType: "UPLOAD",
    userId: createdBy,
    accessedAt: deps.now(),
  });

  return { fileId: record.fileId, isDuplicate: false };
}

export async function getUploadStatus(
  deps: UploadDeps,
  uploadId: string
): Promise<UploadStatusView> {
  const id = requireUploadId(uploadId);

  const session = await deps.sessions.get(id);
  if (session) {
    const [record, chunks] = await Promise.all([
      deps.files.get(session.fileId),
      deps.sessions.listChunkRecords(id),
    ]);
    return {
      uploadId: id,
      fileId: session.fileId,
      status: record?.status ?? "PENDING",
      chunkSize: session.chunkSize,
      totalChunks: session.totalChunks,
      receivedChunks: session.uploadedChunks,
      chunks,
      expiresAt: session.expiresAt,
    };
  }

  const meta = await deps.sessions.getMeta(id);
  if (!meta) {
    throw new NotFoundError("UPLOAD_NOT_FOUND", `Upload ${id} not found`);
  }

  const record = await deps.files.get(meta.fileId);
  if (!record) {
    throw new NotFoundError("FILE_NOT_FOUND", `File ${meta.fileId} not found`);
  }

  return { uploadId: id, fileId: record.fileId, status: record.status, error: record.error };
}

/**
 * Forces immediate expiry: the file is marked FAILED, the session and chunk
 * objects go. Repeating it is harmless.
 */
export async function cancelUpload(
  deps: UploadDeps,
  uploadId: string
): Promise<{ uploadId: string; fileId: string; status: FileRecord["status"] }> {
  const id = requireUploadId(uploadId);

  const session = await deps.sessions.get(id);
  const fileId = session?.fileId ?? (await deps.sessions.getMeta(id))?.fileId;
  if (!fileId) {
    throw new NotFoundError("UPLOAD_NOT_FOUND", `Upload ${id} not found`);
  }

  const record = await deps.files.get(fileId);
  if (record) {
    if (isLiveClaim(record, deps.now(), deps.config.finalize.leaseMs)) {
      throw new ConflictError(
        "UPLOAD_FINALIZATION_IN_PROGRESS",
        "Upload is currently finalizing",
        { retryable: true }
      );
    }
    if (record.status === "COMPLETED" || record.status === "EXPIRED") {
      throw new ConflictError("UPLOAD_ALREADY_COMPLETED", "Upload is already finalized");
    }

    const failed = await deps.files.compareAndSetStatus(
      fileId,
      { statuses: ["PENDING", "FAILED", "UPLOADING"], updatedAt: record.updatedAt },
      "FAILED",
      { error: "UPLOAD_CANCELED", updatedAt: deps.now() }
    );
    if (!failed.ok) {
      throw new ConflictError("UPLOAD_FINALIZATION_IN_PROGRESS", "Upload changed while canceling", {
        retryable: true,
      });
    }
  }

  await deleteChunkObjects(deps, id);
  await deps.sessions.delete(id);

  deps.log.info({ uploadId: id, fileId }, "Upload canceled");
  return { uploadId: id, fileId, status: "FAILED" };
}
