// src/services/upload/upload.finalize.ts

import { storageLocation, type BlobStat } from "../../store/blob.store.js";
import type { FileRecord, UploadSession } from "../../types/upload.js";
import {
  ConflictError,
  ExpiredError,
  NotFoundError,
  UploadError,
  UpstreamError,
} from "../../utils/apiError.js";
import { runBlobOperation } from "./blob.metrics.js";
import { ChunkTracker } from "./chunk.tracker.js";
import { deleteChunkObjects } from "./chunk.cleanup.js";
import { registerCanonical } from "./upload.dedup.js";
import { blobContext, type UploadDeps } from "./upload.deps.js";
import { chunkKeys, isLiveClaim, requireUploadId } from "./upload.session.js";

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

/**
 * Turns a fully-chunked session into one composed object.
 *
 * Single-flight is enforced twice: callers in this process share the
 * in-flight promise, and across processes only the caller whose
 * compare-and-set moves the file to UPLOADING composes. Everyone else polls
 * the record until the winner reaches a terminal status.
 */
export class Finalizer {
  private readonly inflight = new Map<string, Promise<FileRecord>>();

  constructor(private readonly deps: UploadDeps) {}

  complete(uploadId: string): Promise<FileRecord> {
    const id = requireUploadId(uploadId);

    const existing = this.inflight.get(id);
    if (existing) return existing;

    const run = this.finalize(id).finally(() => {
      this.inflight.delete(id);
    });
    this.inflight.set(id, run);
    return run;
  }

  private async finalize(uploadId: string): Promise<FileRecord> {
    const { deps } = this;

    const session = await deps.sessions.get(uploadId);
    if (!session) return this.resolveWithoutSession(uploadId);

    if (deps.now() > session.expiresAt) {
      throw new ExpiredError("UPLOAD_EXPIRED", `Upload ${uploadId} has expired`, {
        details: { expiresAt: session.expiresAt },
      });
    }

    const tracker = new ChunkTracker(deps.sessions, session);
    const received = await tracker.count();
    if (received !== session.totalChunks) {
      throw new ConflictError(
        "UPLOAD_INCOMPLETE",
        `Only ${received}/${session.totalChunks} chunks uploaded`,
        { retryable: true, details: { receivedChunks: received, totalChunks: session.totalChunks } }
      );
    }

    const record = await deps.files.get(session.fileId);
    if (!record) {
      throw new NotFoundError("FILE_NOT_FOUND", `File ${session.fileId} not found`);
    }
    if (record.status === "COMPLETED") return record;
    if (record.status === "EXPIRED") {
      throw new ExpiredError("FILE_EXPIRED", `File ${record.fileId} has expired`);
    }

    const claim = await this.claim(record);
    if (!claim) return this.awaitTerminal(record.fileId);

    return this.commit(session, claim);
  }

  /**
   * PENDING, FAILED (an explicit retry) or an UPLOADING claim whose lease
   * ran out can be taken, but only in the exact version this caller read:
   * a record that moved on since (say PENDING to FAILED under another
   * caller's compose) belongs to that caller's outcome. Returns null when
   * someone else holds it.
   */
  private async claim(record: FileRecord): Promise<FileRecord | null> {
    const { deps } = this;
    const now = deps.now();

    if (isLiveClaim(record, now, deps.config.finalize.leaseMs)) return null;

    const result = await deps.files.compareAndSetStatus(
      record.fileId,
      { statuses: [record.status], updatedAt: record.updatedAt },
      "UPLOADING",
      { error: null, updatedAt: now }
    );

    if (!result.ok) return null;

    if (record.status === "UPLOADING") {
      deps.log.warn({ fileId: record.fileId }, "Took over a stale finalize claim");
    }
    return result.record;
  }

  private async commit(session: UploadSession, claim: FileRecord): Promise<FileRecord> {
    const { deps } = this;
    const { uploadId } = session;
    const keys = chunkKeys(uploadId, session.totalChunks);

    let composed: BlobStat;
    try {
      composed = await runBlobOperation(
        blobContext(deps),
        {
          operation: "compose",
          key: claim.objectKey,
          queue: deps.limiter.compose,
          maxAttempts: 1,
        },
        () => deps.blobs.compose(keys, claim.objectKey)
      );
    } catch (err) {
      const code = err instanceof UploadError ? err.code : "INTERNAL_ERROR";
      await deps.files.compareAndSetStatus(
        claim.fileId,
        { statuses: ["UPLOADING"], updatedAt: claim.updatedAt },
        "FAILED",
        { error: code, updatedAt: deps.now() }
      );

      deps.log.error({ uploadId, fileId: claim.fileId, err }, "Upload finalization failed");

      if (err instanceof UploadError) throw err;
      throw new UpstreamError("BLOB_STORE_UNAVAILABLE", "Compose failed", { cause: err });
    }

    const completed = await deps.files.compareAndSetStatus(
      claim.fileId,
      { statuses: ["UPLOADING"], updatedAt: claim.updatedAt },
      "COMPLETED",
      {
        storageLocation: storageLocation(claim.bucket, claim.objectKey),
        size: composed.size,
        error: null,
        updatedAt: deps.now(),
      }
    );

    if (!completed.ok) {
      // Our lease lapsed and another caller took over; defer to its outcome.
      if (completed.current?.status === "COMPLETED") return completed.current;
      throw new ConflictError(
        "UPLOAD_FINALIZATION_IN_PROGRESS",
        "Upload finalization was taken over by another caller",
        { retryable: true }
      );
    }

    if (composed.size !== session.totalSize) {
      deps.log.warn(
        { uploadId, fileId: claim.fileId, expected: session.totalSize, actual: composed.size },
        "Composed object size differs from declared size"
      );
    }

    if (session.allowDeduplication && completed.record.contentHash) {
      const { won, winner } = await registerCanonical(deps, completed.record);
      if (!won) {
        deps.log.info(
          { fileId: claim.fileId, canonical: winner.fileId },
          "Identical content already committed; keeping this file as non-canonical"
        );
      }
    }

    await deps.sessions.delete(uploadId);
    await deps.accessLog.append({
      fileId: claim.fileId,
      accessType: "UPLOAD",
      userId: session.createdBy,
      accessedAt: deps.now(),
    });

    void deleteChunkObjects(deps, uploadId, keys).catch((err: unknown) => {
      deps.log.warn({ uploadId, err }, "Chunk cleanup after finalize failed");
    });

    deps.log.info(
      { uploadId, fileId: claim.fileId, size: composed.size },
      "Upload finalized"
    );

    return completed.record;
  }

  /**
   * Polls until the claim holder reaches COMPLETED or FAILED, or gives up
   * after the configured wait.
   */
  private async awaitTerminal(fileId: string): Promise<FileRecord> {
    const { deps } = this;
    const { waitMs, pollMs } = deps.config.finalize;
    const polls = Math.max(1, Math.ceil(waitMs / pollMs));

    for (let i = 0; i < polls; i++) {
      const record = await deps.files.get(fileId);
      if (!record) {
        throw new NotFoundError("FILE_NOT_FOUND", `File ${fileId} not found`);
      }
      if (record.status === "COMPLETED") return record;
      if (record.status === "FAILED") {
        throw new UpstreamError("BLOB_STORE_UNAVAILABLE", "Upload finalization failed", {
          details: { fileId, error: record.error },
        });
      }
      if (record.status === "EXPIRED") {
        throw new ExpiredError("FILE_EXPIRED", `File ${fileId} has expired`);
      }
      await sleep(pollMs);
    }

    throw new ConflictError(
      "UPLOAD_FINALIZATION_IN_PROGRESS",
      "Upload is currently finalizing",
      { retryable: true }
    );
  }

  /**
   * The session is gone: either finalize already succeeded (answer with the
   * file again) or the upload expired or was canceled.
   */
  private async resolveWithoutSession(uploadId: string): Promise<FileRecord> {
    const { deps } = this;

    const meta = await deps.sessions.getMeta(uploadId);
    if (!meta) {
      throw new NotFoundError("UPLOAD_NOT_FOUND", `Upload ${uploadId} not found`);
    }

    const record = await deps.files.get(meta.fileId);
    if (record?.status === "COMPLETED") return record;

    throw new ExpiredError("UPLOAD_EXPIRED", `Upload ${uploadId} has expired`, {
      details: { fileId: meta.fileId, status: record?.status ?? null },
    });
  }
}
