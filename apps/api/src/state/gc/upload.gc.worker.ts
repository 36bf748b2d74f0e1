// src/state/gc/upload.gc.worker.ts

import { runBlobOperation } from "../../services/upload/blob.metrics.js";
import { deleteChunkObjects } from "../../services/upload/chunk.cleanup.js";
import { releaseCanonical } from "../../services/upload/upload.dedup.js";
import { blobContext, type UploadDeps } from "../../services/upload/upload.deps.js";
import { isLiveClaim } from "../../services/upload/upload.session.js";
import type { FileRecord } from "../../types/upload.js";

export type GcPassOutcome = { ok: true; count: number } | { ok: false; error: string };

export interface UploadGcReport {
  expiredSessions: GcPassOutcome;
  failedFiles: GcPassOutcome;
  expiredFiles: GcPassOutcome;
  accessLog: GcPassOutcome;
}

const yieldToLoop = () => new Promise<void>((r) => setImmediate(r));

async function runPass(
  deps: UploadDeps,
  name: keyof UploadGcReport,
  pass: () => Promise<number>
): Promise<GcPassOutcome> {
  try {
    const count = await pass();
    if (count > 0) deps.log.info({ pass: name, count }, "Upload GC pass finished");
    return { ok: true, count };
  } catch (err) {
    deps.log.error({ pass: name, err }, "Upload GC pass failed");
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Marks the file of an expired session FAILED unless someone is committing it
 * right now, or it already reached a final state.
 */
async function failExpiredUpload(deps: UploadDeps, record: FileRecord, now: number) {
  if (record.status === "COMPLETED" || record.status === "EXPIRED") return;

  const expect =
    record.status === "UPLOADING"
      ? { statuses: ["UPLOADING"] as const, updatedAt: record.updatedAt }
      : { statuses: ["PENDING", "FAILED"] as const };

  await deps.files.compareAndSetStatus(record.fileId, expect, "FAILED", {
    error: "UPLOAD_EXPIRED",
    updatedAt: now,
  });
}

/**
 * Sessions past `expiresAt`, including index entries whose session key
 * already lapsed. Chunk objects and bookkeeping go with them.
 */
async function sweepExpiredSessions(deps: UploadDeps): Promise<number> {
  const now = deps.now();
  const uploadIds = await deps.sessions.listActive();
  let swept = 0;

  for (const uploadId of uploadIds) {
    try {
      const session = await deps.sessions.get(uploadId);
      if (session && now <= session.expiresAt) continue;

      const fileId = session?.fileId ?? (await deps.sessions.getMeta(uploadId))?.fileId;
      const record = fileId ? await deps.files.get(fileId) : null;

      // A finalize in flight still needs its chunks.
      if (record && isLiveClaim(record, now, deps.config.finalize.leaseMs)) continue;
      if (record) await failExpiredUpload(deps, record, now);

      await deleteChunkObjects(deps, uploadId);
      await deps.sessions.delete(uploadId);
      swept++;

      deps.log.warn({ uploadId, fileId }, "GC removed expired upload session");
    } catch (err) {
      deps.log.warn({ uploadId, err }, "GC could not sweep upload session");
    }

    await yieldToLoop();
  }

  return swept;
}

async function sweepFailedFiles(deps: UploadDeps): Promise<number> {
  const now = deps.now();
  const cutoff = now - deps.config.gc.failedRetentionMs;
  const failed = await deps.files.listByStatus("FAILED");
  let removed = 0;

  for (const record of failed) {
    if (record.createdAt >= cutoff) continue;

    try {
      // Delete the record first: if a retry re-claimed it, the object stays.
      const deleted = await deps.files.delete(record.fileId, "FAILED");
      if (!deleted) continue;

      await runBlobOperation(
        blobContext(deps),
        { operation: "delete", key: record.objectKey, queue: deps.limiter.cleanup },
        () => deps.blobs.delete(record.objectKey)
      ).catch((err: unknown) => {
        deps.log.warn({ fileId: record.fileId, err }, "GC could not delete partial object");
      });
      await releaseCanonical(deps, record);
      removed++;
    } catch (err) {
      deps.log.warn({ fileId: record.fileId, err }, "GC could not remove failed file");
    }

    await yieldToLoop();
  }

  return removed;
}

/** Metadata only: the stored object is left for the operator's lifecycle rules. */
async function expireCompletedFiles(deps: UploadDeps): Promise<number> {
  const now = deps.now();
  const completed = await deps.files.listByStatus("COMPLETED");
  let expired = 0;

  for (const record of completed) {
    if (record.expiresAt === null || now <= record.expiresAt) continue;

    const result = await deps.files.compareAndSetStatus(
      record.fileId,
      { statuses: ["COMPLETED"] },
      "EXPIRED",
      { updatedAt: now }
    );
    if (!result.ok) continue;

    await releaseCanonical(deps, record);
    expired++;
  }

  return expired;
}

async function pruneAccessLog(deps: UploadDeps): Promise<number> {
  return deps.accessLog.pruneBefore(deps.now() - deps.config.gc.accessLogRetentionMs);
}

/**
 * One sweep. Passes run in order and never abort each other; every pass is
 * safe to repeat.
 */
export async function runUploadGc(deps: UploadDeps): Promise<UploadGcReport> {
  const expiredSessions = await runPass(deps, "expiredSessions", () => sweepExpiredSessions(deps));
  const failedFiles = await runPass(deps, "failedFiles", () => sweepFailedFiles(deps));
  const expiredFiles = await runPass(deps, "expiredFiles", () => expireCompletedFiles(deps));
  const accessLog = await runPass(deps, "accessLog", () => pruneAccessLog(deps));

  return { expiredSessions, failedFiles, expiredFiles, accessLog };
}
