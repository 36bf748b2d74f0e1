// src/state/gc/upload.gc.reconcile.ts

import { runBlobOperation } from "../../services/upload/blob.metrics.js";
import { deleteChunkObjects } from "../../services/upload/chunk.cleanup.js";
import { blobContext, type UploadDeps } from "../../services/upload/upload.deps.js";
import { isUuid } from "../../utils/guards.js";

const CHUNK_ROOT = "chunks/";

/**
 * Reconcile chunk objects in the blob store that no session owns, e.g. after
 * the state store was flushed or a session key lapsed mid-upload. Objects
 * younger than the grace period are left for an upload that may still ack
 * them.
 */
export async function reconcileOrphanChunks(deps: UploadDeps): Promise<number> {
  const cutoff = deps.now() - deps.config.gc.graceMs;

  const objects = await runBlobOperation(
    blobContext(deps),
    { operation: "list", key: CHUNK_ROOT },
    () => deps.blobs.list(CHUNK_ROOT)
  );

  const byUpload = new Map<string, string[]>();
  for (const object of objects) {
    const uploadId = object.key.slice(CHUNK_ROOT.length).split("/")[0];
    if (!isUuid(uploadId)) continue;
    if (object.updatedAt > cutoff) continue;

    const keys = byUpload.get(uploadId) ?? [];
    keys.push(object.key);
    byUpload.set(uploadId, keys);
  }

  let deleted = 0;
  for (const [uploadId, keys] of byUpload) {
    const session = await deps.sessions.get(uploadId);
    if (session) continue;

    deps.log.warn({ uploadId, objects: keys.length }, "Deleting orphan chunk objects");
    deleted += await deleteChunkObjects(deps, uploadId, keys);
  }

  return deleted;
}
