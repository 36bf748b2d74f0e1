// src/services/upload/chunk.cleanup.ts

import { blobContext, type UploadDeps } from "./upload.deps.js";
import { runBlobOperation } from "./blob.metrics.js";
import { chunkPrefix } from "./upload.session.js";

/**
 * Deletes an upload's chunk objects through the cleanup queue. Individual
 * failures are logged and counted, never thrown; the sweeper gets another go
 * at anything left behind.
 */
export async function deleteChunkObjects(
  deps: UploadDeps,
  uploadId: string,
  keys?: string[]
): Promise<number> {
  const ctx = blobContext(deps);
  const prefix = chunkPrefix(uploadId);

  const targets =
    keys ??
    (
      await runBlobOperation(ctx, { operation: "list", key: prefix }, () =>
        deps.blobs.list(prefix)
      )
    ).map((stat) => stat.key);

  const results = await Promise.allSettled(
    targets.map((key) =>
      runBlobOperation(
        ctx,
        { operation: "delete", key, queue: deps.limiter.cleanup },
        () => deps.blobs.delete(key)
      )
    )
  );

  const failures = results.filter((r) => r.status === "rejected").length;
  if (failures > 0) {
    deps.log.warn(
      { uploadId, failures, total: targets.length },
      "Some chunk objects could not be deleted"
    );
  }

  return targets.length - failures;
}
