// src/services/upload/upload.dedup.ts

import type { FileRecord } from "../../types/upload.js";
import { InternalError } from "../../utils/apiError.js";
import type { UploadDeps } from "./upload.deps.js";

const MAX_CLAIM_ATTEMPTS = 3;

/**
 * The canonical pointer for `(contentHash, scope)`, if it still names a
 * COMPLETED record. A pointer to anything else is stale and dropped.
 */
export async function resolveDuplicate(
  deps: UploadDeps,
  contentHash: string,
  scope: string
): Promise<FileRecord | null> {
  const fileId = await deps.files.findCanonical(scope, contentHash);
  if (!fileId) return null;

  const record = await deps.files.get(fileId);
  if (record?.status === "COMPLETED") return record;

  await deps.files.releaseCanonical(scope, contentHash, fileId);
  deps.log.warn(
    { fileId, scope, status: record?.status ?? null },
    "Released stale dedup pointer"
  );
  return null;
}

/**
 * Set-if-absent on the dedup index. The first committed writer wins; a
 * loser gets the winner back instead of an error.
 */
export async function registerCanonical(
  deps: UploadDeps,
  record: FileRecord
): Promise<{ won: boolean; winner: FileRecord }> {
  const { contentHash, scope } = record;
  if (!contentHash) {
    throw new InternalError("INTERNAL_ERROR", "Cannot register a file without a content hash");
  }

  for (let attempt = 0; attempt < MAX_CLAIM_ATTEMPTS; attempt++) {
    const holder = await deps.files.claimCanonical(scope, contentHash, record.fileId);
    if (holder === record.fileId) {
      return { won: true, winner: record };
    }

    const winner = await deps.files.get(holder);
    if (winner?.status === "COMPLETED") {
      return { won: false, winner };
    }

    await deps.files.releaseCanonical(scope, contentHash, holder);
  }

  throw new InternalError(
    "INTERNAL_ERROR",
    `Dedup index for ${scope} kept pointing at unusable records`
  );
}

export async function releaseCanonical(deps: UploadDeps, record: FileRecord): Promise<void> {
  if (!record.contentHash) return;
  const released = await deps.files.releaseCanonical(record.scope, record.contentHash, record.fileId);
  if (released) {
    deps.log.debug({ fileId: record.fileId, scope: record.scope }, "Released dedup pointer");
  }
}
