// src/services/upload/chunk.tracker.ts

import type { SessionStore } from "../../state/session.store.js";
import type { UploadSession } from "../../types/upload.js";
import { NotFoundError } from "../../utils/apiError.js";

/**
 * Bookkeeping for one session's received chunks. Every read goes to the
 * store's set, never to a cached copy, so completeness is judged on the
 * latest acknowledged state.
 */
export class ChunkTracker {
  constructor(
    private readonly sessions: SessionStore,
    private readonly session: Pick<UploadSession, "uploadId" | "totalChunks">
  ) {}

  count(): Promise<number> {
    return this.sessions.countChunks(this.session.uploadId);
  }

  contains(chunkNumber: number): Promise<boolean> {
    return this.sessions.hasChunk(this.session.uploadId, chunkNumber);
  }

  list(): Promise<number[]> {
    return this.sessions.listChunks(this.session.uploadId);
  }

  async add(chunkNumber: number): Promise<void> {
    const added = await this.sessions.addChunk(this.session.uploadId, chunkNumber);
    if (!added) {
      throw new NotFoundError(
        "UPLOAD_NOT_FOUND",
        `Upload ${this.session.uploadId} no longer has a session`
      );
    }
  }

  async isComplete(): Promise<boolean> {
    return (await this.count()) === this.session.totalChunks;
  }
}
