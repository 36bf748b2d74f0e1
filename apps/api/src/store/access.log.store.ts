// src/store/access.log.store.ts

import type { AccessLogEntry } from "../types/upload.js";

export interface AccessLogStore {
  append(entry: Omit<AccessLogEntry, "id">): Promise<AccessLogEntry>;

  /** Oldest first. */
  listForFile(fileId: string): Promise<AccessLogEntry[]>;

  /** Removes entries with `accessedAt < cutoff`; returns how many went. */
  pruneBefore(cutoff: number): Promise<number>;
}
