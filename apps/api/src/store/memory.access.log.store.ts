// src/store/memory.access.log.store.ts

import crypto from "crypto";

import type { AccessLogStore } from "./access.log.store.js";
import type { AccessLogEntry } from "../types/upload.js";

export class MemoryAccessLogStore implements AccessLogStore {
  private entries: AccessLogEntry[] = [];

  async append(entry: Omit<AccessLogEntry, "id">): Promise<AccessLogEntry> {
    const stored: AccessLogEntry = { id: crypto.randomUUID(), ...entry };
    this.entries.push(stored);
    return { ...stored };
  }

  async listForFile(fileId: string): Promise<AccessLogEntry[]> {
    return this.entries
      .filter((entry) => entry.fileId === fileId)
      .sort((a, b) => a.accessedAt - b.accessedAt)
      .map((entry) => ({ ...entry }));
  }

  async pruneBefore(cutoff: number): Promise<number> {
    const before = this.entries.length;
    this.entries = this.entries.filter((entry) => entry.accessedAt >= cutoff);
    return before - this.entries.length;
  }
}
