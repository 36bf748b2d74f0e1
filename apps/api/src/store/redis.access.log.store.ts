// src/store/redis.access.log.store.ts

import crypto from "crypto";
import type { Redis } from "@upstash/redis";

import { redisCall } from "../state/client.js";
import { accessLogKeys } from "../state/keys.js";
import type { AccessLogStore } from "./access.log.store.js";
import { isRecord } from "../utils/guards.js";
import type { AccessLogEntry, AccessType } from "../types/upload.js";

const ACCESS_TYPES = new Set<string>(["UPLOAD", "DOWNLOAD", "DELETE", "VIEW"]);

function isAccessType(value: unknown): value is AccessType {
  return typeof value === "string" && ACCESS_TYPES.has(value);
}

function parseEntry(raw: unknown): AccessLogEntry | null {
  try {
    const parsed: unknown = typeof raw === "string" ? JSON.parse(raw) : raw;
    if (!isRecord(parsed)) return null;
    const { id, fileId, accessType, userId, accessedAt } = parsed;
    if (
      typeof id !== "string" ||
      typeof fileId !== "string" ||
      !isAccessType(accessType) ||
      typeof userId !== "string" ||
      typeof accessedAt !== "number"
    ) {
      return null;
    }
    return { id, fileId, accessType, userId, accessedAt };
  } catch {
    return null;
  }
}

/**
 * Entries are JSON members of a global sorted set scored by `accessedAt`,
 * mirrored into a per-file set for lookups.
 */
export class RedisAccessLogStore implements AccessLogStore {
  constructor(private readonly redis: Redis) {}

  async append(entry: Omit<AccessLogEntry, "id">): Promise<AccessLogEntry> {
    const stored: AccessLogEntry = { id: crypto.randomUUID(), ...entry };
    const member = JSON.stringify(stored);

    await redisCall("accessLog.append", () =>
      this.redis
        .multi()
        .zadd(accessLogKeys.all(), { score: stored.accessedAt, member })
        .zadd(accessLogKeys.byFile(stored.fileId), { score: stored.accessedAt, member })
        .exec()
    );

    return stored;
  }

  async listForFile(fileId: string): Promise<AccessLogEntry[]> {
    const members = await redisCall("accessLog.listForFile", () =>
      this.redis.zrange<string[]>(accessLogKeys.byFile(fileId), 0, -1)
    );
    return members
      .map(parseEntry)
      .filter((entry): entry is AccessLogEntry => entry !== null);
  }

  async pruneBefore(cutoff: number): Promise<number> {
    const expired = await redisCall("accessLog.pruneBefore", () =>
      this.redis.zrange<string[]>(accessLogKeys.all(), 0, cutoff - 1, { byScore: true })
    );
    if (expired.length === 0) return 0;

    const fileIds = new Set(
      expired
        .map(parseEntry)
        .filter((entry): entry is AccessLogEntry => entry !== null)
        .map((entry) => entry.fileId)
    );

    const tx = this.redis.multi();
    tx.zremrangebyscore(accessLogKeys.all(), 0, cutoff - 1);
    for (const fileId of fileIds) {
      tx.zremrangebyscore(accessLogKeys.byFile(fileId), 0, cutoff - 1);
    }
    await redisCall("accessLog.pruneBefore", () => tx.exec());

    return expired.length;
  }
}
