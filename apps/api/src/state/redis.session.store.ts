// src/state/redis.session.store.ts

import type { Redis } from "@upstash/redis";

import { redisCall } from "./client.js";
import { uploadKeys } from "./keys.js";
import {
  META_KEY_GRACE_MS,
  SESSION_KEY_GRACE_MS,
  type SessionStore,
} from "./session.store.js";
import type { ChunkRecord, UploadMeta, UploadSession } from "../types/upload.js";
import { InternalError } from "../utils/apiError.js";
import { isRecord } from "../utils/guards.js";

// Chunk bookkeeping only lands while the session key exists, and inherits its TTL.
const ADD_CHUNK_SCRIPT = `
if redis.call("EXISTS", KEYS[1]) == 0 then
  return 0
end
redis.call("SADD", KEYS[2], ARGV[1])
local ttl = redis.call("PTTL", KEYS[1])
if ttl > 0 then
  redis.call("PEXPIRE", KEYS[2], ttl)
end
return 1
`;

const RECORD_CHUNK_SCRIPT = `
if redis.call("EXISTS", KEYS[1]) == 0 then
  return 0
end
redis.call("HSET", KEYS[2], ARGV[1], ARGV[2])
local ttl = redis.call("PTTL", KEYS[1])
if ttl > 0 then
  redis.call("PEXPIRE", KEYS[2], ttl)
end
return 1
`;

function requireInt(data: Record<string, string>, field: string): number {
  const n = Number(data[field]);
  if (!Number.isInteger(n)) {
    throw new InternalError("CORRUPT_RECORD", `Corrupt upload session field: ${field}`);
  }
  return n;
}

function requireString(data: Record<string, string>, field: string): string {
  const value = data[field];
  if (typeof value !== "string" || value === "") {
    throw new InternalError("CORRUPT_RECORD", `Corrupt upload session field: ${field}`);
  }
  return value;
}

function parseChunkRecord(raw: string): ChunkRecord | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) return null;
    const { uploadId, chunkNumber, size, contentTag, uploadedAt } = parsed;
    if (
      typeof uploadId !== "string" ||
      typeof chunkNumber !== "number" ||
      typeof size !== "number" ||
      typeof contentTag !== "string" ||
      typeof uploadedAt !== "number"
    ) {
      return null;
    }
    return { uploadId, chunkNumber, size, contentTag, uploadedAt };
  } catch {
    return null;
  }
}

export class RedisSessionStore implements SessionStore {
  constructor(private readonly redis: Redis) {}

  async create(session: UploadSession): Promise<void> {
    const { uploadId } = session;

    const tx = this.redis
      .multi()
      .hset(uploadKeys.session(uploadId), {
        uploadId,
        fileId: session.fileId,
        fileName: session.fileName,
        mimeType: session.mimeType,
        totalSize: String(session.totalSize),
        chunkSize: String(session.chunkSize),
        totalChunks: String(session.totalChunks),
        scope: session.scope,
        createdBy: session.createdBy,
        contentHash: session.contentHash ?? "",
        allowDeduplication: session.allowDeduplication ? "1" : "0",
        createdAt: String(session.createdAt),
        expiresAt: String(session.expiresAt),
      })
      .pexpireat(uploadKeys.session(uploadId), session.expiresAt + SESSION_KEY_GRACE_MS)

      .hset(uploadKeys.meta(uploadId), {
        uploadId,
        fileId: session.fileId,
        createdAt: String(session.createdAt),
        expiresAt: String(session.expiresAt),
      })
      .pexpireat(uploadKeys.meta(uploadId), session.expiresAt + META_KEY_GRACE_MS)

      .sadd(uploadKeys.gcIndex(), uploadId);

    const results = await redisCall("session.create", () => tx.exec());
    if (!results) {
      throw new InternalError("INTERNAL_ERROR", "Session transaction failed");
    }
  }

  async get(uploadId: string): Promise<UploadSession | null> {
    const [data, members] = await redisCall("session.get", () =>
      Promise.all([
        this.redis.hgetall<Record<string, string>>(uploadKeys.session(uploadId)),
        this.redis.smembers(uploadKeys.chunks(uploadId)),
      ])
    );

    if (!data || Object.keys(data).length === 0) {
      return null;
    }

    return {
      uploadId,
      fileId: requireString(data, "fileId"),
      fileName: requireString(data, "fileName"),
      mimeType: requireString(data, "mimeType"),
      totalSize: requireInt(data, "totalSize"),
      chunkSize: requireInt(data, "chunkSize"),
      totalChunks: requireInt(data, "totalChunks"),
      uploadedChunks: members.map(Number).sort((a, b) => a - b),
      scope: requireString(data, "scope"),
      createdBy: requireString(data, "createdBy"),
      contentHash: data.contentHash ? String(data.contentHash) : null,
      allowDeduplication: String(data.allowDeduplication) === "1",
      createdAt: requireInt(data, "createdAt"),
      expiresAt: requireInt(data, "expiresAt"),
    };
  }

  async getMeta(uploadId: string): Promise<UploadMeta | null> {
    const data = await redisCall("session.getMeta", () =>
      this.redis.hgetall<Record<string, string>>(uploadKeys.meta(uploadId))
    );
    if (!data || Object.keys(data).length === 0) return null;

    return {
      uploadId,
      fileId: requireString(data, "fileId"),
      createdAt: requireInt(data, "createdAt"),
      expiresAt: requireInt(data, "expiresAt"),
    };
  }

  async addChunk(uploadId: string, chunkNumber: number): Promise<boolean> {
    const added = await redisCall("session.addChunk", () =>
      this.redis.eval<[string], number>(
        ADD_CHUNK_SCRIPT,
        [uploadKeys.session(uploadId), uploadKeys.chunks(uploadId)],
        [String(chunkNumber)]
      )
    );
    return Number(added) === 1;
  }

  async hasChunk(uploadId: string, chunkNumber: number): Promise<boolean> {
    const member = await redisCall("session.hasChunk", () =>
      this.redis.sismember(uploadKeys.chunks(uploadId), String(chunkNumber))
    );
    return member === 1;
  }

  async countChunks(uploadId: string): Promise<number> {
    return redisCall("session.countChunks", () =>
      this.redis.scard(uploadKeys.chunks(uploadId))
    );
  }

  async listChunks(uploadId: string): Promise<number[]> {
    const members = await redisCall("session.listChunks", () =>
      this.redis.smembers(uploadKeys.chunks(uploadId))
    );
    return members.map(Number).sort((a, b) => a - b);
  }

  async recordChunk(record: ChunkRecord): Promise<void> {
    await redisCall("session.recordChunk", () =>
      this.redis.eval<[string, string], number>(
        RECORD_CHUNK_SCRIPT,
        [uploadKeys.session(record.uploadId), uploadKeys.chunkRecords(record.uploadId)],
        [String(record.chunkNumber), JSON.stringify(record)]
      )
    );
  }

  async listChunkRecords(uploadId: string): Promise<ChunkRecord[]> {
    const data = await redisCall("session.listChunkRecords", () =>
      this.redis.hgetall<Record<string, string>>(uploadKeys.chunkRecords(uploadId))
    );
    if (!data) return [];

    return Object.values(data)
      .map((raw) => parseChunkRecord(String(raw)))
      .filter((record): record is ChunkRecord => record !== null)
      .sort((a, b) => a.chunkNumber - b.chunkNumber);
  }

  async delete(uploadId: string): Promise<void> {
    await redisCall("session.delete", () =>
      this.redis
        .multi()
        .del(uploadKeys.session(uploadId))
        .del(uploadKeys.chunks(uploadId))
        .del(uploadKeys.chunkRecords(uploadId))
        .srem(uploadKeys.gcIndex(), uploadId)
        .exec()
    );
  }

  async listActive(): Promise<string[]> {
    const ids = await redisCall("session.listActive", () =>
      this.redis.smembers(uploadKeys.gcIndex())
    );
    return ids.map(String);
  }

  async countActive(): Promise<number> {
    return redisCall("session.countActive", () => this.redis.scard(uploadKeys.gcIndex()));
  }

  async ping(): Promise<void> {
    await redisCall("ping", () => this.redis.ping());
  }
}
