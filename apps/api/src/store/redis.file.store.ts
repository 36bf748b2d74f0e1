// src/store/redis.file.store.ts

import type { Redis } from "@upstash/redis";

import { redisCall } from "../state/client.js";
import { fileKeys } from "../state/keys.js";
import {
  byNewestFirst,
  matchesFilters,
  type CasResult,
  type FilePatch,
  type FileStore,
  type StatusExpectation,
} from "./file.store.js";
import {
  FILE_STATUSES,
  isFileStatus,
  type FileQueryFilters,
  type FileRecord,
  type FileStatus,
} from "../types/upload.js";
import { InternalError } from "../utils/apiError.js";

// KEYS[1] = record hash, KEYS[2..6] = status index sets in FILE_STATUSES order.
const STATUS_KEY_TABLE = `
local statusKeys = {
  PENDING = KEYS[2], UPLOADING = KEYS[3], COMPLETED = KEYS[4],
  FAILED = KEYS[5], EXPIRED = KEYS[6]
}
`;

const CAS_STATUS_SCRIPT = `${STATUS_KEY_TABLE}
local fields = redis.call("HMGET", KEYS[1], "status", "updatedAt")
local current = fields[1]
if not current then
  return 0
end
local match = false
for _, status in ipairs(cjson.decode(ARGV[1])) do
  if status == current then
    match = true
  end
end
if match and ARGV[2] ~= "" and fields[2] ~= ARGV[2] then
  match = false
end
if not match then
  return 0
end
for field, value in pairs(cjson.decode(ARGV[4])) do
  redis.call("HSET", KEYS[1], field, value)
end
redis.call("HSET", KEYS[1], "status", ARGV[3])
redis.call("SREM", statusKeys[current], ARGV[5])
redis.call("SADD", statusKeys[ARGV[3]], ARGV[5])
return 1
`;

// KEYS[7] = created-at sorted set.
const DELETE_SCRIPT = `${STATUS_KEY_TABLE}
local current = redis.call("HGET", KEYS[1], "status")
if not current then
  return 0
end
if ARGV[1] ~= "" and current ~= ARGV[1] then
  return 0
end
redis.call("DEL", KEYS[1])
redis.call("SREM", statusKeys[current], ARGV[2])
redis.call("ZREM", KEYS[7], ARGV[2])
return 1
`;

const RELEASE_CANONICAL_SCRIPT = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
end
return 0
`;

type RecordHash = Record<string, string>;

function recordKeys(fileId: string): string[] {
  return [fileKeys.record(fileId), ...FILE_STATUSES.map((status) => fileKeys.byStatus(status))];
}

function nullable(value: string | undefined): string | null {
  return value === undefined || value === "" ? null : value;
}

function toHash(record: FileRecord): RecordHash {
  return {
    fileId: record.fileId,
    fileName: record.fileName,
    contentHash: record.contentHash ?? "",
    size: String(record.size),
    mimeType: record.mimeType,
    bucket: record.bucket,
    objectKey: record.objectKey,
    storageLocation: record.storageLocation ?? "",
    status: record.status,
    scope: record.scope,
    createdBy: record.createdBy,
    uploadId: record.uploadId ?? "",
    error: record.error ?? "",
    createdAt: String(record.createdAt),
    updatedAt: String(record.updatedAt),
    expiresAt: record.expiresAt === null ? "" : String(record.expiresAt),
  };
}

function patchToHash(patch: FilePatch): RecordHash {
  const out: RecordHash = { updatedAt: String(patch.updatedAt) };
  if (patch.storageLocation !== undefined) out.storageLocation = patch.storageLocation ?? "";
  if (patch.size !== undefined) out.size = String(patch.size);
  if (patch.error !== undefined) out.error = patch.error ?? "";
  if (patch.expiresAt !== undefined) {
    out.expiresAt = patch.expiresAt === null ? "" : String(patch.expiresAt);
  }
  return out;
}

function fromHash(data: RecordHash): FileRecord {
  const int = (field: string) => {
    const n = Number(data[field]);
    if (!Number.isInteger(n)) {
      throw new InternalError("CORRUPT_RECORD", `Corrupt file record field: ${field}`);
    }
    return n;
  };

  const status = data.status;
  if (!isFileStatus(status) || !data.fileId) {
    throw new InternalError("CORRUPT_RECORD", "Corrupt file record");
  }

  const expiresAt = nullable(data.expiresAt);

  return {
    fileId: data.fileId,
    fileName: data.fileName ?? "",
    contentHash: nullable(data.contentHash),
    size: int("size"),
    mimeType: data.mimeType ?? "application/octet-stream",
    bucket: data.bucket ?? "",
    objectKey: data.objectKey ?? "",
    storageLocation: nullable(data.storageLocation),
    status,
    scope: data.scope ?? "",
    createdBy: data.createdBy ?? "",
    uploadId: nullable(data.uploadId),
    error: nullable(data.error),
    createdAt: int("createdAt"),
    updatedAt: int("updatedAt"),
    expiresAt: expiresAt === null ? null : int("expiresAt"),
  };
}

export class RedisFileStore implements FileStore {
  constructor(private readonly redis: Redis) {}

  private async loadMany(ids: string[]): Promise<FileRecord[]> {
    if (ids.length === 0) return [];

    const pipeline = this.redis.pipeline();
    for (const id of ids) {
      pipeline.hgetall(fileKeys.record(id));
    }

    const rows = await redisCall("file.loadMany", () =>
      pipeline.exec<Array<RecordHash | null>>()
    );

    return rows
      .filter((row): row is RecordHash => row !== null && Object.keys(row).length > 0)
      .map(fromHash);
  }

  async insert(record: FileRecord): Promise<void> {
    const tx = await redisCall("file.insert", () =>
      this.redis
        .multi()
        .hset(fileKeys.record(record.fileId), toHash(record))
        .sadd(fileKeys.byStatus(record.status), record.fileId)
        .zadd(fileKeys.byCreatedAt(), { score: record.createdAt, member: record.fileId })
        .exec()
    );

    if (!tx) {
      throw new InternalError("INTERNAL_ERROR", "File record transaction failed");
    }
  }

  async get(fileId: string): Promise<FileRecord | null> {
    const data = await redisCall("file.get", () =>
      this.redis.hgetall<RecordHash>(fileKeys.record(fileId))
    );
    if (!data || Object.keys(data).length === 0) return null;
    return fromHash(data);
  }

  async compareAndSetStatus(
    fileId: string,
    expect: StatusExpectation,
    next: FileStatus,
    patch: FilePatch
  ): Promise<CasResult> {
    const applied = await redisCall("file.compareAndSetStatus", () =>
      this.redis.eval<string[], number>(CAS_STATUS_SCRIPT, recordKeys(fileId), [
        JSON.stringify(expect.statuses),
        expect.updatedAt === undefined ? "" : String(expect.updatedAt),
        next,
        JSON.stringify(patchToHash(patch)),
        fileId,
      ])
    );

    const current = await this.get(fileId);
    if (Number(applied) === 1 && current) {
      return { ok: true, record: current };
    }
    return { ok: false, current };
  }

  async delete(fileId: string, ifStatus?: FileStatus): Promise<boolean> {
    const removed = await redisCall("file.delete", () =>
      this.redis.eval<string[], number>(
        DELETE_SCRIPT,
        [...recordKeys(fileId), fileKeys.byCreatedAt()],
        [ifStatus ?? "", fileId]
      )
    );
    return Number(removed) === 1;
  }

  async listByStatus(status: FileStatus): Promise<FileRecord[]> {
    const ids = await redisCall("file.listByStatus", () =>
      this.redis.smembers(fileKeys.byStatus(status))
    );
    return this.loadMany(ids.map(String));
  }

  async query(
    filters: FileQueryFilters,
    page: { page: number; size: number }
  ): Promise<{ items: FileRecord[]; total: number }> {
    const ids = await redisCall("file.query", () =>
      this.redis.zrange<string[]>(fileKeys.byCreatedAt(), 0, -1, { rev: true })
    );

    const matches = (await this.loadMany(ids.map(String)))
      .filter((record) => matchesFilters(record, filters))
      .sort(byNewestFirst);

    const start = (page.page - 1) * page.size;
    return {
      items: matches.slice(start, start + page.size),
      total: matches.length,
    };
  }

  async findCanonical(scope: string, contentHash: string): Promise<string | null> {
    const fileId = await redisCall("file.findCanonical", () =>
      this.redis.get<string>(fileKeys.canonical(scope, contentHash))
    );
    return fileId ? String(fileId) : null;
  }

  async claimCanonical(scope: string, contentHash: string, fileId: string): Promise<string> {
    const key = fileKeys.canonical(scope, contentHash);

    for (let attempt = 0; attempt < 3; attempt++) {
      const set = await redisCall("file.claimCanonical", () =>
        this.redis.set(key, fileId, { nx: true })
      );
      if (set !== null) return fileId;

      const holder = await this.findCanonical(scope, contentHash);
      // Released between SET NX and GET: try again.
      if (holder !== null) return holder;
    }

    throw new InternalError("INTERNAL_ERROR", "Canonical pointer kept changing while claiming");
  }

  async releaseCanonical(scope: string, contentHash: string, fileId: string): Promise<boolean> {
    const removed = await redisCall("file.releaseCanonical", () =>
      this.redis.eval<[string], number>(
        RELEASE_CANONICAL_SCRIPT,
        [fileKeys.canonical(scope, contentHash)],
        [fileId]
      )
    );
    return Number(removed) === 1;
  }
}
