// src/store/disk.blob.store.ts

import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import crypto from "crypto";
import { pipeline } from "stream/promises";
import { Readable } from "stream";

import type { BlobStat, BlobStore, SignedUrl } from "./blob.store.js";
import type { BlobUrlSigner } from "./blob.token.js";
import { ValidationError } from "../utils/apiError.js";

const INCOMING_DIR = ".incoming";

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function isSafeKey(key: string): boolean {
  if (!key || key.length > 1024 || key.startsWith("/") || key.includes("\\")) return false;
  const segments = key.split("/");
  if (segments[0] === INCOMING_DIR) return false;
  return segments.every((s) => s !== "" && s !== "." && s !== ".." && !s.includes("\0"));
}

async function* concatFiles(paths: string[]): AsyncGenerator<Buffer> {
  for (const filePath of paths) {
    for await (const buf of fs.createReadStream(filePath)) {
      yield buf;
    }
  }
}

function statOf(key: string, st: fs.Stats): BlobStat {
  const updatedAt = Math.floor(st.mtimeMs);
  return {
    key,
    size: st.size,
    etag: `${st.size.toString(16)}-${updatedAt.toString(16)}`,
    updatedAt,
  };
}

/**
 * Bucket laid out as a directory tree under `rootDir`. Writes land in a
 * private incoming directory first and are renamed into place, so readers
 * never see a partial object.
 */
export class DiskBlobStore implements BlobStore {
  constructor(
    readonly bucket: string,
    private readonly rootDir: string,
    private readonly signer: BlobUrlSigner
  ) {}

  private pathFor(key: string): string {
    if (!isSafeKey(key)) {
      throw new ValidationError("INVALID_REQUEST", `Invalid object key: ${key}`);
    }
    return path.join(this.rootDir, ...key.split("/"));
  }

  private tempPath(): string {
    return path.join(this.rootDir, INCOMING_DIR, `${crypto.randomUUID()}.tmp`);
  }

  private async commit(tempPath: string, finalPath: string) {
    for (let attempt = 0; attempt < 2; attempt++) {
      await fsp.mkdir(path.dirname(finalPath), { recursive: true });
      try {
        await fsp.rename(tempPath, finalPath);
        return;
      } catch (err) {
        // A concurrent delete may have pruned the parent directory.
        if (errorCode(err) !== "ENOENT" || attempt === 1) throw err;
      }
    }
  }

  private async pruneEmptyDirs(fromDir: string) {
    let dir = fromDir;
    while (dir.startsWith(this.rootDir) && dir !== this.rootDir) {
      try {
        await fsp.rmdir(dir);
      } catch (err) {
        const code = errorCode(err);
        if (code === "ENOTEMPTY" || code === "EEXIST" || code === "ENOENT") return;
        throw err;
      }
      dir = path.dirname(dir);
    }
  }

  async issueWriteAuthorization(key: string, ttlMs: number): Promise<SignedUrl> {
    this.pathFor(key);
    return this.signer.sign(key, "PUT", ttlMs);
  }

  async issueReadAuthorization(key: string, ttlMs: number, fileName?: string): Promise<SignedUrl> {
    this.pathFor(key);
    return this.signer.sign(key, "GET", ttlMs, fileName);
  }

  async put(key: string, body: Buffer | Readable): Promise<BlobStat> {
    const finalPath = this.pathFor(key);
    const tempPath = this.tempPath();
    await fsp.mkdir(path.dirname(tempPath), { recursive: true });

    try {
      const source = Buffer.isBuffer(body) ? Readable.from([body]) : body;
      await pipeline(source, fs.createWriteStream(tempPath, { flags: "wx" }));
      await this.commit(tempPath, finalPath);
    } catch (err) {
      await fsp.rm(tempPath, { force: true });
      throw err;
    }

    return statOf(key, await fsp.stat(finalPath));
  }

  async compose(keys: string[], destination: string): Promise<BlobStat> {
    const sources = keys.map((key) => this.pathFor(key));
    const finalPath = this.pathFor(destination);
    const tempPath = this.tempPath();
    await fsp.mkdir(path.dirname(tempPath), { recursive: true });

    try {
      await pipeline(concatFiles(sources), fs.createWriteStream(tempPath, { flags: "wx" }));
      await this.commit(tempPath, finalPath);
    } catch (err) {
      await fsp.rm(tempPath, { force: true });
      throw err;
    }

    return statOf(destination, await fsp.stat(finalPath));
  }

  async delete(key: string): Promise<void> {
    const filePath = this.pathFor(key);
    await fsp.rm(filePath, { force: true });
    await this.pruneEmptyDirs(path.dirname(filePath));
  }

  async exists(key: string): Promise<boolean> {
    return (await this.stat(key)) !== null;
  }

  async stat(key: string): Promise<BlobStat | null> {
    try {
      const st = await fsp.stat(this.pathFor(key));
      return st.isFile() ? statOf(key, st) : null;
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw err;
    }
  }

  async list(prefix: string): Promise<BlobStat[]> {
    const slash = prefix.lastIndexOf("/");
    const baseKey = slash === -1 ? "" : prefix.slice(0, slash);
    if (baseKey && !isSafeKey(baseKey)) {
      throw new ValidationError("INVALID_REQUEST", `Invalid object prefix: ${prefix}`);
    }

    const out: BlobStat[] = [];
    const walk = async (dir: string, keyPrefix: string) => {
      let entries: fs.Dirent[];
      try {
        entries = await fsp.readdir(dir, { withFileTypes: true });
      } catch (err) {
        if (errorCode(err) === "ENOENT") return;
        throw err;
      }

      for (const entry of entries) {
        const key = keyPrefix ? `${keyPrefix}/${entry.name}` : entry.name;
        if (!keyPrefix && entry.name === INCOMING_DIR) continue;

        if (entry.isDirectory()) {
          await walk(path.join(dir, entry.name), key);
        } else if (entry.isFile() && key.startsWith(prefix)) {
          out.push(statOf(key, await fsp.stat(path.join(dir, entry.name))));
        }
      }
    };

    await walk(baseKey ? path.join(this.rootDir, ...baseKey.split("/")) : this.rootDir, baseKey);
    return out.sort((a, b) => a.key.localeCompare(b.key));
  }

  async read(key: string): Promise<Readable> {
    const filePath = this.pathFor(key);
    // Surfaces ENOENT before any bytes are promised to a caller.
    await fsp.access(filePath);
    return fs.createReadStream(filePath);
  }
}
