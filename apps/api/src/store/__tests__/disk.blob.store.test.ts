import fs from "fs";
import fsp from "fs/promises";
import os from "os";
import path from "path";
import { Readable } from "stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { BLOB_BASE_URL, TEST_BUCKET, TEST_SECRET } from "../../__tests__/helpers/testHarness.js";
import { BlobUrlSigner } from "../blob.token.js";
import { DiskBlobStore } from "../disk.blob.store.js";

async function readAll(stream: Readable): Promise<string> {
  const parts: Buffer[] = [];
  for await (const part of stream) parts.push(Buffer.from(part));
  return Buffer.concat(parts).toString();
}

describe("DiskBlobStore", () => {
  let rootDir: string;
  let store: DiskBlobStore;

  beforeEach(async () => {
    rootDir = await fsp.mkdtemp(path.join(os.tmpdir(), "blob-store-"));
    store = new DiskBlobStore(TEST_BUCKET, rootDir, new BlobUrlSigner(TEST_SECRET, BLOB_BASE_URL));
  });

  afterEach(async () => {
    await fsp.rm(rootDir, { recursive: true, force: true });
  });

  it("writes buffers and streams", async () => {
    const fromBuffer = await store.put("chunks/u1/1", Buffer.from("hello"));
    const fromStream = await store.put("chunks/u1/2", Readable.from([Buffer.from("wor"), Buffer.from("ld")]));

    expect(fromBuffer).toMatchObject({ key: "chunks/u1/1", size: 5 });
    expect(fromStream).toMatchObject({ key: "chunks/u1/2", size: 5 });
    expect(await readAll(await store.read("chunks/u1/2"))).toBe("world");
    expect(await fsp.readdir(path.join(rootDir, ".incoming"))).toEqual([]);
  });

  it("replaces an existing object", async () => {
    await store.put("files/a.txt", Buffer.from("first"));
    await store.put("files/a.txt", Buffer.from("second!"));

    expect((await store.stat("files/a.txt"))?.size).toBe(7);
    expect(await readAll(await store.read("files/a.txt"))).toBe("second!");
  });

  it("composes sources in order", async () => {
    await store.put("chunks/u1/1", Buffer.from("ab"));
    await store.put("chunks/u1/2", Buffer.from("cd"));
    await store.put("chunks/u1/3", Buffer.from("e"));

    const composed = await store.compose(
      ["chunks/u1/1", "chunks/u1/2", "chunks/u1/3"],
      "files/team-a/2026-01-15/f1/out.bin"
    );

    expect(composed.size).toBe(5);
    expect(await readAll(await store.read("files/team-a/2026-01-15/f1/out.bin"))).toBe("abcde");
  });

  it("fails compose on a missing source without leaving a partial object", async () => {
    await store.put("chunks/u1/1", Buffer.from("ab"));

    await expect(store.compose(["chunks/u1/1", "chunks/u1/2"], "files/out.bin")).rejects.toMatchObject({
      code: "ENOENT",
    });
    expect(await store.exists("files/out.bin")).toBe(false);
    expect(await fsp.readdir(path.join(rootDir, ".incoming"))).toEqual([]);
  });

  it("lists by key prefix", async () => {
    await store.put("chunks/u1/1", Buffer.from("a"));
    await store.put("chunks/u1/2", Buffer.from("b"));
    await store.put("chunks/u2/1", Buffer.from("c"));
    await store.put("files/x.bin", Buffer.from("d"));

    expect((await store.list("chunks/u1/")).map((o) => o.key)).toEqual(["chunks/u1/1", "chunks/u1/2"]);
    expect((await store.list("chunks/")).map((o) => o.key)).toEqual([
      "chunks/u1/1",
      "chunks/u1/2",
      "chunks/u2/1",
    ]);
    expect(await store.list("missing/")).toEqual([]);
  });

  it("prunes directories left empty by a delete", async () => {
    await store.put("chunks/u1/1", Buffer.from("a"));
    await store.put("chunks/u1/2", Buffer.from("b"));

    await store.delete("chunks/u1/1");
    expect(fs.existsSync(path.join(rootDir, "chunks", "u1"))).toBe(true);

    await store.delete("chunks/u1/2");
    expect(fs.existsSync(path.join(rootDir, "chunks"))).toBe(false);
    expect(fs.existsSync(rootDir)).toBe(true);

    await expect(store.delete("chunks/u1/2")).resolves.toBeUndefined();
  });

  it("reports missing objects", async () => {
    expect(await store.stat("nothing/here")).toBeNull();
    expect(await store.exists("nothing/here")).toBe(false);
    await expect(store.read("nothing/here")).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("refuses keys that leave the bucket", async () => {
    for (const key of ["../escape", "a//b", "/abs", "a\\b", ".incoming/x", "a/./b"]) {
      await expect(store.put(key, Buffer.from("x"))).rejects.toMatchObject({
        code: "INVALID_REQUEST",
        statusCode: 400,
      });
    }
    await expect(store.list("../")).rejects.toMatchObject({ code: "INVALID_REQUEST" });
  });

  it("signs through the shared signer", async () => {
    const signed = await store.issueWriteAuthorization("chunks/u1/1", 60_000);

    expect(signed.method).toBe("PUT");
    expect(signed.url.startsWith(`${BLOB_BASE_URL}/v1/blobs/`)).toBe(true);
    await expect(store.issueReadAuthorization("../x", 60_000)).rejects.toMatchObject({
      code: "INVALID_REQUEST",
    });
  });
});
