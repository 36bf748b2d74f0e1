import { describe, expect, it } from "vitest";

import { BASE_TIME, makeRecord } from "../../../__tests__/helpers/testHarness.js";
import {
  chunkKeys,
  computeTotalChunks,
  expectedChunkSize,
  isLiveClaim,
  normalizeContentHash,
  normalizeMimeType,
  objectKeyFor,
  requireChunkNumber,
  validateFileName,
  validateScope,
} from "../upload.session.js";

describe("chunk math", () => {
  it("rounds the chunk count up", () => {
    expect(computeTotalChunks(20, 8)).toBe(3);
    expect(computeTotalChunks(16, 8)).toBe(2);
    expect(computeTotalChunks(17, 8)).toBe(3);
  });

  it("gives every chunk chunkSize bytes except the last", () => {
    const session = { totalSize: 20, chunkSize: 8, totalChunks: 3 };
    expect(expectedChunkSize(session, 1)).toBe(8);
    expect(expectedChunkSize(session, 2)).toBe(8);
    expect(expectedChunkSize(session, 3)).toBe(4);
  });

  it("keeps a full last chunk when the size divides evenly", () => {
    expect(expectedChunkSize({ totalSize: 16, chunkSize: 8, totalChunks: 2 }, 2)).toBe(8);
  });

  it("numbers chunk keys from 1", () => {
    expect(chunkKeys("u-1", 3)).toEqual(["chunks/u-1/1", "chunks/u-1/2", "chunks/u-1/3"]);
  });

  it("bounds chunk numbers by totalChunks", () => {
    expect(requireChunkNumber(3, 3)).toBe(3);
    expect(() => requireChunkNumber(0, 3)).toThrow("chunkNumber must be between 1 and 3");
    expect(() => requireChunkNumber(4, 3)).toThrow("chunkNumber must be between 1 and 3");
    expect(() => requireChunkNumber(1.5)).toThrow("chunkNumber must be a positive integer");
  });
});

describe("object keys", () => {
  it("groups committed files by scope and UTC day", () => {
    expect(
      objectKeyFor({ scope: "team-a", fileId: "f-1", fileName: "a.txt", createdAt: BASE_TIME })
    ).toBe("files/team-a/2026-01-15/f-1/a.txt");
  });
});

describe("input validation", () => {
  it("rejects file names that could escape their directory", () => {
    expect(validateFileName("report.pdf")).toBe("report.pdf");
    for (const bad of ["../etc", "a/b", "a\\b", ".", "..", "", "   ", "x".repeat(256)]) {
      expect(() => validateFileName(bad)).toThrow(
        expect.objectContaining({ code: "INVALID_FILENAME", statusCode: 400 })
      );
    }
  });

  it("accepts scope names of letters, digits and separators", () => {
    expect(validateScope("tenant:42.docs_v2-a")).toBe("tenant:42.docs_v2-a");
    expect(() => validateScope("-leading")).toThrow(expect.objectContaining({ code: "INVALID_SCOPE" }));
    expect(() => validateScope("has space")).toThrow(expect.objectContaining({ code: "INVALID_SCOPE" }));
  });

  it("lowercases content hashes and mime types", () => {
    expect(normalizeContentHash("AB".repeat(32))).toBe("ab".repeat(32));
    expect(() => normalizeContentHash("abc")).toThrow(
      expect.objectContaining({ code: "INVALID_CONTENT_HASH" })
    );
    expect(normalizeMimeType("Text/Plain")).toBe("text/plain");
    expect(normalizeMimeType(undefined)).toBe("application/octet-stream");
  });
});

describe("isLiveClaim", () => {
  it("holds only UPLOADING records inside the lease", () => {
    const uploading = makeRecord({ status: "UPLOADING", updatedAt: BASE_TIME });
    expect(isLiveClaim(uploading, BASE_TIME + 999, 1000)).toBe(true);
    expect(isLiveClaim(uploading, BASE_TIME + 1000, 1000)).toBe(false);
    expect(isLiveClaim(makeRecord({ status: "PENDING" }), BASE_TIME, 1000)).toBe(false);
  });
});
