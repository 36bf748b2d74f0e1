// src/state/keys.ts

import type { FileStatus } from "../types/upload.js";

const PREFIX = "filedock:v1";

const key = (suffix: string) => `${PREFIX}:${suffix}`;

export const uploadKeys = {
  session: (uploadId: string) => key(`upload:${uploadId}:session`),

  chunks: (uploadId: string) => key(`upload:${uploadId}:chunks`),

  chunkRecords: (uploadId: string) => key(`upload:${uploadId}:chunk-records`),

  meta: (uploadId: string) => key(`upload:${uploadId}:meta`),

  // Every upload that still has a session or chunk objects; the sweeper walks this.
  gcIndex: () => key("upload:gc:active"),
};

export const fileKeys = {
  record: (fileId: string) => key(`file:${fileId}`),

  byStatus: (status: FileStatus) => key(`file:status:${status}`),

  byCreatedAt: () => key("file:created"),

  canonical: (scope: string, contentHash: string) =>
    key(`file:canonical:${scope}:${contentHash}`),
};

export const accessLogKeys = {
  all: () => key("access:all"),

  byFile: (fileId: string) => key(`access:file:${fileId}`),
};
