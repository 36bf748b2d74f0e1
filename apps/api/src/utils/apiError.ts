// src/utils/apiError.ts

import type { FastifyReply } from "fastify";

/**
 * Canonical API error codes.
 * MUST stay in sync with routes and services.
 */
export type ApiErrorCode =
  | "INVALID_REQUEST"
  | "INVALID_REQUEST_BODY"
  | "INVALID_UPLOAD_ID"
  | "INVALID_FILE_ID"
  | "INVALID_FILENAME"
  | "INVALID_SCOPE"
  | "INVALID_USER"
  | "INVALID_MIME_TYPE"
  | "INVALID_FILE_SIZE"
  | "INVALID_CHUNK_SIZE"
  | "INVALID_CONTENT_HASH"
  | "INVALID_CHUNK"
  | "INVALID_TTL"
  | "INVALID_QUERY"
  | "INVALID_TOKEN"
  | "HASH_MISMATCH"
  | "FILE_TOO_LARGE"
  | "TOO_MANY_CHUNKS"
  | "USE_SINGLE_UPLOAD"
  | "UPLOAD_NOT_FOUND"
  | "FILE_NOT_FOUND"
  | "BLOB_NOT_FOUND"
  | "UPLOAD_EXPIRED"
  | "FILE_EXPIRED"
  | "TOKEN_EXPIRED"
  | "UPLOAD_INCOMPLETE"
  | "UPLOAD_ALREADY_COMPLETED"
  | "UPLOAD_FINALIZATION_IN_PROGRESS"
  | "UPLOAD_NOT_ACCEPTING_CHUNKS"
  | "UPLOAD_CAPACITY_REACHED"
  | "CHUNK_NOT_STORED"
  | "FILE_NOT_READY"
  | "BLOB_STORE_UNAVAILABLE"
  | "METADATA_STORE_UNAVAILABLE"
  | "CORRUPT_RECORD"
  | "INTERNAL_ERROR";

export interface ApiErrorResponse {
  error: {
    code: ApiErrorCode;
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
  };
}

export type UploadErrorKind =
  | "validation"
  | "not_found"
  | "conflict"
  | "expired"
  | "upstream"
  | "internal";

interface UploadErrorOptions {
  statusCode?: number;
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class UploadError extends Error {
  readonly kind: UploadErrorKind;
  readonly code: ApiErrorCode;
  readonly statusCode: number;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    kind: UploadErrorKind,
    code: ApiErrorCode,
    message: string,
    defaults: { statusCode: number; retryable: boolean },
    options: UploadErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
    this.statusCode = options.statusCode ?? defaults.statusCode;
    this.retryable = options.retryable ?? defaults.retryable;
    this.details = options.details;
  }
}

export class ValidationError extends UploadError {
  constructor(code: ApiErrorCode, message: string, options?: UploadErrorOptions) {
    super("validation", code, message, { statusCode: 400, retryable: false }, options);
  }
}

export class NotFoundError extends UploadError {
  constructor(code: ApiErrorCode, message: string, options?: UploadErrorOptions) {
    super("not_found", code, message, { statusCode: 404, retryable: false }, options);
  }
}

export class ConflictError extends UploadError {
  constructor(code: ApiErrorCode, message: string, options?: UploadErrorOptions) {
    super("conflict", code, message, { statusCode: 409, retryable: false }, options);
  }
}

export class ExpiredError extends UploadError {
  constructor(code: ApiErrorCode, message: string, options?: UploadErrorOptions) {
    super("expired", code, message, { statusCode: 410, retryable: false }, options);
  }
}

export class UpstreamError extends UploadError {
  constructor(code: ApiErrorCode, message: string, options?: UploadErrorOptions) {
    super("upstream", code, message, { statusCode: 502, retryable: true }, options);
  }
}

export class InternalError extends UploadError {
  constructor(code: ApiErrorCode, message: string, options?: UploadErrorOptions) {
    super("internal", code, message, { statusCode: 500, retryable: false }, options);
  }
}

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: ApiErrorCode,
  message: string,
  options?: {
    retryable?: boolean;
    details?: Record<string, unknown>;
  }
) {
  const safeStatus =
    Number.isInteger(statusCode) &&
    statusCode >= 400 &&
    statusCode <= 599
      ? statusCode
      : 500;

  const response: ApiErrorResponse = {
    error: {
      code,
      message,
      retryable: options?.retryable ?? false,
      ...(options?.details && { details: options.details }),
    },
  };

  return reply.code(safeStatus).send(response);
}

export function sendUploadError(reply: FastifyReply, err: UploadError) {
  return sendApiError(reply, err.statusCode, err.code, err.message, {
    retryable: err.retryable,
    details: err.details,
  });
}
