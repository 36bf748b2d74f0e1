// src/store/blob.token.ts

import crypto from "crypto";

import type { SignedUrl } from "./blob.store.js";
import { ExpiredError, ValidationError } from "../utils/apiError.js";
import { isRecord } from "../utils/guards.js";

export interface BlobTokenPayload {
  key: string;
  method: "GET" | "PUT";
  expiresAt: number;
  fileName?: string;
}

/**
 * HMAC-signed URLs for backends without a native signing scheme. The API
 * serves them itself under `/v1/blobs/:token`.
 */
export class BlobUrlSigner {
  private readonly baseUrl: string;

  constructor(
    private readonly secret: string,
    baseUrl: string,
    private readonly now: () => number = Date.now
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  private mac(body: string): string {
    return crypto.createHmac("sha256", this.secret).update(body).digest("base64url");
  }

  sign(key: string, method: "GET" | "PUT", ttlMs: number, fileName?: string): SignedUrl {
    const expiresAt = this.now() + ttlMs;
    const payload: BlobTokenPayload = {
      key,
      method,
      expiresAt,
      ...(fileName !== undefined && { fileName }),
    };
    const body = Buffer.from(JSON.stringify(payload)).toString("base64url");
    return {
      url: `${this.baseUrl}/v1/blobs/${body}.${this.mac(body)}`,
      method,
      expiresAt,
    };
  }

  verify(token: string, method: "GET" | "PUT"): BlobTokenPayload {
    const [body, signature, ...rest] = token.split(".");
    if (!body || !signature || rest.length > 0) {
      throw new ValidationError("INVALID_TOKEN", "Malformed blob token");
    }

    const expected = Buffer.from(this.mac(body));
    const actual = Buffer.from(signature);
    if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
      throw new ValidationError("INVALID_TOKEN", "Blob token signature mismatch", {
        statusCode: 403,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(Buffer.from(body, "base64url").toString("utf8"));
    } catch (err) {
      throw new ValidationError("INVALID_TOKEN", "Malformed blob token", { cause: err });
    }

    if (!isRecord(parsed)) {
      throw new ValidationError("INVALID_TOKEN", "Malformed blob token");
    }

    const { key, expiresAt, fileName } = parsed;
    if (
      typeof key !== "string" ||
      typeof expiresAt !== "number" ||
      (fileName !== undefined && typeof fileName !== "string")
    ) {
      throw new ValidationError("INVALID_TOKEN", "Malformed blob token");
    }

    if (parsed.method !== method) {
      throw new ValidationError("INVALID_TOKEN", `Token does not authorize ${method}`, {
        statusCode: 403,
      });
    }

    if (this.now() > expiresAt) {
      throw new ExpiredError("TOKEN_EXPIRED", "Blob token has expired");
    }

    return {
      key,
      method,
      expiresAt,
      ...(typeof fileName === "string" && { fileName }),
    };
  }
}
