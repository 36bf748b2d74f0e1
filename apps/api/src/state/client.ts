import { Redis } from "@upstash/redis";

import { UpstreamError } from "../utils/apiError.js";

let redis: Redis | null = null;

export async function initRedis(config: { url: string; token: string }): Promise<Redis> {
  if (redis) return redis;

  const client = new Redis({
    url: config.url,
    token: config.token,
    // Hex digests and numeric ids must come back exactly as written.
    automaticDeserialization: false,
    retry: {
      retries: 3,
      backoff: (attempt) => Math.min(100 * 2 ** attempt, 1000),
    },
  });

  await client.ping();

  redis = client;
  return redis;
}

/**
 * Runs a Redis round trip, surfacing transport failures as a retryable
 * upstream error instead of a bare 500.
 */
export async function redisCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new UpstreamError(
      "METADATA_STORE_UNAVAILABLE",
      `State store operation failed: ${operation}`,
      { cause: err, details: { operation } }
    );
  }
}
