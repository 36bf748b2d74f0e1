// src/config/env.ts

export type Env = Record<string, string | undefined>;

export function parsePositiveIntEnv(
  env: Env,
  name: string,
  fallback: number,
  min = 1
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`${name} must be an integer >= ${min}`);
  }
  return n;
}

export function parseBooleanEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  if (raw === "1" || raw === "true") return true;
  if (raw === "0" || raw === "false") return false;
  throw new Error(`${name} must be one of true, false, 1, 0`);
}

export function parseEnumEnv<T extends string>(
  env: Env,
  name: string,
  allowed: readonly T[],
  fallback: T
): T {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const match = allowed.find((value) => value === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${allowed.join(", ")}`);
  }
  return match;
}

export function assertHttpUrl(name: string, url: string) {
  if (!/^https?:\/\//.test(url)) {
    throw new Error(`${name} must start with http:// or https://`);
  }
}

export function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required env: ${name}`);
  }
  return value;
}
