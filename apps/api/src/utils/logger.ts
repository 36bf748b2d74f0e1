// src/utils/logger.ts

import { pino } from "pino";
import type { FastifyBaseLogger } from "fastify";

import type { Env } from "../config/env.js";

/**
 * The slice of Fastify's pino logger the engine writes through, so services
 * can take `app.log` at runtime and a standalone pino instance elsewhere.
 */
export type Log = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export const silentLogger: Log = pino({ level: "silent" });

export interface LoggerSettings {
  level: string;
  redact: { paths: string[]; remove: boolean };
}

export function loggerSettings(env: Env = process.env): LoggerSettings {
  return {
    level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    redact: {
      paths: ["req.headers.authorization"],
      remove: true,
    },
  };
}
