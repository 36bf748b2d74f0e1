// src/routes/health.ts

import type { FastifyInstance } from "fastify";

import type { UploadEngine } from "../services/engine.js";

export default async function healthRoute(
  app: FastifyInstance,
  opts: { engine: UploadEngine }
) {
  const { sessions } = opts.engine.deps;

  app.get("/health", async (req, reply) => {
    const start = Date.now();
    const timestamp = new Date().toISOString();

    let stateOk = false;
    let latencyMs: number | null = null;

    try {
      await sessions.ping();
      stateOk = true;
      latencyMs = Date.now() - start;
    } catch (err) {
      req.log.error({ err }, "State store health check failed");
    }

    return reply.status(stateOk ? 200 : 503).send({
      status: stateOk ? "UP" : "DOWN",
      service: "filedock-api-v1",
      ready: stateOk,
      timestamp,
      checks: {
        state: {
          ok: stateOk,
          latencyMs,
          timestamp,
        },
      },
    });
  });
}
