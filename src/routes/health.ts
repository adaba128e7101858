// src/routes/health.ts
// Health check endpoint
//
// - GET /health - service status plus the loaded scan context
//
// The context is built before the server listens, so a running process
// always has a dictionary; the delegate may legitimately be absent.

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { ScanContext } from "../compliance/engine";

export interface HealthStatus {
  status: "ok";
  uptimeSeconds: number;
  terms: number;
  contextSensitiveTerms: number;
  delegate: "available" | "unavailable";
}

/* ---------- Route Registration ---------- */
export function createHealthRoutes(ctx: ScanContext) {
  return async function healthRoutes(app: FastifyInstance) {
    /**
     * GET /health
     */
    app.get("/health", async (_req: FastifyRequest, reply: FastifyReply) => {
      const health: HealthStatus = {
        status: "ok",
        uptimeSeconds: Math.floor(process.uptime()),
        terms: ctx.dictionary.size,
        contextSensitiveTerms: ctx.policy.size,
        delegate: ctx.delegateAvailable ? "available" : "unavailable",
      };
      return reply.code(200).send(health);
    });
  };
}
