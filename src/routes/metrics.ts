// src/routes/metrics.ts
// Prometheus Metrics Endpoint
//
// GET /metrics returns all registered metrics in Prometheus text format.

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { registry } from "../observability/metrics";
import { getRequestLogger } from "../observability/requestLogger";

/* ---------- Route Registration ---------- */
export default async function metricsRoutes(app: FastifyInstance) {
  app.get("/metrics", async (req: FastifyRequest, reply: FastifyReply) => {
    try {
      const metrics = await registry.metrics();
      return reply.header("Content-Type", registry.contentType).send(metrics);
    } catch (err) {
      getRequestLogger(req).error({ err }, "Failed to collect metrics");
      return reply.code(500).send({ error: "metrics_unavailable", message: "Failed to collect metrics" });
    }
  });
}
