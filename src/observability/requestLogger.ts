// src/observability/requestLogger.ts
// Request correlation and request/response logging for the HTTP surface.
//
// Request ids come from an upstream x-request-id header when present,
// otherwise nanoid. The id is echoed back on every response.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { IncomingMessage } from "node:http";
import { nanoid } from "nanoid";
import { createLogger, createChildLogger, type Logger } from "./logger";
import { recordHttpRequest } from "./metrics";

/* ---------- Request ID ---------- */

export const REQUEST_ID_HEADER = "x-request-id";
const REQUEST_ID_LENGTH = 21;

/**
 * Fastify `genReqId`: reuse an upstream id or mint one.
 * Receives the raw IncomingMessage, not the FastifyRequest.
 */
export function requestIdGenerator(req: IncomingMessage): string {
  const incoming = req.headers[REQUEST_ID_HEADER];
  if (typeof incoming === "string" && incoming.length > 0) {
    return incoming;
  }
  return nanoid(REQUEST_ID_LENGTH);
}

/* ---------- Request Logging ---------- */

const UNMATCHED_ROUTE = "unmatched";

const baseLogger = createLogger("http");

// Start times for duration calculation
const requestStartTimes = new WeakMap<FastifyRequest, number>();

function requestContext(req: FastifyRequest): Record<string, unknown> {
  const userId = req.headers["x-user-id"];
  return {
    requestId: req.id,
    method: req.method,
    url: req.url,
    userId: typeof userId === "string" ? userId : undefined,
  };
}

/**
 * Request-scoped child of the http logger.
 */
export function getRequestLogger(req: FastifyRequest): Logger {
  return createChildLogger(baseLogger, requestContext(req));
}

/**
 * Register id echo, timing, completion logging and error logging hooks.
 */
export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
    getRequestLogger(req).debug("request started");
  });

  app.addHook("onSend", async (req: FastifyRequest, reply: FastifyReply) => {
    reply.header(REQUEST_ID_HEADER, req.id);
  });

  app.addHook("onResponse", async (req: FastifyRequest, reply: FastifyReply) => {
    const startTime = requestStartTimes.get(req);
    const durationMs = startTime ? Date.now() - startTime : 0;
    requestStartTimes.delete(req);

    // Unmatched urls share one label so arbitrary paths cannot mint series
    const route = req.routeOptions.url ?? UNMATCHED_ROUTE;
    recordHttpRequest(req.method, route, reply.statusCode, durationMs / 1000);

    const log = createChildLogger(baseLogger, {
      ...requestContext(req),
      statusCode: reply.statusCode,
      duration: durationMs,
    });

    if (reply.statusCode >= 500) {
      log.error("request failed");
    } else if (reply.statusCode >= 400) {
      log.warn("request error");
    } else {
      log.info("request completed");
    }
  });

  app.addHook("onError", async (req: FastifyRequest, _reply, error) => {
    getRequestLogger(req).error(
      { err: { message: error.message, name: error.name, stack: error.stack } },
      "request error"
    );
  });
}
