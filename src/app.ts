/* src/app.ts
   Fastify app factory. Everything stateful comes in through the ScanContext,
   so tests build an app around a stub context and drive it with inject().
*/
import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';

import { config } from './config';
import { ScanError } from './compliance/errors';
import type { ScanContext } from './compliance/engine';
import { registerRateLimit } from './middleware/rateLimit';
import { getRequestLogger, registerRequestLogger, requestIdGenerator } from './observability';
import { createHealthRoutes } from './routes/health';
import metricsRoutes from './routes/metrics';
import { createScanRoutes } from './routes/scan';
import { createTermRoutes } from './routes/terms';

export interface BuildServerOptions {
  maxUploadBytes?: number;
  corsOrigins?: readonly string[];
}

function errorCode(err: FastifyError, status: number): string {
  if (status === 429) return 'rate_limited';
  if (status === 413) return 'payload_too_large';
  if (status >= 500) return 'internal_error';
  return err.code ? err.code.toLowerCase() : 'bad_request';
}

export async function buildServer(
  ctx: ScanContext,
  opts: BuildServerOptions = {}
): Promise<FastifyInstance> {
  // Request logging goes through our pino hooks, not Fastify's built-in logger
  const app = Fastify({
    logger: false,
    genReqId: requestIdGenerator,
  });

  registerRequestLogger(app);

  await app.register(cors, { origin: [...(opts.corsOrigins ?? config.cors.origins)] });
  await app.register(multipart, {
    limits: { fileSize: opts.maxUploadBytes ?? config.server.maxUploadBytes, files: 1 },
  });
  await registerRateLimit(app);

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof ScanError) {
      return reply.code(err.statusCode).send(err.toJSON());
    }

    const status = err.statusCode && err.statusCode >= 400 ? err.statusCode : 500;
    if (status >= 500) {
      getRequestLogger(req).error({ err }, 'unhandled error');
    }
    return reply.code(status).send({
      error: errorCode(err, status),
      message: status >= 500 ? 'Internal server error' : err.message,
    });
  });

  app.register(createHealthRoutes(ctx));
  app.register(metricsRoutes);
  app.register(createTermRoutes(ctx));
  app.register(createScanRoutes(ctx));

  return app;
}
