// src/middleware/rateLimit.ts
// Rate limiting for the scan endpoints

import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance, FastifyRequest } from 'fastify';

/**
 * Rate limit configurations per endpoint type.
 * Limits are per-caller per hour.
 */
export const SCAN_RATE_LIMITS = {
  // Uploads run extraction and possibly many delegate calls
  scanDocument: { max: 60, timeWindow: '1 hour' },

  // Pasted text is cheaper to extract
  scanText: { max: 120, timeWindow: '1 hour' },
} as const;

/**
 * Extract caller identifier from request for rate limiting.
 * Priority: x-user-id > IP address
 */
export function getCallerKey(request: FastifyRequest): string {
  const userId = request.headers['x-user-id'];
  if (userId && typeof userId === 'string') {
    return `user:${userId}`;
  }
  return `ip:${request.ip}`;
}

/**
 * Register the rate limit plugin with Fastify.
 * Call this early in server initialization, before route registration.
 */
export async function registerRateLimit(fastify: FastifyInstance): Promise<void> {
  await fastify.register(rateLimit, {
    // Not global; scan routes opt in through getRateLimitConfig
    global: false,

    max: 100,
    timeWindow: '1 hour',

    keyGenerator: getCallerKey,

    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: 'rate_limited',
      message: `Rate limit exceeded. Try again in ${Math.ceil(context.ttl / 1000)} seconds.`,
      retryAfter: Math.ceil(context.ttl / 1000),
    }),

    addHeadersOnExceeding: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
    },
    addHeaders: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
      'retry-after': true,
    },
  });
}

/**
 * Route options enabling the limit for one endpoint type.
 */
export function getRateLimitConfig(routeType: keyof typeof SCAN_RATE_LIMITS) {
  return {
    config: {
      rateLimit: SCAN_RATE_LIMITS[routeType],
    },
  };
}
