import { type FastifyInstance, type FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import rateLimit from '@fastify/rate-limit';
import { AppError } from '../lib/errors.js';
import { ASSIGNMENT_RATE_LIMIT_PER_MINUTE } from '@ratedesk/shared/constants/rate-assignment.constants.js';

// ---------------------------------------------------------------------------
// Rate limit tiers:
//   Default:               100 req/min per IP (RATE_LIMIT_MAX)
//   Rate assignment POST:  30 req/min per IP
//   Health check:          no rate limiting
// ---------------------------------------------------------------------------

export interface RateLimitPluginOptions {
  /** Override default max for testing. */
  defaultMax?: number;
}

async function rateLimitPlugin(app: FastifyInstance, opts: RateLimitPluginOptions) {
  const defaultMax = opts.defaultMax ?? 100;

  await app.register(rateLimit, {
    max: defaultMax,
    timeWindow: '1 minute',
    keyGenerator: (request) => request.ip,
    errorResponseBuilder: (_request, context) =>
      new AppError(
        429,
        'RATE_LIMITED',
        `Rate limit exceeded. Retry after ${Math.ceil(context.ttl / 1000)} seconds.`,
      ),
  });
}

// ---------------------------------------------------------------------------
// Route-level rate limit config factories
// ---------------------------------------------------------------------------

/**
 * Rate assignment submissions.
 * Use as route-level config: { config: { rateLimit: assignmentRateLimit() } }
 */
export function assignmentRateLimit(max = ASSIGNMENT_RATE_LIMIT_PER_MINUTE) {
  return {
    max,
    timeWindow: '1 minute',
    keyGenerator: (request: FastifyRequest) => request.ip,
  };
}

/**
 * Use as route-level config: { config: { rateLimit: noRateLimit() } }
 */
export function noRateLimit() {
  return false as const;
}

export const rateLimitPluginFp = fp(rateLimitPlugin, {
  name: 'rate-limit-plugin',
});
