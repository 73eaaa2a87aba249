import { type FastifyRequest, type FastifyReply } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@contactbook/shared';

const logger = createLogger({ name: 'api:rate-limit' });

interface RateLimitBucket {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
}

export interface RateLimitSettings {
  /** `/users/register` and `/users/login`, each with its own buckets. */
  auth: RateLimitOptions;
  me: RateLimitOptions;
  passwordReset: RateLimitOptions;
}

export const DEFAULT_RATE_LIMITS: RateLimitSettings = {
  auth: { windowMs: 60_000, maxRequests: 5 },
  me: { windowMs: 60_000, maxRequests: 5 },
  passwordReset: { windowMs: 60 * 60_000, maxRequests: 3 },
};

/**
 * Fixed-window limiter keyed by client IP. Buckets live in this process, so
 * each API instance counts separately.
 */
export function createRateLimiter(opts: RateLimitOptions & { name: string }) {
  const buckets = new Map<string, RateLimitBucket>();

  setInterval(() => {
    const now = Date.now();
    for (const [key, bucket] of buckets) {
      if (bucket.resetAt <= now) {
        buckets.delete(key);
      }
    }
  }, opts.windowMs).unref();

  return async function rateLimit(request: FastifyRequest, reply: FastifyReply) {
    const key = request.ip || 'unknown';
    const now = Date.now();

    let bucket = buckets.get(key);
    if (!bucket || bucket.resetAt <= now) {
      bucket = { count: 0, resetAt: now + opts.windowMs };
      buckets.set(key, bucket);
    }

    bucket.count++;
    if (bucket.count > opts.maxRequests) {
      logger.warn({ requestId: request.id, limiter: opts.name }, 'Rate limit exceeded');
      reply.header('Retry-After', String(Math.ceil((bucket.resetAt - now) / 1000)));
      throw new AppError(ErrorCode.RATE_LIMITED, 'Rate limit exceeded. Please try again later.');
    }
  };
}

export type RateLimiter = ReturnType<typeof createRateLimiter>;
