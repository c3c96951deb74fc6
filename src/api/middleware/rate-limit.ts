/**
 * Rate Limiting Middleware
 *
 * Fixed-window request counting per client, kept in memory. Each limiter
 * created by rateLimiter() has its own store, so the general limit and the
 * stricter content-generation limit are counted separately.
 *
 * Rate limit information is sent on every response:
 * - X-RateLimit-Limit: Maximum requests allowed in window
 * - X-RateLimit-Remaining: Requests remaining in current window
 * - X-RateLimit-Reset: Unix timestamp (seconds) when the window resets
 *
 * When limited, responds 429 with:
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "RATE_LIMITED",
 *     "message": "Too many requests. Please try again later.",
 *     "details": { "retryAfter": 45 }
 *   }
 * }
 * ```
 *
 * Single-process only; several instances each count on their own.
 */

import type { MiddlewareHandler, Context } from 'hono';

export interface RateLimitConfig {
  /** Time window in milliseconds */
  windowMs: number;
  /** Maximum number of requests allowed in the window */
  maxRequests: number;
  /** Client key, defaults to the forwarded IP */
  keyGenerator?: (c: Context) => string;
  message?: string;
  skip?: (c: Context) => boolean;
  /** Clock, injectable for tests */
  now?: () => number;
}

interface RateLimitEntry {
  count: number;
  windowStart: number;
}

export const RATE_LIMITS = {
  GENERAL: {
    windowMs: 60_000,
    maxRequests: 100,
  },
  /** Endpoints that call the content generator */
  LLM: {
    windowMs: 60_000,
    maxRequests: 10,
  },
} as const;

function defaultKeyGenerator(c: Context): string {
  const forwardedFor = c.req.header('x-forwarded-for');
  if (forwardedFor) {
    // x-forwarded-for can contain multiple IPs; the first is the client
    return forwardedFor.split(',')[0].trim();
  }

  const realIp = c.req.header('x-real-ip');
  if (realIp) {
    return realIp;
  }

  return 'unknown-client';
}

/**
 * Creates a rate limiting middleware.
 *
 * @example
 * ```typescript
 * app.use('/api/*', rateLimiter({ windowMs: 60_000, maxRequests: 100 }));
 *
 * // By learner instead of IP
 * app.use('/api/flashcards/generate', rateLimiter({
 *   ...RATE_LIMITS.LLM,
 *   keyGenerator: (c) => c.req.header('X-Learner-Id') ?? 'anonymous',
 * }));
 * ```
 */
export function rateLimiter(config: RateLimitConfig): MiddlewareHandler {
  const {
    windowMs,
    maxRequests,
    keyGenerator = defaultKeyGenerator,
    message = 'Too many requests. Please try again later.',
    skip,
    now: clock = Date.now,
  } = config;

  const store = new Map<string, RateLimitEntry>();
  let lastCleanup = clock();

  // Expired windows are dropped at most once per window
  function cleanupExpiredEntries(now: number): void {
    if (now - lastCleanup < windowMs) {
      return;
    }
    lastCleanup = now;
    for (const [key, entry] of Array.from(store.entries())) {
      if (now - entry.windowStart >= windowMs) {
        store.delete(key);
      }
    }
  }

  return async (c, next) => {
    if (skip?.(c)) {
      return next();
    }

    const now = clock();
    cleanupExpiredEntries(now);

    const clientKey = keyGenerator(c);
    let entry = store.get(clientKey);
    if (!entry || now - entry.windowStart >= windowMs) {
      entry = { count: 0, windowStart: now };
      store.set(clientKey, entry);
    }

    const remaining = Math.max(0, maxRequests - entry.count - 1);
    const resetTime = Math.ceil((entry.windowStart + windowMs) / 1000);

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(remaining));
    c.header('X-RateLimit-Reset', String(resetTime));

    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.windowStart + windowMs - now) / 1000);
      c.header('Retry-After', String(retryAfter));

      return c.json(
        {
          success: false,
          error: {
            code: 'RATE_LIMITED',
            message,
            details: { retryAfter },
          },
        },
        429
      );
    }

    entry.count++;
    return next();
  };
}
