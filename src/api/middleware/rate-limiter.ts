/**
 * Ballot Service API -- Rate Limiting Middleware
 *
 * Fixed-window, in-process rate limiter keyed by client IP.  Each app
 * gets its own limiter set so separate apps never share counters.
 *
 * @module api/middleware/rate-limiter
 * @license AGPL-3.0-or-later
 */

import { Request, Response, NextFunction, RequestHandler } from "express";

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimiterConfig {
  /** Maximum number of requests in the window */
  maxRequests: number;
  /** Window size in milliseconds */
  windowMs: number;
  /** Time source (defaults to Date.now) */
  now?: () => number;
}

/**
 * Creates a rate limiter middleware.
 *
 * @example
 * ```typescript
 * // 5 vote attempts per minute
 * router.use(createRateLimiter({ maxRequests: 5, windowMs: 60_000 }));
 * ```
 */
export function createRateLimiter(config: RateLimiterConfig): RequestHandler {
  const store = new Map<string, RateLimitEntry>();
  const now = config.now ?? Date.now;

  const cleanupInterval = setInterval(() => {
    const t = now();
    for (const [key, entry] of store.entries()) {
      if (entry.resetAt <= t) {
        store.delete(key);
      }
    }
  }, 5 * 60 * 1000);
  cleanupInterval.unref();

  return (req: Request, res: Response, next: NextFunction): void => {
    const key = req.ip || req.socket.remoteAddress || "unknown";
    const t = now();

    let entry = store.get(key);
    if (!entry || entry.resetAt <= t) {
      entry = { count: 0, resetAt: t + config.windowMs };
      store.set(key, entry);
    }

    entry.count++;

    const remaining = Math.max(0, config.maxRequests - entry.count);
    res.setHeader("X-RateLimit-Limit", config.maxRequests);
    res.setHeader("X-RateLimit-Remaining", remaining);
    res.setHeader("X-RateLimit-Reset", Math.ceil(entry.resetAt / 1000));

    if (entry.count > config.maxRequests) {
      res.status(429).json({
        error: "RATE_LIMITED",
        message: "Too many requests. Please try again later.",
        details: {
          retry_after_ms: entry.resetAt - t,
        },
      });
      return;
    }

    next();
  };
}

export interface RateLimiters {
  /** Vote casting */
  vote: RequestHandler;
  /** Results, ballots, audit, stats */
  read: RequestHandler;
  /** Administrative routes */
  admin: RequestHandler;
}

/**
 * Default limiter set.
 */
export function createRateLimiters(): RateLimiters {
  return {
    vote: createRateLimiter({ maxRequests: 5, windowMs: 60 * 1000 }),
    read: createRateLimiter({ maxRequests: 100, windowMs: 60 * 1000 }),
    admin: createRateLimiter({ maxRequests: 30, windowMs: 60 * 1000 }),
  };
}
