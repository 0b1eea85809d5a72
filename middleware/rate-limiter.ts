/**
 * Application-Level Rate Limiter
 *
 * Per-client, per-endpoint request limits held in process memory.
 *
 * Features:
 * - Per-IP rate limiting
 * - Separate buckets per endpoint (key prefix), so /all traffic never
 *   consumes the /search allowance
 * - Sliding window algorithm
 * - Pluggable store behind the RateLimitStore interface
 * - Forwarded headers honoured only when TRUST_PROXY is set
 */

import type { Context, MiddlewareHandler } from 'hono';
import type { AppConfig } from '../src/config.js';
import type { AppBindings } from '../src/env.js';
import { buildMeta, ErrorCode, type ErrorResponse } from '../src/schemas/response.js';

export interface RateLimitConfig {
  /**
   * Maximum requests allowed in the time window
   */
  maxRequests: number;

  /**
   * Time window in seconds
   */
  windowSeconds: number;

  /**
   * Bucket name, combined with the client IP to form the store key
   */
  keyPrefix: string;
}

/**
 * Rate limit result
 */
export interface RateLimitResult {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetAt: number;
  retryAfter?: number;
}

/**
 * Storage for request timestamps (epoch seconds) per key.
 *
 * `hit` reads, checks and records in one synchronous call, so concurrent
 * requests for the same key cannot all pass on the same stale count.
 */
export interface RateLimitStore {
  hit(key: string, now: number, windowSeconds: number, maxRequests: number): RateLimitResult;
}

/** How often expired keys are swept, in seconds */
const SWEEP_INTERVAL_SECONDS = 60;

/**
 * Map-backed sliding-window store. Keys expire one window after their last
 * recorded request and are swept on write.
 */
export class MemoryRateLimitStore implements RateLimitStore {
  private store = new Map<string, { timestamps: number[]; expiresAt: number }>();
  private nextSweepAt = 0;

  hit(key: string, now: number, windowSeconds: number, maxRequests: number): RateLimitResult {
    this.sweep(now);

    const windowStart = now - windowSeconds;
    const item = this.store.get(key);

    // Filter requests within the sliding window
    const recentRequests = (item?.timestamps ?? []).filter((timestamp) => timestamp > windowStart);

    if (recentRequests.length >= maxRequests) {
      const oldestRequest = Math.min(...recentRequests);
      const resetAt = oldestRequest + windowSeconds;

      return {
        allowed: false,
        limit: maxRequests,
        remaining: 0,
        resetAt,
        retryAfter: Math.max(1, resetAt - now),
      };
    }

    recentRequests.push(now);
    this.store.set(key, { timestamps: recentRequests, expiresAt: now + windowSeconds });

    return {
      allowed: true,
      limit: maxRequests,
      remaining: maxRequests - recentRequests.length,
      resetAt: now + windowSeconds,
    };
  }

  /**
   * Number of tracked keys
   */
  get size(): number {
    return this.store.size;
  }

  private sweep(now: number): void {
    if (now < this.nextSweepAt) return;
    this.nextSweepAt = now + SWEEP_INTERVAL_SECONDS;

    for (const [key, item] of this.store) {
      if (item.expiresAt <= now) {
        this.store.delete(key);
      }
    }
  }
}

/**
 * Get client IP from request
 *
 * The socket address is used unless `trustProxy` is set, in which case the
 * first X-Forwarded-For hop (then X-Real-IP) wins.
 */
export function getClientIP(c: Context<AppBindings>, trustProxy: boolean): string {
  const socketAddress = c.env?.incoming?.socket.remoteAddress;
  if (!trustProxy) {
    return socketAddress || 'unknown';
  }

  return c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ||
         c.req.header('x-real-ip') ||
         socketAddress ||
         'unknown';
}

/**
 * Check rate limit for a client and record the request when allowed
 */
export function checkRateLimit(
  store: RateLimitStore,
  clientIP: string,
  config: RateLimitConfig
): RateLimitResult {
  const now = Math.floor(Date.now() / 1000);
  return store.hit(`${config.keyPrefix}:${clientIP}`, now, config.windowSeconds, config.maxRequests);
}

export type RateLimitPreset = 'standard' | 'search';

/**
 * Preset configurations for the two endpoint types
 */
export function rateLimitPresets(config: AppConfig): Record<RateLimitPreset, RateLimitConfig> {
  return {
    standard: {
      maxRequests: config.rateLimit.defaultLimit,
      windowSeconds: config.rateLimit.windowSeconds,
      keyPrefix: 'rl:std',
    },
    search: {
      maxRequests: config.rateLimit.searchLimit,
      windowSeconds: config.rateLimit.windowSeconds,
      keyPrefix: 'rl:search',
    },
  };
}

/**
 * Rate limiting middleware factory
 *
 * Limits and the store come from the process context, so the same middleware
 * instance follows whatever configuration the app was built with.
 */
export function rateLimiter(preset: RateLimitPreset): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    const context = c.get('context');
    const config = rateLimitPresets(context.config)[preset];

    const clientIP = getClientIP(c, context.config.server.trustProxy);
    const result = checkRateLimit(context.rateLimitStore, clientIP, config);

    c.header('X-RateLimit-Limit', result.limit.toString());
    c.header('X-RateLimit-Remaining', result.remaining.toString());
    c.header('X-RateLimit-Reset', result.resetAt.toString());

    if (!result.allowed) {
      const retryAfter = result.retryAfter ?? config.windowSeconds;
      c.header('Retry-After', retryAfter.toString());
      c.get('logger').warn('Rate limit exceeded', { preset, limit: result.limit });

      const body: ErrorResponse = {
        success: false,
        error: {
          code: ErrorCode.RATE_LIMIT_EXCEEDED,
          message: `Rate limit exceeded. Maximum ${result.limit} requests per ${config.windowSeconds}s.`,
          details: {
            limit: result.limit,
            reset_at: result.resetAt,
            retry_after: retryAfter,
          },
        },
        meta: buildMeta(c),
      };
      return c.json(body, 429);
    }

    await next();
  };
}
