/**
 * Response caching middleware
 *
 * Serves repeated listing/search requests from the process-wide ResponseCache.
 * Adds `X-Cache: HIT` or `X-Cache: MISS`. Disabled when ENABLE_QUERY_CACHE=false.
 */

import type { MiddlewareHandler } from 'hono';
import type { AppBindings } from '../src/env.js';
import { generateCacheKey } from '../lib/cache-utils.js';

export function responseCache(): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    const context = c.get('context');
    if (!context.config.cache.enabled || c.req.method !== 'GET') {
      await next();
      return;
    }

    const url = new URL(c.req.url);
    const key = generateCacheKey(url.pathname, url.searchParams);
    const cache = context.responseCache;

    const cached = cache.get(key);
    if (cached) {
      c.get('logger').debug('Cache hit', { key });
      c.header('X-Cache', 'HIT');
      c.header('Content-Type', cached.contentType);
      c.header('Cache-Control', `public, max-age=${context.config.cache.ttlSeconds}`);
      return c.body(cached.body, 200);
    }

    await next();

    if (c.res.status === 200) {
      cache.set(key, {
        body: await c.res.clone().text(),
        contentType: c.res.headers.get('Content-Type') ?? 'application/json',
        cachedAt: Date.now(),
      }, context.config.cache.ttlSeconds);
    }
    c.header('X-Cache', 'MISS');
  };
}
