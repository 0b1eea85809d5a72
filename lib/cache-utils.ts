/**
 * Response Cache Utilities
 *
 * Strategy:
 * - Only successful GET responses for /all and /search are cached
 * - Cache key: endpoint path + sorted query string, so every page and filter
 *   combination has its own entry
 * - Fixed TTL from CACHE_DEFAULT_TIMEOUT; the whole cache is dropped on reload
 */

export interface CachedResponse {
  body: string;
  contentType: string;
  cachedAt: number;
}

interface CacheEntry {
  value: CachedResponse;
  expiresAt: number;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Generate a cache key from a request path and its query parameters
 * Format: response:{path}?{sorted query}
 */
export function generateCacheKey(path: string, params: URLSearchParams): string {
  const sorted = [...params.entries()].sort(([a, av], [b, bv]) => compare(a, b) || compare(av, bv));
  const query = new URLSearchParams(sorted).toString();
  return `response:${path}${query ? `?${query}` : ''}`;
}

/**
 * In-memory TTL cache with a bound on the number of entries.
 * When full, the oldest insertion is evicted.
 */
export class ResponseCache {
  private entries = new Map<string, CacheEntry>();

  constructor(private readonly maxEntries: number) {}

  get(key: string, now: number = Date.now()): CachedResponse | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (now >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  set(key: string, value: CachedResponse, ttlSeconds: number): void {
    this.entries.delete(key);
    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, expiresAt: value.cachedAt + ttlSeconds * 1000 });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
