/**
 * Process Context
 *
 * Everything a request needs that outlives the request: configuration, the
 * loaded book store, and the in-process stores behind rate limiting and
 * response caching. Built once at startup and handed to createApp().
 *
 * @module context
 */

import type { AppConfig } from './config.js';
import type { Logger } from '../lib/logger.js';
import { BookStore } from './services/book-store.js';
import { MemoryRateLimitStore, type RateLimitStore } from '../middleware/rate-limiter.js';
import { ResponseCache } from '../lib/cache-utils.js';
import { RESPONSE_CACHE_MAX_ENTRIES } from './lib/constants.js';

export interface AppContextOptions {
  config: AppConfig;
  logger: Logger;
  store?: BookStore;
  rateLimitStore?: RateLimitStore;
  responseCache?: ResponseCache;
}

export class AppContext {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly rateLimitStore: RateLimitStore;
  readonly responseCache: ResponseCache;
  private current: BookStore;

  constructor(options: AppContextOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.current = options.store ?? BookStore.empty();
    this.rateLimitStore = options.rateLimitStore ?? new MemoryRateLimitStore();
    this.responseCache = options.responseCache ?? new ResponseCache(RESPONSE_CACHE_MAX_ENTRIES);
  }

  /**
   * The store serving requests right now
   */
  get store(): BookStore {
    return this.current;
  }

  /**
   * Swap in a freshly loaded store. Cached responses from the old store
   * are dropped.
   */
  replaceStore(store: BookStore): void {
    this.current = store;
    this.responseCache.clear();
  }
}
