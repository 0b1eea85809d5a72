/**
 * Service Constants
 *
 * Defaults shared by configuration parsing, request validation and the
 * OpenAPI document. Runtime overrides come from the environment (see config.ts).
 *
 * @module lib/constants
 */

// =================================================================================
// Data Source
// =================================================================================

/**
 * NDJSON file read at startup, relative to the working directory
 */
export const DEFAULT_DATA_FILE = 'data/found_books_filtered.ndjson' as const;

// =================================================================================
// Pagination
// =================================================================================

/**
 * Page used when `page` is missing or not a positive integer
 */
export const DEFAULT_PAGE = 1 as const;

/**
 * Page size used when `limit` is missing or not a positive integer
 */
export const DEFAULT_PAGE_LIMIT = 100 as const;

// =================================================================================
// Response Cache
// =================================================================================

/**
 * Seconds a cached listing or search response stays fresh
 */
export const DEFAULT_CACHE_TTL_SECONDS = 300 as const;

/**
 * Upper bound on cached responses held in memory.
 * Oldest entries are evicted first once the bound is reached.
 */
export const RESPONSE_CACHE_MAX_ENTRIES = 1000 as const;

// =================================================================================
// Rate Limiting
// =================================================================================

/**
 * Requests per window for listing endpoints, per client
 */
export const DEFAULT_RATE_LIMIT = 100 as const;

/**
 * Requests per window for the search endpoint, per client
 */
export const DEFAULT_SEARCH_RATE_LIMIT = 200 as const;

/**
 * Rate limit window (one day)
 */
export const DEFAULT_RATE_LIMIT_WINDOW_SECONDS = 86400 as const;
