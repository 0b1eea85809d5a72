import { createRoute } from '@hono/zod-openapi';
import { createOpenAPIApp } from '../openapi.js';
import { BookPageSchema, SearchQuerySchema } from '../schemas/books.js';
import { ErrorResponseSchema } from '../schemas/response.js';
import { extractFilters } from '../services/book-search.js';
import { resolvePageParams } from '../services/pagination.js';
import { DEFAULT_PAGE } from '../lib/constants.js';
import { rateLimiter } from '../../middleware/rate-limiter.js';
import { responseCache } from '../../middleware/response-cache.js';

// =================================================================================
// Search Route Definition
// =================================================================================

const searchRoute = createRoute({
  method: 'get',
  path: '/search',
  tags: ['Books'],
  summary: 'Search books by various fields',
  description: `Case-insensitive substring search. Every supplied field must match (AND).
Unknown parameters are ignored; with no filters the whole collection is returned, exactly as \`/all\` would.`,
  request: {
    query: SearchQuerySchema,
  },
  responses: {
    200: {
      description: 'One page of matching books',
      content: {
        'application/json': {
          schema: BookPageSchema,
        },
      },
    },
    429: {
      description: 'Rate limit exceeded',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

// =================================================================================
// Route Handler
// =================================================================================

const app = createOpenAPIApp();

app.use('/search', rateLimiter('search'), responseCache());

app.openapi(searchRoute, (c) => {
  const { config } = c.get('context');
  const { page: rawPage, limit: rawLimit, ...fields } = c.req.valid('query');

  const filters = extractFilters(fields);
  const params = resolvePageParams({ page: rawPage, limit: rawLimit }, {
    page: DEFAULT_PAGE,
    limit: config.pagination.defaultLimit,
  });

  c.get('logger').debug('Search request received', { filters, ...params });

  const page = c.get('books').search(filters, params);

  return c.json(page, 200, {
    'Cache-Control': `public, max-age=${config.cache.ttlSeconds}`,
  });
});

export default app;
