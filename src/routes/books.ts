import { createRoute } from '@hono/zod-openapi';
import { createOpenAPIApp } from '../openapi.js';
import { BookPageSchema, PageQuerySchema } from '../schemas/books.js';
import { ErrorResponseSchema } from '../schemas/response.js';
import { resolvePageParams } from '../services/pagination.js';
import { DEFAULT_PAGE } from '../lib/constants.js';
import { rateLimiter } from '../../middleware/rate-limiter.js';
import { responseCache } from '../../middleware/response-cache.js';

// =================================================================================
// List Route Definition
// =================================================================================

const listRoute = createRoute({
  method: 'get',
  path: '/all',
  tags: ['Books'],
  summary: 'Get all books with pagination',
  description: 'Returns the whole collection in file order, one page at a time. A page past the end returns an empty `data` array.',
  request: {
    query: PageQuerySchema,
  },
  responses: {
    200: {
      description: 'One page of books',
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

app.use('/all', rateLimiter('standard'), responseCache());

app.openapi(listRoute, (c) => {
  const { config } = c.get('context');
  const params = resolvePageParams(c.req.valid('query'), {
    page: DEFAULT_PAGE,
    limit: config.pagination.defaultLimit,
  });

  const page = c.get('books').listAll(params);

  return c.json(page, 200, {
    'Cache-Control': `public, max-age=${config.cache.ttlSeconds}`,
  });
});

export default app;
