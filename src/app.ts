import { cors } from 'hono/cors';
import { secureHeaders } from 'hono/secure-headers';
import { randomUUID } from 'node:crypto';
import type { AppContext } from './context.js';
import { createOpenAPIApp, registerOpenAPIDoc } from './openapi.js';
import { errorHandler, notFoundHandler } from '../middleware/error-handler.js';
import { BookQueryService } from './services/book-query.js';

// Route imports
import healthRoutes from './routes/health.js';
import booksRoutes from './routes/books.js';
import searchRoutes from './routes/search.js';

/**
 * Build the HTTP application around a process context
 *
 * The context is the only state the app reads; tests build one in memory
 * and call `app.request()` directly.
 */
export function createApp(context: AppContext) {
  const app = createOpenAPIApp();
  const books = new BookQueryService(context, context.logger);

  // =================================================================================
  // Global Middleware
  // =================================================================================

  // CORS
  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'X-Request-ID'],
    exposeHeaders: ['X-Request-ID', 'X-Response-Time', 'X-Cache', 'X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'],
    maxAge: 86400,
  }));

  // Security headers
  app.use('*', secureHeaders({
    strictTransportSecurity: 'max-age=31536000; includeSubDomains',
    xFrameOptions: 'SAMEORIGIN',
    xXssProtection: '1; mode=block',
  }));

  // Error handlers
  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  // Context, request ID and logger
  app.use('*', async (c, next) => {
    const requestId = c.req.header('x-request-id') || randomUUID();
    c.set('context', context);
    c.set('books', books);
    c.set('requestId', requestId);
    c.set('logger', context.logger.forRequest(requestId));
    c.set('startTime', Date.now());
    c.header('X-Request-ID', requestId);
    await next();
  });

  // Response timing middleware
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    c.header('X-Response-Time', `${duration}ms`);
    c.get('logger').info(`${c.req.method} ${c.req.path}`, { status: c.res.status, durationMs: duration });
  });

  // =================================================================================
  // Routes
  // =================================================================================

  // Sub-routers whose routes are merged into the OpenAPI document
  const subRouters = [
    healthRoutes,
    booksRoutes,
    searchRoutes,
  ];

  for (const router of subRouters) {
    app.route('/', router);
  }

  // Register OpenAPI documentation endpoints AFTER all routes are mounted
  registerOpenAPIDoc(app, subRouters);

  return app;
}

/**
 * App type for Hono RPC client integration
 *
 * @example
 * ```typescript
 * import { hc } from 'hono/client'
 * import type { BookApiAppType } from './app.js'
 *
 * const client = hc<BookApiAppType>('http://localhost:8080')
 * const response = await client.search.$get({ query: { author: 'tolkien' } })
 * ```
 */
export type BookApiAppType = ReturnType<typeof createApp>;
