import { createRoute } from '@hono/zod-openapi';
import { createOpenAPIApp } from '../openapi.js';
import { HealthResponseSchema } from '../schemas/health.js';

// =================================================================================
// Health Route Definition
// =================================================================================

const healthRoute = createRoute({
  method: 'get',
  path: '/health',
  tags: ['System'],
  summary: 'Liveness check',
  description: 'Returns service status, version and the size of the loaded collection.',
  responses: {
    200: {
      description: 'Service is up',
      content: {
        'application/json': {
          schema: HealthResponseSchema,
        },
      },
    },
  },
});

// =================================================================================
// Route Handler
// =================================================================================

const app = createOpenAPIApp();

app.openapi(healthRoute, (c) => {
  const { config, store } = c.get('context');

  return c.json({
    status: 'healthy' as const,
    version: config.version,
    books_loaded: store.size,
    loaded_at: store.loadedAt.toISOString(),
  }, 200);
});

export default app;
