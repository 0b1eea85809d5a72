import { OpenAPIHono } from '@hono/zod-openapi';
import type { OpenAPIV3_1 } from 'openapi-types';
import type { AppBindings } from './env.js';
import { APIError, ErrorCode } from './schemas/response.js';

// =================================================================================
// OpenAPI Configuration
// =================================================================================

/**
 * OpenAPI document configuration
 * Used by the doc endpoint; the version is filled in from AppConfig
 */
export const openAPIConfig = (version: string) => ({
  openapi: '3.1.0' as const,
  info: {
    title: 'Wikipedia Book API',
    version,
    description: `API for accessing and searching book records extracted from Wikipedia.

## Features
- **Listing**: Every book in source order, paginated with \`page\` and \`limit\`
- **Search**: Case-insensitive substring match on any of nine fields, combined with AND

## Pagination
Missing, non-integer or non-positive \`page\`/\`limit\` values fall back to the defaults.
When \`page\` or \`limit\` is repeated, the first value is used.
A page past the end returns an empty \`data\` array with the correct \`total\`.

## Rate Limits
Per client IP and per endpoint; see the \`X-RateLimit-*\` response headers.
Forwarded headers identify the client only when the server runs with \`TRUST_PROXY=true\`.
`,
  },
  tags: [
    { name: 'System', description: 'Health checks and API documentation' },
    { name: 'Books', description: 'Book listing and search' },
  ],
});

/**
 * Creates an OpenAPI-enabled Hono app (root app and every route module)
 * NOTE: registerOpenAPIDoc() must be called AFTER routes are mounted
 *
 * Request validation failures are rethrown as APIError so the global
 * error handler renders them in the standard error envelope.
 */
export const createOpenAPIApp = () => {
  return new OpenAPIHono<AppBindings>({
    defaultHook: (result) => {
      if (!result.success) {
        throw new APIError(ErrorCode.VALIDATION_ERROR, 'Invalid request parameters', {
          issues: result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        });
      }
    },
  });
};

/**
 * Merge the OpenAPI documents of every sub-router
 *
 * Sub-routers don't share an OpenAPI registry, so each one is asked for
 * its own document and the paths and component schemas are combined.
 */
export const buildOpenAPIDocument = (
  subRouters: OpenAPIHono<AppBindings>[],
  version: string,
  onRouterError?: (index: number, error: unknown) => void
): OpenAPIV3_1.Document => {
  const config = openAPIConfig(version);
  const paths: OpenAPIV3_1.PathsObject = {};
  const schemas: Record<string, OpenAPIV3_1.SchemaObject> = {};

  subRouters.forEach((router, i) => {
    try {
      const subDoc = router.getOpenAPI31Document(config);
      Object.assign(paths, subDoc.paths);
      Object.assign(schemas, subDoc.components?.schemas);
    } catch (e) {
      onRouterError?.(i, e);
    }
  });

  return {
    ...config,
    paths,
    components: { schemas },
  };
};

/**
 * Registers the OpenAPI documentation endpoints
 * Call this AFTER all routes are mounted
 *
 * - GET /openapi.json (and /swagger.json for older clients)
 * - GET /docs - Swagger UI
 */
export const registerOpenAPIDoc = (
  app: OpenAPIHono<AppBindings>,
  subRouters: OpenAPIHono<AppBindings>[]
) => {
  app.get('/openapi.json', (c) => {
    const logger = c.get('logger');
    const doc = buildOpenAPIDocument(subRouters, c.get('context').config.version, (i, e) => {
      logger.warn('OpenAPI router failed', {
        router: i,
        error: e instanceof Error ? e.message : String(e),
      });
    });
    return c.json(doc);
  });

  app.get('/swagger.json', (c) => c.redirect('/openapi.json', 301));

  app.get('/docs', (c) => c.html(getDocsHTML('/openapi.json'), 200, {
    'cache-control': 'public, max-age=3600',
  }));
};

/**
 * Swagger UI page. Assets come from the swagger-ui-dist CDN build.
 */
export function getDocsHTML(specUrl: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Wikipedia Book API</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5/swagger-ui.css" />
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@5/swagger-ui-bundle.js" crossorigin></script>
  <script>
    window.onload = () => {
      window.ui = SwaggerUIBundle({ url: '${specUrl}', dom_id: '#swagger-ui' });
    };
  </script>
</body>
</html>`;
}
