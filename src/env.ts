import type { Http2Bindings, HttpBindings } from '@hono/node-server';
import type { AppContext } from './context.js';
import type { BookQueryService } from './services/book-query.js';

// Logger interface for type safety
export interface Logger {
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
  query(operation: string, durationMs: number, metadata?: Record<string, unknown>): void;
}

// Node server bindings; absent when the app is driven through app.request()
export type Bindings = Partial<HttpBindings> | Partial<Http2Bindings>;

// Extend Hono Context with custom variables
export type Variables = {
  context: AppContext;
  books: BookQueryService;
  startTime: number;
  requestId: string; // Unique request ID for log tracing (x-request-id or UUID)
  logger: Logger;
};

// App type for OpenAPIHono
export type AppBindings = {
  Bindings: Bindings;
  Variables: Variables;
};
