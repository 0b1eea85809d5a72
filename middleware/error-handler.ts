import type { ErrorHandler, NotFoundHandler } from 'hono';
import type { AppBindings } from '../src/env.js';
import {
  ErrorCode,
  type ErrorCodeType,
  ERROR_STATUS_MAP,
  APIError,
  buildMeta,
  createErrorResponse,
  type ErrorResponse,
} from '../src/schemas/response.js';

// =================================================================================
// Error Handler Middleware - Consistent Error Responses
// =================================================================================

/**
 * Patterns to redact from error messages (security)
 */
const REDACT_PATTERNS = [
  /\/(?:home|root|usr|var|tmp|srv|opt)\/[^\s]+/gi,  // File paths
  /at\s+[^\s]+\s+\([^)]+\)/gi,                     // Stack trace lines
  /\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}/g,           // IP addresses
];

/**
 * Sanitize error message to prevent leaking sensitive information
 */
export function sanitizeMessage(message: string | undefined): string {
  if (!message) return 'An unexpected error occurred';

  let sanitized = message;
  for (const pattern of REDACT_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }

  // Truncate very long messages
  if (sanitized.length > 200) {
    sanitized = sanitized.substring(0, 200) + '...';
  }

  return sanitized;
}

/**
 * Categorize an error into an ErrorCode. Anything that is not an APIError
 * is an internal failure.
 */
export function categorizeError(error: Error): ErrorCodeType {
  return error instanceof APIError ? error.code : ErrorCode.INTERNAL_ERROR;
}

/**
 * Hono error handler
 * Catches errors and returns consistent JSON responses with envelope format
 */
export const errorHandler: ErrorHandler<AppBindings> = (error, c) => {
  const logger = c.get('logger');
  // Log the full error for debugging (not exposed to client)
  logger.error('Error handler caught:', {
    name: error.name,
    message: error.message,
    stack: error.stack?.split('\n').slice(0, 3).join('\n'),
    url: c.req.url,
    method: c.req.method,
  });

  const code = categorizeError(error);
  const status = ERROR_STATUS_MAP[code];

  // Internal failures never echo their message to the client
  const message = code === ErrorCode.INTERNAL_ERROR
    ? 'Internal server error'
    : sanitizeMessage(error.message);

  const details = error instanceof APIError ? error.details : undefined;

  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
    meta: buildMeta(c),
  };

  return c.json(response, status);
};

/**
 * Unknown routes get the same envelope as every other error
 */
export const notFoundHandler: NotFoundHandler<AppBindings> = (c) => {
  return createErrorResponse(c, ErrorCode.NOT_FOUND, `Route not found: ${c.req.method} ${c.req.path}`);
};
