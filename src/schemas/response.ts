import { z } from '@hono/zod-openapi';
import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { randomUUID } from 'node:crypto';
import type { AppBindings } from '../env.js';

// =================================================================================
// Error Codes - Machine-readable error identifiers
// =================================================================================

export const ErrorCode = {
  // Validation errors (4xx)
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Resource errors (4xx)
  NOT_FOUND: 'NOT_FOUND',

  // Rate limiting (429)
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',

  // Generic errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

export const ErrorCodeSchema = z.enum([
  ErrorCode.VALIDATION_ERROR,
  ErrorCode.NOT_FOUND,
  ErrorCode.RATE_LIMIT_EXCEEDED,
  ErrorCode.INTERNAL_ERROR,
]).openapi('ErrorCode');

// =================================================================================
// Error Code to HTTP Status Mapping
// =================================================================================

export const ERROR_STATUS_MAP: Record<ErrorCodeType, ContentfulStatusCode> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

// =================================================================================
// Response Meta Schema
// =================================================================================

export const ResponseMetaSchema = z.object({
  requestId: z.string().describe('Unique request identifier for tracing'),
  timestamp: z.string().datetime().describe('ISO-8601 timestamp'),
  latencyMs: z.number().int().nonnegative().optional().describe('Request processing time in milliseconds'),
}).openapi('ResponseMeta');

export type ResponseMeta = z.infer<typeof ResponseMetaSchema>;

// =================================================================================
// Error Response Schema
// =================================================================================

export const ErrorDetailsSchema = z.object({
  code: ErrorCodeSchema.describe('Machine-readable error code'),
  message: z.string().describe('Human-readable error message'),
  details: z.record(z.string(), z.unknown()).optional().describe('Additional error context'),
}).openapi('ErrorDetails');

export const ErrorResponseSchema = z.object({
  success: z.literal(false),
  error: ErrorDetailsSchema,
  meta: ResponseMetaSchema,
}).openapi('ErrorResponse');

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// =================================================================================
// Response Helper Utilities
// =================================================================================

/**
 * Build response meta from Hono context
 */
export function buildMeta(c: Context<AppBindings>): ResponseMeta {
  const startTime = c.get('startTime');
  return {
    requestId: c.get('requestId') || randomUUID(),
    timestamp: new Date().toISOString(),
    latencyMs: startTime ? Date.now() - startTime : undefined,
  };
}

/**
 * Create a standardized error response
 *
 * @example
 * return createErrorResponse(c, ErrorCode.NOT_FOUND, 'Route not found');
 */
export function createErrorResponse(
  c: Context<AppBindings>,
  code: ErrorCodeType,
  message: string,
  details?: Record<string, unknown>
) {
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
    meta: buildMeta(c),
  };

  return c.json(response, ERROR_STATUS_MAP[code]);
}

// =================================================================================
// API Error Class
// =================================================================================

/**
 * Custom error class for throwing typed API errors
 *
 * @example
 * throw new APIError(ErrorCode.VALIDATION_ERROR, 'Invalid request parameters', { issues });
 */
export class APIError extends Error {
  code: ErrorCodeType;
  details?: Record<string, unknown>;
  status: ContentfulStatusCode;

  constructor(code: ErrorCodeType, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'APIError';
    this.code = code;
    this.details = details;
    this.status = ERROR_STATUS_MAP[code];
  }
}
