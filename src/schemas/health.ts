import { z } from '@hono/zod-openapi';

// =================================================================================
// Health Schemas
// =================================================================================

export const HealthResponseSchema = z.object({
  status: z.literal('healthy'),
  version: z.string(),
  books_loaded: z.number().int().nonnegative(),
  loaded_at: z.string().datetime(),
}).openapi('HealthResponse');

export type HealthResponse = z.infer<typeof HealthResponseSchema>;
