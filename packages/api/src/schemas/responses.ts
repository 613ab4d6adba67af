import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    reason: z.string().optional(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
    appName: z.string(),
    credential: z.object({
      available: z.boolean(),
      expiresAt: z.string().nullable(),
    }),
  })
  .openapi('HealthResponse');

// Verifications
export const QueryResultResponseSchema = z
  .object({
    verdict: z.enum(['verified', 'unverified']),
    confidence: z.number().min(0).max(1),
    evidence: z.array(z.string()),
    rawFinal: z.string(),
  })
  .openapi('QueryResult');
