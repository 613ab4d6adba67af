import { z } from '@hono/zod-openapi';

export const VerificationUserSchema = z
  .object({
    wa_from: z.string().optional(),
    id: z.string().optional(),
  })
  .passthrough();

export const VerificationRequestSchema = z
  .object({
    query: z.string().min(1).openapi({ example: 'Is the harbour bridge closed this weekend?' }),
    metadata: z
      .object({
        user: VerificationUserSchema.optional(),
      })
      .passthrough()
      .optional(),
  })
  .openapi('VerificationRequest');

export type VerificationRequest = z.infer<typeof VerificationRequestSchema>;
