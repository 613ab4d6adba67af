import { z } from 'zod';

export const ServiceAccountKeySchema = z
  .object({
    type: z.literal('service_account'),
    project_id: z.string().optional(),
    private_key_id: z.string().optional(),
    private_key: z.string().min(1),
    client_email: z.string().email(),
    token_uri: z.string().url().optional(),
  })
  .passthrough();

export type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>;
