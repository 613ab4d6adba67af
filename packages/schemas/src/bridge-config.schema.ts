import { z } from 'zod';

export const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

export const DEFAULT_REASONING_ENGINE_URL =
  'https://us-central1-aiplatform.googleapis.com/v1/projects/your-project/locations/us-central1/reasoningEngines/your-engine:asyncStreamQuery';

// Longest delay a Node.js timer honours (2^31 - 1 ms), in whole seconds.
export const MAX_TOKEN_REFRESH_INTERVAL_SECONDS = 2_147_483;

export const BridgeConfigSchema = z.object({
  reasoningEngineUrl: z.string().url().default(DEFAULT_REASONING_ENGINE_URL),
  appName: z.string().min(1).default('news_info_verification_v2'),
  httpTimeoutSeconds: z.coerce.number().positive().default(300),
  serviceAccountFile: z.string().min(1).default('service-account.json'),
  scopes: z.array(z.string().url()).min(1).default([CLOUD_PLATFORM_SCOPE]),
  // Required. Must stay below the token lifetime.
  tokenRefreshIntervalSeconds: z.coerce.number().int().positive().max(MAX_TOKEN_REFRESH_INTERVAL_SECONDS),
  tokenEnvVariable: z.string().min(1).default('GCP_ACCESS_TOKEN'),
  staticToken: z.string().min(1).optional(),
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
