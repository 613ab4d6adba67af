import type { ZodError } from 'zod';
import { SchemaValidationError } from '@verity/shared/src/utils/errors.js';
import { BridgeConfigSchema } from './bridge-config.schema.js';
import type { BridgeConfig } from './bridge-config.schema.js';
import { ServiceAccountKeySchema } from './service-account.schema.js';
import type { ServiceAccountKey } from './service-account.schema.js';

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateBridgeConfig(data: unknown): BridgeConfig {
  const result = BridgeConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid bridge configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateServiceAccountKey(data: unknown): ServiceAccountKey {
  const result = ServiceAccountKeySchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid service account key', formatZodErrors(result.error));
  }

  return result.data;
}
