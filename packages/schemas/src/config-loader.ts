import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@verity/shared/src/utils/errors.js';
import { validateBridgeConfig, validateServiceAccountKey } from './validators.js';
import type { BridgeConfig } from './bridge-config.schema.js';
import type { ServiceAccountKey } from './service-account.schema.js';

export type Environment = Readonly<Record<string, string | undefined>>;

function readEnv(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Maps environment variables onto a validated {@link BridgeConfig}. Unset or
 * blank variables fall back to the schema defaults.
 */
export function loadBridgeConfig(env: Environment = process.env): BridgeConfig {
  return validateBridgeConfig({
    reasoningEngineUrl: readEnv(env, 'REASONING_ENGINE_URL'),
    appName: readEnv(env, 'ADK_APP_NAME'),
    httpTimeoutSeconds: readEnv(env, 'ADK_TIMEOUT_SEC'),
    serviceAccountFile: readEnv(env, 'SERVICE_ACCOUNT_FILE'),
    tokenRefreshIntervalSeconds: readEnv(env, 'TOKEN_REFRESH_INTERVAL_SEC'),
    staticToken: readEnv(env, 'VERITY_STATIC_TOKEN'),
  });
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Service account file not found: ${filePath}`);
    }
    throw new ConfigurationError(`Failed to read service account file ${filePath}: ${nodeError.message}`);
  }
}

export async function loadServiceAccountKey(filePath: string): Promise<ServiceAccountKey> {
  const raw = await readJsonFile(filePath);
  return validateServiceAccountKey(raw);
}
