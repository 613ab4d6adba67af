import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { OpenAPIHono } from '@hono/zod-openapi';
import { createInMemoryCredentialStore } from '@verity/core/src/credentials/credential-store.js';
import type { CredentialStore } from '@verity/core/src/credentials/credential-store.js';
import type { VerificationBridge } from '@verity/core/src/engine/verification-bridge.js';
import type { Credential } from '@verity/shared/src/types/credential.types.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export const TEST_APP_NAME = 'test_app';
export const TEST_VERSION = '0.1.0';

export interface TestApp {
  readonly app: OpenAPIHono<AppEnv>;
  readonly callAdk: Mock<VerificationBridge['callAdk']>;
  readonly credentialStore: CredentialStore;
}

/**
 * Builds the app around a mocked bridge and an in-memory store.
 * For use in unit tests only.
 */
export function createTestApp(credential?: Credential): TestApp {
  const callAdk = vi.fn<VerificationBridge['callAdk']>();
  const credentialStore = createInMemoryCredentialStore(credential);
  const app = createApp({
    bridge: { callAdk },
    credentialStore,
    appName: TEST_APP_NAME,
    version: TEST_VERSION,
  });
  return { app, callAdk, credentialStore };
}

export function jsonPost(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}
