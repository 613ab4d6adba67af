import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { CredentialStore } from '@verity/core/src/credentials/credential-store.js';
import { createRouter, type AppEnv } from '../types.js';
import { HealthResponseSchema } from '../schemas/responses.js';

export interface HealthRouteDeps {
  readonly credentialStore: CredentialStore;
  readonly appName: string;
  readonly version: string;
}

const healthRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Health'],
  summary: 'Health check',
  responses: {
    200: {
      description: 'Service is healthy',
      content: {
        'application/json': {
          schema: HealthResponseSchema,
        },
      },
    },
  },
});

export function createHealthRoutes(deps: HealthRouteDeps): OpenAPIHono<AppEnv> {
  const health = createRouter();

  health.openapi(healthRoute, (c) => {
    // Reports presence only; the token itself never leaves the store.
    const credential = deps.credentialStore.current();
    return c.json(
      {
        status: 'ok',
        version: deps.version,
        appName: deps.appName,
        credential: {
          available: credential !== undefined,
          expiresAt: credential ? credential.expiresAt.toISOString() : null,
        },
      },
      200,
    );
  });

  return health;
}
