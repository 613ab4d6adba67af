import type { OpenAPIHono } from '@hono/zod-openapi';
import type { CredentialStore } from '@verity/core/src/credentials/credential-store.js';
import type { VerificationBridge } from '@verity/core/src/engine/verification-bridge.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createVerificationRoutes } from './routes/verifications.js';

const log = createChildLogger('api:server');

export interface AppConfig {
  readonly bridge: Pick<VerificationBridge, 'callAdk'>;
  readonly credentialStore: CredentialStore;
  readonly appName: string;
  readonly version: string;
}

export function buildOpenApiDocument(
  app: OpenAPIHono<AppEnv>,
  version: string,
): ReturnType<OpenAPIHono<AppEnv>['getOpenAPI31Document']> {
  return app.getOpenAPI31Document({
    openapi: '3.1.0',
    info: {
      title: 'Verity API',
      version,
      description: 'Claim verification through a hosted reasoning engine',
    },
  });
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route(
    '/health',
    createHealthRoutes({
      credentialStore: config.credentialStore,
      appName: config.appName,
      version: config.version,
    }),
  );

  app.get('/openapi.json', (c) => c.json(buildOpenApiDocument(app, config.version)));

  app.route('/verifications', createVerificationRoutes(config.bridge));

  return app;
}
