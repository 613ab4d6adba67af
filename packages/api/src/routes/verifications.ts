import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { VerificationBridge } from '@verity/core/src/engine/verification-bridge.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { createRouter, type AppEnv } from '../types.js';
import { VerificationRequestSchema } from '../schemas/requests.js';
import { ErrorResponseSchema, QueryResultResponseSchema } from '../schemas/responses.js';

const log = createChildLogger('api:verifications');

const errorContent = {
  'application/json': {
    schema: ErrorResponseSchema,
  },
};

const verifyRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Verifications'],
  summary: 'Verify a claim with the reasoning engine',
  request: {
    body: {
      content: {
        'application/json': {
          schema: VerificationRequestSchema,
        },
      },
      required: true,
    },
  },
  responses: {
    200: {
      description: 'Classified answer of the reasoning engine',
      content: {
        'application/json': {
          schema: QueryResultResponseSchema,
        },
      },
    },
    400: { description: 'Invalid request body', content: errorContent },
    500: { description: 'Unexpected failure', content: errorContent },
    502: { description: 'Reasoning engine failed or answered without a usable result', content: errorContent },
    503: { description: 'No valid access token available', content: errorContent },
    504: { description: 'Reasoning engine deadline exceeded', content: errorContent },
  },
});

export function createVerificationRoutes(bridge: Pick<VerificationBridge, 'callAdk'>): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(verifyRoute, async (c) => {
    const { query, metadata } = c.req.valid('json');
    log.debug({ requestId: c.get('requestId'), queryLength: query.length }, 'Verification requested');

    const result = await bridge.callAdk(query, metadata);

    return c.json(
      {
        verdict: result.verdict,
        confidence: result.confidence,
        evidence: [...result.evidence],
        rawFinal: result.rawFinal,
      },
      200,
    );
  });

  return routes;
}
