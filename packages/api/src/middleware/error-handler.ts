import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { ReasoningEngineError } from '@verity/shared/src/utils/errors.js';
import type { ReasoningEngineErrorReason } from '@verity/shared/src/utils/errors.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly reason?: ReasoningEngineErrorReason;
  readonly details?: readonly string[];
}

type EngineFailureStatus = 500 | 502 | 503 | 504;

export const STATUS_BY_REASON: Readonly<Record<ReasoningEngineErrorReason, EngineFailureStatus>> = {
  missing_credential: 503,
  timeout: 504,
  http_error: 502,
  missing_logs: 502,
  missing_final_text: 502,
  unexpected: 500,
};

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  // Raised by the request validator for an unparseable JSON body.
  if (err instanceof HTTPException && err.status === 400) {
    const body: ErrorResponse = {
      error: err.message,
      code: 'INVALID_REQUEST',
      requestId,
    };
    return c.json(body, 400);
  }

  if (err instanceof ReasoningEngineError) {
    const status = STATUS_BY_REASON[err.reason];
    log.error({ requestId, reason: err.reason, status, error: err.message }, 'Reasoning engine error');
    const body: ErrorResponse = {
      error: err.message,
      code: err.code,
      reason: err.reason,
      requestId,
    };
    return c.json(body, status);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
