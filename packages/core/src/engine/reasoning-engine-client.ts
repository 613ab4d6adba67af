import type { QueryEnvelope } from '@verity/shared/src/types/verification.types.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import {
  ConfigurationError,
  MissingCredentialError,
  TimeoutError,
  TransportError,
} from '@verity/shared/src/utils/errors.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { decodeStream, readLines } from '../stream/stream-decoder.js';
import type { DiscardHandler, StreamDecodeResult } from '../stream/stream-decoder.js';

const log = createChildLogger('engine:client');

export const STREAM_QUERY_METHOD = 'async_stream_query';
export const DEFAULT_TIMEOUT_MS = 300_000;
export const MAX_ERROR_BODY_LENGTH = 300;

export interface ReasoningEngineClientConfig {
  readonly endpointUrl: string;
  readonly credentialStore: CredentialStore;
  readonly timeoutMs?: number;
  readonly fetch?: typeof fetch;
  readonly now?: () => number;
  readonly onDiscardedLine?: DiscardHandler;
}

export interface ReasoningEngineClient {
  run(query: string, userId: string): Promise<QueryEnvelope>;
}

export interface StreamQueryPayload {
  readonly class_method: string;
  readonly input: {
    readonly user_id: string;
    readonly message: string;
  };
}

export function buildStreamQueryPayload(query: string, userId: string): StreamQueryPayload {
  return {
    class_method: STREAM_QUERY_METHOD,
    input: { user_id: userId, message: query },
  };
}

export function toQueryEnvelope(finalText: string): QueryEnvelope {
  return { logs: [{ content: { parts: [{ text: finalText }] } }] };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Reads at most MAX_ERROR_BODY_LENGTH characters, then cancels the rest of the body. */
async function readErrorBody(response: Response): Promise<string> {
  if (!response.body) {
    return '';
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let body = '';
  try {
    while (body.length < MAX_ERROR_BODY_LENGTH) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      body += decoder.decode(value, { stream: true });
    }
    await reader.cancel();
  } catch (error) {
    log.debug({ error: toError(error).message }, 'Could not read error response body');
  }
  return body.slice(0, MAX_ERROR_BODY_LENGTH);
}

export function createReasoningEngineClient(config: ReasoningEngineClientConfig): ReasoningEngineClient {
  const {
    endpointUrl,
    credentialStore,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    fetch: fetchFn = fetch,
    now = Date.now,
    onDiscardedLine,
  } = config;

  if (!endpointUrl) {
    throw new ConfigurationError('Reasoning engine endpoint URL is required');
  }
  if (!(timeoutMs > 0)) {
    throw new ConfigurationError(`Reasoning engine timeout must be positive, got ${String(timeoutMs)}ms`);
  }

  return {
    async run(query: string, userId: string): Promise<QueryEnvelope> {
      const credential = credentialStore.current();
      if (!credential) {
        throw new MissingCredentialError('No access token available for the reasoning engine');
      }
      if (credential.expiresAt.getTime() <= now()) {
        throw new MissingCredentialError(
          `Access token expired at ${credential.expiresAt.toISOString()}`,
        );
      }

      const started = now();
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);

      // One deadline covers the connect and the whole stream read.
      const toTransportFailure = (error: unknown): TimeoutError | TransportError => {
        const cause = toError(error);
        if (controller.signal.aborted) {
          log.error({ userId, timeoutMs }, 'Reasoning engine call timed out');
          return new TimeoutError(`Reasoning engine call exceeded ${String(timeoutMs)}ms`, timeoutMs, cause);
        }
        log.error({ userId, error: cause.message }, 'Reasoning engine transport failure');
        return new TransportError(`Reasoning engine transport failure: ${cause.message}`, { cause });
      };

      try {
        let response: Response;
        try {
          response = await fetchFn(endpointUrl, {
            method: 'POST',
            headers: {
              Authorization: `Bearer ${credential.token}`,
              'Content-Type': 'application/json',
            },
            body: JSON.stringify(buildStreamQueryPayload(query, userId)),
            signal: controller.signal,
          });
        } catch (error) {
          throw toTransportFailure(error);
        }

        if (!response.ok) {
          const body = await readErrorBody(response);
          if (controller.signal.aborted) {
            throw toTransportFailure(new Error(`Deadline hit while reading status ${String(response.status)} body`));
          }
          log.error({ userId, status: response.status, body }, 'Reasoning engine returned an error status');
          throw new TransportError(`Reasoning engine responded with status ${String(response.status)}`, {
            status: response.status,
            body,
          });
        }

        log.info({ userId, durationMs: now() - started }, 'Reasoning engine stream opened');

        let decoded: StreamDecodeResult;
        try {
          decoded = await decodeStream(readLines(response.body ?? []), { onDiscard: onDiscardedLine });
        } catch (error) {
          throw toTransportFailure(error);
        }

        log.info(
          {
            userId,
            durationMs: now() - started,
            parsedFragments: decoded.parsedFragments,
            discardedLines: decoded.discardedLines,
          },
          'Reasoning engine run completed',
        );

        return toQueryEnvelope(decoded.finalText);
      } finally {
        clearTimeout(timer);
      }
    },
  };
}
