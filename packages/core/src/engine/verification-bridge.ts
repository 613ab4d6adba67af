import type {
  QueryEnvelope,
  QueryMetadata,
  QueryResult,
} from '@verity/shared/src/types/verification.types.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import {
  MalformedResponseError,
  MissingLogsError,
  ReasoningEngineError,
  UnexpectedError,
} from '@verity/shared/src/utils/errors.js';
import { classifyByKeywords } from '../verdict/verdict-classifier.js';
import type { VerdictClassifier } from '../verdict/verdict-classifier.js';
import type { ReasoningEngineClient } from './reasoning-engine-client.js';

const log = createChildLogger('engine:bridge');

export const ANONYMOUS_USER_ID = 'anonymous';

const LOG_PREVIEW_LENGTH = 500;

export interface VerificationBridgeDeps {
  readonly engineClient: ReasoningEngineClient;
  readonly classifier?: VerdictClassifier;
}

export interface VerificationBridge {
  callAdk(query: string, metadata?: QueryMetadata): Promise<QueryResult>;
  /** Kept for callers of the session-based engine; there is nothing to prepare. */
  warmup(): void;
}

export function resolveUserId(metadata: QueryMetadata = {}): string {
  const user = metadata.user;
  // Empty identifiers fall through to the next candidate.
  return user?.wa_from || user?.id || ANONYMOUS_USER_ID;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function preview(value: unknown): string {
  return String(JSON.stringify(value)).slice(0, LOG_PREVIEW_LENGTH);
}

function extractFinalText(envelope: QueryEnvelope, userId: string): string {
  const logs = envelope.logs;
  if (!logs || logs.length === 0) {
    log.error({ userId, envelope: preview(envelope) }, 'Reasoning engine response has no logs');
    throw new MissingLogsError('Missing logs in reasoning engine response');
  }

  const lastLog = logs[logs.length - 1];
  const text = lastLog?.content?.parts?.[0]?.text;
  if (typeof text !== 'string') {
    log.error({ userId, lastLog: preview(lastLog) }, 'Reasoning engine response has no final text');
    throw new MalformedResponseError('Missing final text in reasoning engine response');
  }

  return text;
}

export function createVerificationBridge(deps: VerificationBridgeDeps): VerificationBridge {
  const { engineClient, classifier = classifyByKeywords } = deps;

  return {
    async callAdk(query: string, metadata: QueryMetadata = {}): Promise<QueryResult> {
      const userId = resolveUserId(metadata);

      let envelope: QueryEnvelope;
      try {
        envelope = await engineClient.run(query, userId);
      } catch (error) {
        if (error instanceof ReasoningEngineError) {
          throw error;
        }
        const cause = toError(error);
        log.error({ userId, error: cause.message }, 'Unexpected reasoning engine failure');
        throw new UnexpectedError(`Unexpected reasoning engine failure: ${cause.message}`, cause);
      }

      const finalText = extractFinalText(envelope, userId);

      let verdict: QueryResult['verdict'];
      let confidence: number;
      try {
        ({ verdict, confidence } = classifier(finalText));
      } catch (error) {
        const cause = toError(error);
        log.error({ userId, error: cause.message }, 'Verdict classifier failed');
        throw new UnexpectedError(`Verdict classification failed: ${cause.message}`, cause);
      }

      log.info({ userId, verdict, confidence }, 'Query classified');

      return Object.freeze({
        verdict,
        confidence,
        evidence: Object.freeze([]),
        rawFinal: finalText,
      });
    },

    warmup(): void {
      log.debug('Warmup requested, nothing to prepare');
    },
  };
}
