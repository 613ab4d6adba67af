import { MAX_TOKEN_REFRESH_INTERVAL_SECONDS } from '@verity/schemas/src/bridge-config.schema.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { ConfigurationError } from '@verity/shared/src/utils/errors.js';
import type { CredentialStore } from './credential-store.js';
import type { CredentialPublisher } from './credential-publisher.js';
import type { TokenSource } from './token-source.js';

const log = createChildLogger('credentials:refresher');

export interface CredentialRefresherDeps {
  readonly tokenSource: TokenSource;
  readonly credentialStore: CredentialStore;
  readonly publisher?: CredentialPublisher;
}

export interface ScheduleRefreshOptions {
  readonly signal?: AbortSignal;
}

export interface RefreshSchedule {
  readonly intervalSeconds: number;
  /** Resolves once the loop has exited. */
  readonly done: Promise<void>;
  /** Ends the loop after the cycle in progress and waits for it. */
  stop(): Promise<void>;
}

export interface CredentialRefresher {
  /** Resolves to false when the attempt failed or was discarded; never rejects. */
  refresh(): Promise<boolean>;
  scheduleRefresh(intervalSeconds: number, options?: ScheduleRefreshOptions): RefreshSchedule;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    timer.unref();

    function onAbort(): void {
      clearTimeout(timer);
      resolve();
    }

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export function createCredentialRefresher(deps: CredentialRefresherDeps): CredentialRefresher {
  const { tokenSource, credentialStore, publisher } = deps;

  let inFlight: Promise<boolean> | undefined;

  async function attemptRefresh(): Promise<boolean> {
    try {
      const credential = await tokenSource.fetchToken();
      const expiresAt = credential.expiresAt.toISOString();

      if (!credentialStore.replace(credential)) {
        log.warn(
          { expiresAt, currentExpiresAt: credentialStore.current()?.expiresAt.toISOString() },
          'Discarding credential that expires before the current one',
        );
        return false;
      }

      publisher?.(credential);
      log.info({ expiresAt }, 'Credential refreshed');
      return true;
    } catch (error) {
      log.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Credential refresh failed, keeping previous credential',
      );
      return false;
    }
  }

  function refresh(): Promise<boolean> {
    if (!inFlight) {
      inFlight = attemptRefresh().finally(() => {
        inFlight = undefined;
      });
    }
    return inFlight;
  }

  async function runLoop(intervalSeconds: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await refresh();
      if (signal.aborted) {
        break;
      }
      log.debug({ intervalSeconds }, 'Waiting until next credential refresh');
      await sleep(intervalSeconds * 1000, signal);
    }
    log.info('Credential refresh scheduler stopped');
  }

  return {
    refresh,

    scheduleRefresh(intervalSeconds: number, options: ScheduleRefreshOptions = {}): RefreshSchedule {
      if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
        throw new ConfigurationError(
          `Refresh interval must be a positive number of seconds, got ${String(intervalSeconds)}`,
        );
      }
      if (intervalSeconds > MAX_TOKEN_REFRESH_INTERVAL_SECONDS) {
        throw new ConfigurationError(
          `Refresh interval must not exceed ${String(MAX_TOKEN_REFRESH_INTERVAL_SECONDS)} seconds, got ${String(intervalSeconds)}`,
        );
      }

      const controller = new AbortController();
      const { signal } = options;
      if (signal?.aborted) {
        controller.abort();
      } else {
        signal?.addEventListener('abort', () => controller.abort(), { once: true });
      }

      log.info({ intervalSeconds }, 'Starting credential refresh scheduler');

      const done = runLoop(intervalSeconds, controller.signal);

      return {
        intervalSeconds,
        done,
        async stop(): Promise<void> {
          controller.abort();
          await done;
        },
      };
    },
  };
}
