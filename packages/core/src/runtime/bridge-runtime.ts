import type { BridgeConfig } from '@verity/schemas/src/bridge-config.schema.js';
import type { QueryMetadata, QueryResult } from '@verity/shared/src/types/verification.types.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { createEnvironmentPublisher } from '../credentials/credential-publisher.js';
import { createCredentialRefresher } from '../credentials/credential-refresher.js';
import type {
  CredentialRefresher,
  RefreshSchedule,
  ScheduleRefreshOptions,
} from '../credentials/credential-refresher.js';
import { createInMemoryCredentialStore } from '../credentials/credential-store.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { createServiceAccountTokenSource } from '../credentials/service-account-token-source.js';
import { createStaticTokenSource } from '../credentials/token-source.js';
import type { TokenSource } from '../credentials/token-source.js';
import { createReasoningEngineClient } from '../engine/reasoning-engine-client.js';
import { createVerificationBridge } from '../engine/verification-bridge.js';
import type { VerdictClassifier } from '../verdict/verdict-classifier.js';

const log = createChildLogger('runtime');

export interface BridgeRuntimeDeps {
  readonly tokenSource?: TokenSource;
  readonly credentialStore?: CredentialStore;
  readonly classifier?: VerdictClassifier;
  readonly fetch?: typeof fetch;
  readonly env?: NodeJS.ProcessEnv;
}

export interface BridgeRuntime {
  readonly config: BridgeConfig;
  readonly credentialStore: CredentialStore;
  readonly refresher: CredentialRefresher;
  scheduleRefresh(intervalSeconds?: number, options?: ScheduleRefreshOptions): RefreshSchedule;
  callAdk(query: string, metadata?: QueryMetadata): Promise<QueryResult>;
  warmup(): void;
}

export function createTokenSource(config: BridgeConfig): TokenSource {
  if (config.staticToken) {
    log.info('Using static access token');
    return createStaticTokenSource(config.staticToken);
  }
  return createServiceAccountTokenSource({
    keyFile: config.serviceAccountFile,
    scopes: config.scopes,
  });
}

export function createBridgeRuntime(config: BridgeConfig, deps: BridgeRuntimeDeps = {}): BridgeRuntime {
  const credentialStore = deps.credentialStore ?? createInMemoryCredentialStore();
  const refresher = createCredentialRefresher({
    tokenSource: deps.tokenSource ?? createTokenSource(config),
    credentialStore,
    publisher: createEnvironmentPublisher(config.tokenEnvVariable, deps.env),
  });

  const engineClient = createReasoningEngineClient({
    endpointUrl: config.reasoningEngineUrl,
    credentialStore,
    timeoutMs: config.httpTimeoutSeconds * 1000,
    fetch: deps.fetch,
  });

  const bridge = createVerificationBridge({ engineClient, classifier: deps.classifier });

  log.info(
    {
      endpointUrl: config.reasoningEngineUrl,
      appName: config.appName,
      timeoutSeconds: config.httpTimeoutSeconds,
    },
    'Bridge runtime created',
  );

  return {
    config,
    credentialStore,
    refresher,

    scheduleRefresh(
      intervalSeconds: number = config.tokenRefreshIntervalSeconds,
      options?: ScheduleRefreshOptions,
    ): RefreshSchedule {
      return refresher.scheduleRefresh(intervalSeconds, options);
    },

    callAdk(query: string, metadata?: QueryMetadata): Promise<QueryResult> {
      return bridge.callAdk(query, metadata);
    },

    warmup(): void {
      bridge.warmup();
    },
  };
}
