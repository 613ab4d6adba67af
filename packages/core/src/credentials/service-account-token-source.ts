import { JWT } from 'google-auth-library';
import type { Credentials } from 'google-auth-library';
import { loadServiceAccountKey } from '@verity/schemas/src/config-loader.js';
import type { ServiceAccountKey } from '@verity/schemas/src/service-account.schema.js';
import type { Credential } from '@verity/shared/src/types/credential.types.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { ConfigurationError, CredentialRefreshError } from '@verity/shared/src/utils/errors.js';
import { DEFAULT_TOKEN_LIFETIME_SECONDS } from './token-source.js';
import type { TokenSource } from './token-source.js';

const log = createChildLogger('credentials:service-account');

export interface ServiceAccountTokenSourceConfig {
  readonly keyFile: string;
  readonly scopes: readonly string[];
  readonly loadKey?: (keyFile: string) => Promise<ServiceAccountKey>;
  readonly now?: () => number;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function createServiceAccountTokenSource(
  config: ServiceAccountTokenSourceConfig,
): TokenSource {
  const { keyFile, scopes, loadKey = loadServiceAccountKey, now = Date.now } = config;

  if (scopes.length === 0) {
    throw new ConfigurationError('At least one OAuth scope is required for the service account token source');
  }

  log.info({ keyFile, scopes }, 'Creating service account token source');

  return {
    async fetchToken(): Promise<Credential> {
      // Read per call; the key file may be rotated in place.
      let key: ServiceAccountKey;
      try {
        key = await loadKey(keyFile);
      } catch (error) {
        const cause = toError(error);
        throw new CredentialRefreshError(`Service account key is unusable: ${cause.message}`, cause);
      }

      const client = new JWT({
        email: key.client_email,
        key: key.private_key,
        keyId: key.private_key_id,
        scopes: [...scopes],
      });

      let credentials: Credentials;
      try {
        credentials = await client.authorize();
      } catch (error) {
        const cause = toError(error);
        throw new CredentialRefreshError(`Identity provider rejected the token request: ${cause.message}`, cause);
      }

      if (!credentials.access_token) {
        throw new CredentialRefreshError('Identity provider returned no access token');
      }

      const expiresAt = credentials.expiry_date
        ? new Date(credentials.expiry_date)
        : new Date(now() + DEFAULT_TOKEN_LIFETIME_SECONDS * 1000);

      log.debug({ clientEmail: key.client_email, expiresAt: expiresAt.toISOString() }, 'Access token issued');

      return { token: credentials.access_token, expiresAt };
    },
  };
}
