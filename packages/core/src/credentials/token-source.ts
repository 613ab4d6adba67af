import type { Credential } from '@verity/shared/src/types/credential.types.js';

export const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

export interface TokenSource {
  fetchToken(): Promise<Credential>;
}

/**
 * Serves a pre-issued token. Each call reports a fresh expiry so the
 * refresher keeps republishing it.
 */
export function createStaticTokenSource(
  token: string,
  lifetimeSeconds: number = DEFAULT_TOKEN_LIFETIME_SECONDS,
  now: () => number = Date.now,
): TokenSource {
  return {
    fetchToken(): Promise<Credential> {
      return Promise.resolve({
        token,
        expiresAt: new Date(now() + lifetimeSeconds * 1000),
      });
    },
  };
}
