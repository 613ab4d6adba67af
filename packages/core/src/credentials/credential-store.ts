import type { Credential } from '@verity/shared/src/types/credential.types.js';

export interface CredentialStore {
  current(): Credential | undefined;
  /**
   * Swaps in `next` as the current credential. Returns false and keeps the
   * current one when `next` expires earlier than it.
   */
  replace(next: Credential): boolean;
}

export function createInMemoryCredentialStore(initial?: Credential): CredentialStore {
  let snapshot: Credential | undefined = initial ? freeze(initial) : undefined;

  return {
    current(): Credential | undefined {
      return snapshot;
    },

    replace(next: Credential): boolean {
      if (snapshot && next.expiresAt.getTime() < snapshot.expiresAt.getTime()) {
        return false;
      }
      snapshot = freeze(next);
      return true;
    },
  };
}

function freeze(credential: Credential): Credential {
  return Object.freeze({
    token: credential.token,
    expiresAt: new Date(credential.expiresAt.getTime()),
  });
}
