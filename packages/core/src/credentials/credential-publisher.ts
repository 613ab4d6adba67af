import type { Credential } from '@verity/shared/src/types/credential.types.js';

export type CredentialPublisher = (credential: Credential) => void;

/** Mirrors the current token into an environment variable for collaborators that read it there. */
export function createEnvironmentPublisher(
  variable: string,
  env: NodeJS.ProcessEnv = process.env,
): CredentialPublisher {
  return (credential) => {
    env[variable] = credential.token;
  };
}
