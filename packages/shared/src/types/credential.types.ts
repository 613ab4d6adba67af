export interface Credential {
  readonly token: string;
  readonly expiresAt: Date;
}
