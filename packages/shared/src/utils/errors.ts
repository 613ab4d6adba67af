export class VerityError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'VerityError';
  }
}

export class SchemaValidationError extends VerityError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends VerityError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class CredentialRefreshError extends VerityError {
  constructor(message: string, cause?: Error) {
    super(message, 'CREDENTIAL_REFRESH_ERROR', cause);
    this.name = 'CredentialRefreshError';
  }
}

export type ReasoningEngineErrorReason =
  | 'missing_credential'
  | 'timeout'
  | 'http_error'
  | 'missing_logs'
  | 'missing_final_text'
  | 'unexpected';

/**
 * Base of every failure surfaced by a reasoning engine query. `reason` is the
 * short machine-readable string callers branch on.
 */
export class ReasoningEngineError extends VerityError {
  constructor(
    message: string,
    public readonly reason: ReasoningEngineErrorReason,
    cause?: Error,
  ) {
    super(message, 'REASONING_ENGINE_ERROR', cause);
    this.name = 'ReasoningEngineError';
  }
}

export class MissingCredentialError extends ReasoningEngineError {
  constructor(message: string) {
    super(message, 'missing_credential');
    this.name = 'MissingCredentialError';
  }
}

export class TimeoutError extends ReasoningEngineError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    cause?: Error,
  ) {
    super(message, 'timeout', cause);
    this.name = 'TimeoutError';
  }
}

export interface TransportErrorDetails {
  readonly status?: number;
  readonly body?: string;
  readonly cause?: Error;
}

export class TransportError extends ReasoningEngineError {
  public readonly status?: number;
  public readonly body: string;

  constructor(message: string, details: TransportErrorDetails = {}) {
    super(message, 'http_error', details.cause);
    this.name = 'TransportError';
    this.status = details.status;
    this.body = details.body ?? '';
  }
}

export class MissingLogsError extends ReasoningEngineError {
  constructor(message: string) {
    super(message, 'missing_logs');
    this.name = 'MissingLogsError';
  }
}

export class MalformedResponseError extends ReasoningEngineError {
  constructor(message: string, cause?: Error) {
    super(message, 'missing_final_text', cause);
    this.name = 'MalformedResponseError';
  }
}

export class UnexpectedError extends ReasoningEngineError {
  constructor(message: string, cause?: Error) {
    super(message, 'unexpected', cause);
    this.name = 'UnexpectedError';
  }
}
