export type Verdict = 'verified' | 'unverified';

export interface VerdictAssessment {
  readonly verdict: Verdict;
  readonly confidence: number;
}

export interface QueryResult extends VerdictAssessment {
  readonly evidence: readonly string[];
  readonly rawFinal: string;
}

export interface QueryUser {
  readonly wa_from?: string;
  readonly id?: string;
}

export interface QueryMetadata {
  readonly user?: QueryUser;
  readonly [key: string]: unknown;
}

// Legacy log-list shape returned by the engine client.
export interface ContentPart {
  readonly text?: string;
}

export interface LogEntry {
  readonly content?: {
    readonly parts?: readonly ContentPart[];
  };
}

export interface QueryEnvelope {
  readonly logs?: readonly LogEntry[];
}
