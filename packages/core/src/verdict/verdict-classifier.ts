import type { VerdictAssessment } from '@verity/shared/src/types/verification.types.js';

/**
 * Turns the finalized answer of the reasoning engine into a verdict. Swap in
 * another implementation to change how answers are scored.
 */
export type VerdictClassifier = (finalText: string | undefined) => VerdictAssessment;

const VERIFIED_MARKERS = ['legitimate', 'verdict: true'];
const FULL_CONFIDENCE_MARKER = 'confidence: 1.0';

export const DEFAULT_CONFIDENCE = 0.5;
export const FULL_CONFIDENCE = 1.0;

export const classifyByKeywords: VerdictClassifier = (finalText) => {
  const text = (finalText ?? '').toLowerCase();

  return {
    verdict: VERIFIED_MARKERS.some((marker) => text.includes(marker)) ? 'verified' : 'unverified',
    confidence: text.includes(FULL_CONFIDENCE_MARKER) ? FULL_CONFIDENCE : DEFAULT_CONFIDENCE,
  };
};
