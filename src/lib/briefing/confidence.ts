/**
 * Confidence ordering and transitions.
 *
 * @module briefing/confidence
 */

import {
  CONFIDENCE_LEVELS,
  INITIAL_CONFIDENCE_LEVELS,
  type Claim,
  type ConfidenceLevel,
  type InitialConfidence,
  type VerificationPass,
} from "./types";

export function confidenceRank(level: ConfidenceLevel): number {
  return CONFIDENCE_LEVELS.indexOf(level);
}

export function isInitialConfidence(level: string): level is InitialConfidence {
  return INITIAL_CONFIDENCE_LEVELS.some((l) => l === level);
}

/** Higher-precedence of two labels. */
export function maxConfidence(a: ConfidenceLevel, b: ConfidenceLevel): ConfidenceLevel {
  return confidenceRank(a) >= confidenceRank(b) ? a : b;
}

/**
 * Move a claim to `to` if that raises its confidence. Returns the same object
 * when nothing changes, otherwise a copy with the transition appended.
 */
export function transitionClaim(
  claim: Claim,
  to: ConfidenceLevel,
  pass: VerificationPass,
  reason: string,
): Claim {
  if (confidenceRank(to) <= confidenceRank(claim.confidence)) return claim;
  return {
    ...claim,
    confidence: to,
    transitions: [...claim.transitions, { from: claim.confidence, to, pass, reason }],
  };
}
