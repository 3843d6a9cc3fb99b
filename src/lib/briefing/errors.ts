/**
 * Typed errors raised across the briefing pipeline.
 *
 * @module briefing/errors
 */

export type OracleErrorKind = "transient" | "malformed" | "quota_exceeded";

/**
 * Failure of a single oracle call. `kind` decides the retry policy in
 * GovernedOracle.
 */
export class OracleError extends Error {
  readonly kind: OracleErrorKind;

  constructor(kind: OracleErrorKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "OracleError";
    this.kind = kind;
  }
}

/** Thrown when the cost governor refuses to admit a call. */
export class BudgetExceededError extends Error {
  readonly stage: string;
  readonly projectedUsd: number;
  readonly limitUsd: number;

  constructor(stage: string, projectedUsd: number, limitUsd: number, message?: string) {
    super(
      message ??
        `Budget exceeded for ${stage}: projected $${projectedUsd.toFixed(4)} over limit $${limitUsd.toFixed(4)}`,
    );
    this.name = "BudgetExceededError";
    this.stage = stage;
    this.projectedUsd = projectedUsd;
    this.limitUsd = limitUsd;
  }
}

export type BriefingRunFailure =
  | "no_articles"
  | "no_claims"
  | "synthesis_failed"
  | "budget_exceeded"
  | "cancelled";

/** Run-level failure: no briefing is produced. */
export class BriefingRunError extends Error {
  readonly reason: BriefingRunFailure;

  constructor(reason: BriefingRunFailure, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "BriefingRunError";
    this.reason = reason;
  }
}
