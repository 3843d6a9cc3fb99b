/**
 * Cost governor
 *
 * Per-run spend control for oracle calls:
 * - projects the cost of a call before it is issued
 * - admits it only if the run stays under the hard ceiling
 * - records actual usage and raises the cost warning once
 * - halts remaining non-synthesis work on the first rejection or quota failure
 *
 * Synthesis keeps `synthesisReserveUsd` of headroom that earlier stages
 * cannot spend, so a partial briefing can still be finalized.
 *
 * @module briefing/cost-governor
 */

import type { BriefingConfig } from "../config-schemas";
import type { StageTotals } from "./cost-log";
import type { OracleTask } from "./oracle";
import type { Article, CostSummary, RunWarning } from "./types";

// ============================================================================
// PRICING
// ============================================================================

export interface ModelPrice {
  /** USD per 1M input tokens */
  input: number;
  /** USD per 1M output tokens */
  output: number;
}

// Approximate list prices
const MODEL_PRICING: Record<string, ModelPrice> = {
  // Anthropic
  "claude-sonnet-4-20250514": { input: 3, output: 15 },
  "claude-3-5-sonnet-20241022": { input: 3, output: 15 },
  "claude-3-5-haiku-20241022": { input: 1, output: 5 },
  "claude-3-haiku-20240307": { input: 0.25, output: 1.25 },

  // OpenAI
  "gpt-4o": { input: 2.5, output: 10 },
  "gpt-4o-mini": { input: 0.15, output: 0.6 },
  "gpt-4-turbo": { input: 10, output: 30 },

  // Google
  "gemini-1.5-pro": { input: 1.25, output: 5 },
  "gemini-1.5-flash": { input: 0.075, output: 0.3 },

  // Mistral
  "mistral-large-latest": { input: 3, output: 9 },
  "mistral-small-latest": { input: 0.2, output: 0.6 },
};

export const FALLBACK_PRICE: ModelPrice = { input: 2, output: 6 };

export function getCostPer1MTokens(modelName: string): ModelPrice {
  return MODEL_PRICING[modelName] ?? FALLBACK_PRICE;
}

/** Rough token count: four characters per token. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function computeCostUsd(modelName: string, tokensIn: number, tokensOut: number): number {
  const price = getCostPer1MTokens(modelName);
  return (tokensIn / 1_000_000) * price.input + (tokensOut / 1_000_000) * price.output;
}

// ============================================================================
// LEDGER
// ============================================================================

export type HaltReason = "budget_exceeded" | "quota_exceeded";

export interface CostLedger {
  runId: string;
  estimatedUsd: number;
  actualUsd: number;
  tokensIn: number;
  tokensOut: number;
  calls: number;
  byStage: Partial<Record<OracleTask, StageTotals>>;
  /** Set once; every later non-synthesis call is refused */
  haltReason: HaltReason | null;
  costWarningIssued: boolean;
}

export function createCostLedger(runId: string): CostLedger {
  return {
    runId,
    estimatedUsd: 0,
    actualUsd: 0,
    tokensIn: 0,
    tokensOut: 0,
    calls: 0,
    byStage: {},
    haltReason: null,
    costWarningIssued: false,
  };
}

function stageTotals(ledger: CostLedger, stage: OracleTask): StageTotals {
  let totals = ledger.byStage[stage];
  if (!totals) {
    totals = { calls: 0, tokensIn: 0, tokensOut: 0, estimatedUsd: 0, actualUsd: 0 };
    ledger.byStage[stage] = totals;
  }
  return totals;
}

export function summarizeLedger(ledger: CostLedger): CostSummary {
  return {
    estimatedUsd: ledger.estimatedUsd,
    actualUsd: ledger.actualUsd,
    tokensIn: ledger.tokensIn,
    tokensOut: ledger.tokensOut,
    calls: ledger.calls,
    haltReason: ledger.haltReason,
  };
}

// ============================================================================
// ADMISSION
// ============================================================================

export interface CostProjection {
  modelName: string;
  tokensIn: number;
  tokensOut: number;
  usd: number;
}

export type AdmissionDecision =
  | { admitted: true; projectedUsd: number; limitUsd: number }
  | { admitted: false; projectedUsd: number; limitUsd: number; reason: string };

export type CostLimits = Pick<
  BriefingConfig,
  "hardCostCeilingUsd" | "warningThresholdUsd" | "synthesisReserveUsd"
>;

/**
 * Project a call at its worst case: estimated prompt tokens in, the full
 * output ceiling out.
 */
export function projectCall(
  modelName: string,
  system: string,
  prompt: string,
  maxOutputTokens: number,
): CostProjection {
  const tokensIn = estimateTokens(system) + estimateTokens(prompt);
  return {
    modelName,
    tokensIn,
    tokensOut: maxOutputTokens,
    usd: computeCostUsd(modelName, tokensIn, maxOutputTokens),
  };
}

export function admissionLimit(limits: CostLimits, stage: OracleTask): number {
  return stage === "synthesis"
    ? limits.hardCostCeilingUsd
    : limits.hardCostCeilingUsd - limits.synthesisReserveUsd;
}

/**
 * Pure admission check: would this projection keep the run under the stage limit?
 */
export function checkAdmission(
  ledger: CostLedger,
  limits: CostLimits,
  stage: OracleTask,
  projectedUsd: number,
): AdmissionDecision {
  const limitUsd = admissionLimit(limits, stage);

  if (stage !== "synthesis" && ledger.haltReason) {
    return { admitted: false, projectedUsd, limitUsd, reason: `Run halted: ${ledger.haltReason}` };
  }

  const committed = Math.max(ledger.estimatedUsd, ledger.actualUsd);
  if (committed + projectedUsd > limitUsd) {
    return {
      admitted: false,
      projectedUsd,
      limitUsd,
      reason: `Would exceed ${stage === "synthesis" ? "hard ceiling" : "pre-synthesis limit"}: $${(
        committed + projectedUsd
      ).toFixed(4)} > $${limitUsd.toFixed(4)}`,
    };
  }

  return { admitted: true, projectedUsd, limitUsd };
}

// ============================================================================
// PREFLIGHT
// ============================================================================

export interface PreflightEstimate {
  articles: number;
  inputTokens: number;
  outputTokens: number;
  estimatedUsd: number;
}

/** Output is estimated at 15% of input across the whole run. */
export const PREFLIGHT_OUTPUT_RATIO = 0.15;

export function estimateRunCost(articles: Article[], modelName: string): PreflightEstimate {
  const inputTokens = articles.reduce(
    (sum, a) => sum + estimateTokens(a.body) + estimateTokens(a.title ?? ""),
    0,
  );
  const outputTokens = Math.ceil(inputTokens * PREFLIGHT_OUTPUT_RATIO);
  return {
    articles: articles.length,
    inputTokens,
    outputTokens,
    estimatedUsd: computeCostUsd(modelName, inputTokens, outputTokens),
  };
}

// ============================================================================
// GOVERNOR
// ============================================================================

export interface BudgetAlert {
  runId: string;
  reason: HaltReason;
  stage: OracleTask;
  message: string;
  ledger: CostSummary;
}

export interface CostGovernorHooks {
  onWarning: (warning: RunWarning) => void;
  onBudgetAlert?: (alert: BudgetAlert) => void;
}

/**
 * Stateful wrapper around one run's ledger. The only mutable state shared
 * across batches.
 */
export class CostGovernor {
  readonly ledger: CostLedger;

  constructor(
    runId: string,
    private readonly limits: CostLimits,
    private readonly hooks: CostGovernorHooks,
  ) {
    this.ledger = createCostLedger(runId);
  }

  isHalted(): boolean {
    return this.ledger.haltReason !== null;
  }

  /**
   * Admit or refuse a projected call. Admitted projections count toward
   * `estimatedUsd` immediately; a refusal halts non-synthesis work.
   */
  admit(stage: OracleTask, projection: CostProjection): AdmissionDecision {
    const decision = checkAdmission(this.ledger, this.limits, stage, projection.usd);

    if (decision.admitted) {
      this.ledger.estimatedUsd += projection.usd;
      stageTotals(this.ledger, stage).estimatedUsd += projection.usd;
      return decision;
    }

    if (!this.ledger.haltReason || stage === "synthesis") {
      this.halt("budget_exceeded", stage, decision.reason);
    }
    return decision;
  }

  /** Record a finished call. Returns its actual cost. */
  recordUsage(stage: OracleTask, modelName: string, tokensIn: number, tokensOut: number): number {
    const actualUsd = computeCostUsd(modelName, tokensIn, tokensOut);
    const totals = stageTotals(this.ledger, stage);

    this.ledger.calls++;
    this.ledger.tokensIn += tokensIn;
    this.ledger.tokensOut += tokensOut;
    this.ledger.actualUsd += actualUsd;
    totals.calls++;
    totals.tokensIn += tokensIn;
    totals.tokensOut += tokensOut;
    totals.actualUsd += actualUsd;

    if (!this.ledger.costWarningIssued && this.ledger.actualUsd >= this.limits.warningThresholdUsd) {
      this.ledger.costWarningIssued = true;
      console.warn(
        `[CostGovernor] Run ${this.ledger.runId} crossed warning threshold: $${this.ledger.actualUsd.toFixed(4)}`,
      );
      this.hooks.onWarning({
        type: "cost_warning",
        severity: "warning",
        message: `Run cost $${this.ledger.actualUsd.toFixed(4)} crossed warning threshold $${this.limits.warningThresholdUsd.toFixed(2)}`,
        details: { actualUsd: this.ledger.actualUsd, thresholdUsd: this.limits.warningThresholdUsd },
      });
    }

    return actualUsd;
  }

  /** A failed attempt counts as a call but adds no tokens. */
  recordFailedCall(stage: OracleTask): void {
    this.ledger.calls++;
    stageTotals(this.ledger, stage).calls++;
  }

  /**
   * Stop all further non-synthesis work. Only the first halt reason sticks.
   */
  halt(reason: HaltReason, stage: OracleTask, message: string): void {
    const first = this.ledger.haltReason === null;
    if (first) this.ledger.haltReason = reason;
    if (!first && stage !== "synthesis") return;

    console.error(`[CostGovernor] ${reason} at ${stage}: ${message}`);
    this.hooks.onWarning({
      type: reason,
      severity: "error",
      message: `${reason === "budget_exceeded" ? "Budget exceeded" : "Oracle quota exceeded"} during ${stage}: ${message}`,
      details: { stage, estimatedUsd: this.ledger.estimatedUsd, actualUsd: this.ledger.actualUsd },
    });
    this.hooks.onBudgetAlert?.({
      runId: this.ledger.runId,
      reason,
      stage,
      message,
      ledger: summarizeLedger(this.ledger),
    });
  }

  /**
   * Preflight estimate for the accepted articles. Over the warning
   * threshold only warns; admission still governs every call.
   */
  preflight(articles: Article[], modelName: string): PreflightEstimate {
    const estimate = estimateRunCost(articles, modelName);
    console.log(
      `[CostGovernor] Preflight: ${estimate.articles} articles, ~${estimate.inputTokens} in / ~${estimate.outputTokens} out tokens, ~$${estimate.estimatedUsd.toFixed(4)}`,
    );
    if (estimate.estimatedUsd > this.limits.warningThresholdUsd) {
      this.hooks.onWarning({
        type: "cost_warning",
        severity: "warning",
        message: `Preflight estimate $${estimate.estimatedUsd.toFixed(4)} exceeds warning threshold $${this.limits.warningThresholdUsd.toFixed(2)}`,
        details: { ...estimate, preflight: true },
      });
    }
    return estimate;
  }

  summary(): CostSummary {
    return summarizeLedger(this.ledger);
  }
}
