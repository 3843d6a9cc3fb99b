/**
 * Briefing pipeline
 *
 * Runs one briefing end to end, strictly in order:
 *   intake → preflight → extraction → normalization → verification → synthesis
 *
 * Each stage consumes the full output of the previous one. Cancellation is
 * checked between stages. Every oracle call goes through one GovernedOracle
 * bound to the run's cost governor. The run summary is appended to the cost
 * log whether the run succeeds or fails.
 *
 * @module briefing/pipeline
 */

import { randomUUID } from "crypto";
import {
  canonicalizeJson,
  computeContentHash,
  type BriefingConfig,
} from "../config-schemas";
import { clearAbortSignal, isRunAborted } from "../run-abort";
import { extractClaims } from "./claim-extractor";
import { CostGovernor, type BudgetAlert, type CostLedger } from "./cost-governor";
import { JsonlCostLog, type CostLogSink, type RunSummaryRecord } from "./cost-log";
import { BriefingRunError } from "./errors";
import { GovernedOracle } from "./governed-oracle";
import { prepareArticles } from "./intake";
import type { OracleClient } from "./oracle";
import { InMemoryKeyValueStore, type KeyValueStore } from "./publisher-cache";
import { PublisherResolver } from "./publisher-resolver";
import { synthesizeBriefing } from "./synthesizer";
import { normalizeTopics } from "./topic-normalizer";
import type {
  ArticleInput,
  Briefing,
  Claim,
  Coverage,
  ProgressCallback,
  RunWarning,
} from "./types";
import { verifyClaims } from "./verifier";

// ============================================================================
// TYPES
// ============================================================================

export interface BriefingPipelineInput {
  runId?: string;
  articles: ArticleInput[];
  config: BriefingConfig;
  /** Defaults to the hash of `config` */
  configHash?: string;
  oracle: OracleClient;
  publisherStore?: KeyValueStore;
  costLog?: CostLogSink;
  onEvent?: ProgressCallback;
  onBudgetAlert?: (alert: BudgetAlert) => void;
  signal?: AbortSignal;
  now?: Date;
}

export interface BriefingPipelineResult {
  briefing: Briefing;
  claims: Claim[];
  ledger: CostLedger;
  warnings: RunWarning[];
}

// ============================================================================
// PIPELINE
// ============================================================================

export async function runBriefingPipeline(input: BriefingPipelineInput): Promise<BriefingPipelineResult> {
  const { config } = input;
  const runId = input.runId ?? `run_${randomUUID()}`;
  const onEvent = input.onEvent ?? (() => {});
  const now = input.now ?? new Date();
  const configHash = input.configHash ?? computeContentHash(canonicalizeJson(config));

  const warnings: RunWarning[] = [];
  const onWarning = (warning: RunWarning) => {
    warnings.push(warning);
  };

  // Internal controller so the abort registry can stop in-flight calls too
  const controller = new AbortController();
  const onExternalAbort = () => controller.abort();
  input.signal?.addEventListener("abort", onExternalAbort, { once: true });
  if (input.signal?.aborted) controller.abort();
  const signal = controller.signal;

  const isCancelled = () => {
    if (!signal.aborted && isRunAborted(runId)) controller.abort();
    return signal.aborted;
  };
  const checkAbortSignal = () => {
    if (isCancelled()) {
      throw new BriefingRunError("cancelled", `Run ${runId} was cancelled`);
    }
  };

  const governor = new CostGovernor(runId, config, { onWarning, onBudgetAlert: input.onBudgetAlert });
  const costLog = input.costLog ?? new JsonlCostLog(config.costLogPath);
  const oracle = new GovernedOracle(input.oracle, {
    runId,
    governor,
    costLog,
    timeoutMs: config.oracleTimeoutMs,
    maxRetries: config.maxRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
    retryMaxDelayMs: config.retryMaxDelayMs,
  });

  let outcome: RunSummaryRecord["outcome"] = "completed";
  console.log(`[Pipeline] Run ${runId} started with ${input.articles.length} input article(s)`);

  try {
    // ------------------------------------------------------------------
    // Intake
    // ------------------------------------------------------------------
    checkAbortSignal();
    onEvent("Preparing articles...", 5);
    const resolver = new PublisherResolver({
      oracle,
      store: input.publisherStore ?? new InMemoryKeyValueStore(),
      maxOutputTokens: config.maxOutputTokens.publisherResolution,
      signal,
    });
    const intake = await prepareArticles(input.articles, config, { resolver, onWarning, now });
    if (intake.articles.length === 0) {
      throw new BriefingRunError("no_articles", `No articles accepted out of ${intake.received}`);
    }
    const articles = intake.articles;

    // ------------------------------------------------------------------
    // Preflight
    // ------------------------------------------------------------------
    checkAbortSignal();
    onEvent(`Estimating cost for ${articles.length} articles...`, 10);
    governor.preflight(articles, oracle.modelNameFor("extraction"));

    // ------------------------------------------------------------------
    // Extraction
    // ------------------------------------------------------------------
    checkAbortSignal();
    onEvent("Extracting claims...", 15);
    const extraction = await extractClaims(articles, {
      oracle,
      governor,
      config,
      onWarning,
      signal,
      onBatchComplete: (done, total) =>
        onEvent(`Extracted batch ${done}/${total}`, 15 + Math.round((35 * done) / total)),
    });

    // ------------------------------------------------------------------
    // Topic normalization
    // ------------------------------------------------------------------
    checkAbortSignal();
    onEvent(`Normalizing topics for ${extraction.claims.length} claims...`, 50);
    const normalized = await normalizeTopics(extraction.claims, {
      oracle,
      governor,
      config,
      onWarning,
      signal,
    });

    // ------------------------------------------------------------------
    // Verification
    // ------------------------------------------------------------------
    checkAbortSignal();
    onEvent("Verifying claims across sources...", 65);
    const verification = await verifyClaims(normalized.claims, articles, {
      oracle,
      governor,
      config,
      onWarning,
      signal,
    });

    // ------------------------------------------------------------------
    // Synthesis
    // ------------------------------------------------------------------
    checkAbortSignal();
    onEvent("Synthesizing briefing...", 85);
    const synthesis = await synthesizeBriefing(verification.claims, articles, {
      oracle,
      config,
      onWarning,
      signal,
    });
    checkAbortSignal();

    const unprocessed = extraction.unprocessedArticleIds.length;
    const coverage: Coverage = {
      articlesReceived: intake.received,
      articlesProcessed: articles.length - unprocessed,
      articlesUnprocessed: unprocessed,
      complete:
        intake.dropped.over_cap === 0 &&
        unprocessed === 0 &&
        normalized.failedTopics.length === 0 &&
        verification.uncheckedTopics.length === 0 &&
        governor.ledger.haltReason === null,
    };

    const briefing: Briefing = {
      runId,
      ...synthesis.draft,
      generatedAt: new Date().toISOString(),
      coverage,
      costLedger: governor.summary(),
      configHash,
      warnings: [...warnings],
    };

    onEvent("Briefing complete", 100);
    console.log(
      `[Pipeline] Run ${runId} complete: ${briefing.keyPoints.length} key point(s), $${governor.ledger.actualUsd.toFixed(4)}, ${warnings.length} warning(s)`,
    );
    return { briefing, claims: verification.claims, ledger: governor.ledger, warnings };
  } catch (err) {
    const error =
      isCancelled() && !(err instanceof BriefingRunError && err.reason === "cancelled")
        ? new BriefingRunError("cancelled", `Run ${runId} was cancelled`, err)
        : err;
    outcome = error instanceof BriefingRunError ? error.reason : "error";
    console.error(
      `[Pipeline] Run ${runId} failed (${outcome}):`,
      error instanceof Error ? error.message : String(error),
    );
    throw error;
  } finally {
    input.signal?.removeEventListener("abort", onExternalAbort);
    clearAbortSignal(runId);
    const ledger = governor.ledger;
    await costLog.append({
      type: "run_summary",
      timestamp: new Date().toISOString(),
      runId,
      outcome,
      estimatedUsd: ledger.estimatedUsd,
      actualUsd: ledger.actualUsd,
      tokensIn: ledger.tokensIn,
      tokensOut: ledger.tokensOut,
      calls: ledger.calls,
      haltReason: ledger.haltReason,
      byStage: ledger.byStage,
    });
  }
}
