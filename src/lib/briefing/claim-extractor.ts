/**
 * Claim extractor
 *
 * Splits articles into fixed batches and asks the oracle for the factual
 * claims in each, one batch at a time. A failed batch marks its articles
 * unprocessed and the run continues; a budget stop skips every remaining
 * batch.
 *
 * @module briefing/claim-extractor
 */

import type { BriefingConfig } from "../config-schemas";
import { chunk, runBatchesSequentially } from "./batching";
import type { CostGovernor } from "./cost-governor";
import { BudgetExceededError } from "./errors";
import type { OracleClient } from "./oracle";
import { EXTRACT_CLAIMS_SYSTEM_PROMPT, getExtractClaimsPrompt } from "./prompts/extract-claims";
import { ExtractionOutputSchema, type ExtractionOutput } from "./schemas";
import type { Article, Claim, RunWarning } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface ExtractionResult {
  claims: Claim[];
  unprocessedArticleIds: string[];
}

export interface ClaimExtractorOptions {
  oracle: OracleClient;
  governor: CostGovernor;
  config: Pick<BriefingConfig, "extractionBatchSize" | "analyzerInstructions" | "maxOutputTokens">;
  onWarning: (warning: RunWarning) => void;
  onBatchComplete?: (completed: number, total: number) => void;
  signal?: AbortSignal;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * "AI Chips / Export Rules" → "ai_chips_export_rules"
 */
export function normalizeTopicTag(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * Turn one batch's oracle output into claims. Claims for articles outside the
 * batch, or with empty text or topic, are dropped.
 */
export function buildClaimsFromOutput(
  output: ExtractionOutput,
  batch: Article[],
): { claims: Claim[]; dropped: Array<{ articleId: string; reason: string }> } {
  const batchIds = new Set(batch.map((a) => a.id));
  const counters = new Map<string, number>();
  const claims: Claim[] = [];
  const dropped: Array<{ articleId: string; reason: string }> = [];

  for (const raw of output.claims) {
    if (!batchIds.has(raw.articleId)) {
      dropped.push({ articleId: raw.articleId, reason: "unknown_article" });
      continue;
    }
    const text = raw.text.trim();
    const topic = normalizeTopicTag(raw.topic);
    if (!text || !topic) {
      dropped.push({ articleId: raw.articleId, reason: !text ? "empty_text" : "empty_topic" });
      continue;
    }

    const n = (counters.get(raw.articleId) ?? 0) + 1;
    counters.set(raw.articleId, n);
    claims.push({
      id: `${raw.articleId}#${n}`,
      articleId: raw.articleId,
      text,
      rawTopic: topic,
      topic,
      topicNormalized: false,
      initialConfidence: raw.confidence,
      confidence: raw.confidence,
      transitions: [],
    });
  }

  return { claims, dropped };
}

// ============================================================================
// EXTRACTION
// ============================================================================

export async function extractClaims(
  articles: Article[],
  options: ClaimExtractorOptions,
): Promise<ExtractionResult> {
  const { oracle, governor, config, onWarning, signal } = options;
  const batches = chunk(articles, config.extractionBatchSize);
  const totalBatches = batches.length;
  let completed = 0;

  console.log(`[Extractor] ${articles.length} articles in ${totalBatches} batch(es)`);

  const outcomes = await runBatchesSequentially(
    batches,
    async (batch, index) => {
      const completion = await oracle.complete({
        task: "extraction",
        system: EXTRACT_CLAIMS_SYSTEM_PROMPT,
        prompt: getExtractClaimsPrompt({
          articles: batch,
          batchNumber: index + 1,
          totalBatches,
          analyzerInstructions: config.analyzerInstructions,
        }),
        schema: ExtractionOutputSchema,
        maxOutputTokens: config.maxOutputTokens.extraction,
        signal,
      });
      completed++;
      options.onBatchComplete?.(completed, totalBatches);
      return buildClaimsFromOutput(completion.output, batch);
    },
    {
      stopReason: () => {
        if (signal?.aborted) return "cancelled";
        return governor.ledger.haltReason;
      },
      isFatal: (error) => (error instanceof BudgetExceededError ? "budget_exceeded" : null),
    },
  );

  const claims: Claim[] = [];
  const unprocessedArticleIds: string[] = [];

  outcomes.forEach((outcome, index) => {
    const batch = batches[index];
    const batchIds = batch.map((a) => a.id);

    if (outcome.status === "done") {
      claims.push(...outcome.result.claims);
      if (outcome.result.dropped.length > 0) {
        console.warn(`[Extractor] Batch ${index + 1}: dropped ${outcome.result.dropped.length} claim(s)`);
        onWarning({
          type: "claim_dropped",
          severity: "info",
          message: `Batch ${index + 1}: ${outcome.result.dropped.length} extracted claim(s) dropped`,
          details: { batch: index + 1, dropped: outcome.result.dropped },
        });
      }
      return;
    }

    unprocessedArticleIds.push(...batchIds);

    if (outcome.status === "failed") {
      const message = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
      console.error(`[Extractor] Batch ${index + 1}/${totalBatches} failed: ${message}`);
      onWarning({
        type: "extraction_batch_failed",
        severity: "warning",
        message: `Extraction batch ${index + 1}/${totalBatches} failed; ${batch.length} article(s) unprocessed`,
        details: { batch: index + 1, articleIds: batchIds, error: message },
      });
      return;
    }

    if (outcome.reason === "cancelled") return;
    console.warn(`[Extractor] Batch ${index + 1}/${totalBatches} skipped: ${outcome.reason}`);
    onWarning({
      type: "extraction_budget_exceeded",
      severity: "warning",
      message: `Extraction batch ${index + 1}/${totalBatches} skipped (${outcome.reason}); ${batch.length} article(s) unprocessed`,
      details: { batch: index + 1, articleIds: batchIds, reason: outcome.reason },
    });
  });

  console.log(
    `[Extractor] ${claims.length} claims; ${unprocessedArticleIds.length} article(s) unprocessed`,
  );
  return { claims, unprocessedArticleIds };
}
