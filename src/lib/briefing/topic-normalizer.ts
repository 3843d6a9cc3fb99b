/**
 * Topic normalizer
 *
 * Merges raw topic tags that name the same real-world topic into one
 * canonical tag. The mapping is closed before it is applied (every chain is
 * collapsed and every canonical tag maps to itself), so applying it twice
 * is the same as applying it once.
 *
 * @module briefing/topic-normalizer
 */

import type { BriefingConfig } from "../config-schemas";
import { chunk, runBatchesSequentially } from "./batching";
import { normalizeTopicTag } from "./claim-extractor";
import { BudgetExceededError } from "./errors";
import type { CostGovernor } from "./cost-governor";
import type { OracleClient } from "./oracle";
import { NORMALIZE_TOPICS_SYSTEM_PROMPT, getNormalizeTopicsPrompt } from "./prompts/normalize-topics";
import { TopicNormalizationOutputSchema } from "./schemas";
import type { Claim, RunWarning } from "./types";

export type TopicMapping = Record<string, string>;

export interface NormalizationResult {
  claims: Claim[];
  mapping: TopicMapping;
  /** Raw topics whose sub-batch failed or was skipped; kept as-is */
  failedTopics: string[];
}

export interface TopicNormalizerOptions {
  oracle: OracleClient;
  governor: CostGovernor;
  config: Pick<
    BriefingConfig,
    "skipTopicNormalization" | "topicNormalizationBatchSize" | "maxOutputTokens"
  >;
  onWarning: (warning: RunWarning) => void;
  signal?: AbortSignal;
}

// ============================================================================
// MAPPING CLOSURE
// ============================================================================

/**
 * Close a raw tag → canonical mapping over `tags`.
 *
 * Chains `a→b, b→c` resolve to `a→c`. A cycle resolves to its
 * lexicographically smallest member. Tags without an entry map to themselves.
 */
export function closeMapping(entries: Map<string, string>, tags: string[]): TopicMapping {
  const resolved = new Map<string, string>();

  const resolve = (start: string): string => {
    const path: string[] = [];
    const onPath = new Set<string>();
    let current = start;
    let canonical = start;

    for (;;) {
      const known = resolved.get(current);
      if (known !== undefined) {
        canonical = known;
        break;
      }
      if (onPath.has(current)) {
        const cycle = path.slice(path.indexOf(current));
        canonical = [...cycle].sort()[0];
        break;
      }
      path.push(current);
      onPath.add(current);
      const next = entries.get(current);
      if (next === undefined || next === current) {
        canonical = current;
        break;
      }
      current = next;
    }

    for (const node of path) resolved.set(node, canonical);
    return canonical;
  };

  const mapping: TopicMapping = {};
  for (const tag of tags) {
    const canonical = resolve(tag);
    mapping[tag] = canonical;
    mapping[canonical] = canonical;
  }
  return mapping;
}

export function applyMapping(claims: Claim[], mapping: TopicMapping): Claim[] {
  return claims.map((claim) => {
    if (claim.topicNormalized) return claim;
    return { ...claim, topic: mapping[claim.rawTopic] ?? claim.rawTopic, topicNormalized: true };
  });
}

// ============================================================================
// NORMALIZATION
// ============================================================================

export async function normalizeTopics(
  claims: Claim[],
  options: TopicNormalizerOptions,
): Promise<NormalizationResult> {
  const { oracle, governor, config, onWarning, signal } = options;

  if (config.skipTopicNormalization) {
    console.log("[Normalizer] Skipped by configuration");
    return { claims, mapping: {}, failedTopics: [] };
  }

  const tags = [
    ...new Set(claims.filter((c) => !c.topicNormalized).map((c) => c.rawTopic)),
  ].sort();

  if (tags.length < 2) {
    const mapping = closeMapping(new Map(), tags);
    return { claims: applyMapping(claims, mapping), mapping, failedTopics: [] };
  }

  const subBatches = chunk(tags, config.topicNormalizationBatchSize);
  console.log(`[Normalizer] ${tags.length} raw topics in ${subBatches.length} sub-batch(es)`);

  const outcomes = await runBatchesSequentially(
    subBatches,
    async (batch) => {
      const completion = await oracle.complete({
        task: "topic_normalization",
        system: NORMALIZE_TOPICS_SYSTEM_PROMPT,
        prompt: getNormalizeTopicsPrompt({ topics: batch }),
        schema: TopicNormalizationOutputSchema,
        maxOutputTokens: config.maxOutputTokens.topicNormalization,
        signal,
      });
      return completion.output.mappings;
    },
    {
      stopReason: () => (signal?.aborted ? "cancelled" : governor.ledger.haltReason),
      isFatal: (error) => (error instanceof BudgetExceededError ? "budget_exceeded" : null),
    },
  );

  const entries = new Map<string, string>();
  const mapped = new Set<string>();
  const failedTags: string[] = [];

  outcomes.forEach((outcome, index) => {
    const batch = subBatches[index];
    if (outcome.status !== "done") {
      failedTags.push(...batch);
      const reason =
        outcome.status === "failed"
          ? outcome.error instanceof Error
            ? outcome.error.message
            : String(outcome.error)
          : outcome.reason;
      if (reason === "cancelled") return;
      console.warn(`[Normalizer] Sub-batch ${index + 1} not normalized: ${reason}`);
      onWarning({
        type: "topic_normalization_failed",
        severity: "warning",
        message: `Topic sub-batch ${index + 1}/${subBatches.length} not normalized (${reason}); ${batch.length} topic(s) kept as-is`,
        details: { batch: index + 1, topics: batch },
      });
      return;
    }

    const batchTags = new Set(batch);
    for (const { rawTopic, canonicalTopic } of outcome.result) {
      const raw = normalizeTopicTag(rawTopic);
      const canonical = normalizeTopicTag(canonicalTopic);
      if (!batchTags.has(raw) || !canonical) continue;
      entries.set(raw, canonical);
      mapped.add(raw);
    }
  });

  const unmapped = tags.filter((t) => !mapped.has(t) && !failedTags.includes(t));
  if (unmapped.length > 0) {
    console.warn(`[Normalizer] ${unmapped.length} topic(s) missing from mapping; kept as-is`);
    onWarning({
      type: "topic_unmapped",
      severity: "info",
      message: `${unmapped.length} topic(s) missing from the normalization mapping; kept as-is`,
      details: { topics: unmapped },
    });
  }

  const mapping = closeMapping(entries, tags);
  const canonicalCount = new Set(tags.map((t) => mapping[t])).size;
  console.log(`[Normalizer] ${tags.length} raw topics → ${canonicalCount} canonical`);

  return { claims: applyMapping(claims, mapping), mapping, failedTopics: failedTags };
}
