/**
 * Verifier: the confidence state machine
 *
 * Pass 1 (corroboration) is pure: a topic backed by two or more distinct
 * publishers upgrades its claims to `corroborated`.
 * Pass 2 (contestation) asks the oracle, one topic at a time, whether any of
 * the topic's claims contradict each other. Verdicts are gathered first and
 * applied by a pure function; implicated claims become `contested`.
 *
 * Precedence: contested > corroborated > original label. Confidence never
 * moves down. A failed or skipped topic keeps its pass-1 result.
 *
 * @module briefing/verifier
 */

import type { BriefingConfig } from "../config-schemas";
import { transitionClaim } from "./confidence";
import type { CostGovernor } from "./cost-governor";
import { BudgetExceededError } from "./errors";
import type { OracleClient } from "./oracle";
import {
  DETECT_CONTESTATION_SYSTEM_PROMPT,
  getDetectContestationPrompt,
} from "./prompts/detect-contestation";
import { ContestationOutputSchema } from "./schemas";
import type { Article, Claim, RunWarning, TopicView } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface ContestationVerdict {
  topic: string;
  contested: boolean;
  contestedClaimIds: string[];
  rationale: string;
}

export interface VerificationResult {
  claims: Claim[];
  topics: TopicView[];
  verdicts: ContestationVerdict[];
  /** Topics that needed a contestation check but did not get one */
  uncheckedTopics: string[];
}

export interface VerifierOptions {
  oracle: OracleClient;
  governor: CostGovernor;
  config: Pick<BriefingConfig, "maxOutputTokens">;
  onWarning: (warning: RunWarning) => void;
  signal?: AbortSignal;
}

export type PublisherLookup = ReadonlyMap<string, string>;

export function publisherIndex(articles: Article[]): PublisherLookup {
  return new Map(articles.map((a) => [a.id, a.publisher]));
}

// ============================================================================
// TOPIC VIEWS
// ============================================================================

/**
 * Group claims by canonical topic. Views are sorted by topic id; claims keep
 * their input order. Publisher names are compared case-insensitively.
 */
export function buildTopicViews(claims: Claim[], publishers: PublisherLookup): TopicView[] {
  const byTopic = new Map<string, { claims: Claim[]; publishers: Map<string, string> }>();

  for (const claim of claims) {
    let view = byTopic.get(claim.topic);
    if (!view) {
      view = { claims: [], publishers: new Map() };
      byTopic.set(claim.topic, view);
    }
    view.claims.push(claim);
    const publisher = publishers.get(claim.articleId);
    if (publisher) {
      const key = publisher.trim().toLowerCase();
      if (!view.publishers.has(key)) view.publishers.set(key, publisher.trim());
    }
  }

  return [...byTopic.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([id, view]) => ({ id, claims: view.claims, publishers: [...view.publishers.values()] }));
}

// ============================================================================
// PASS 1: CORROBORATION
// ============================================================================

export function applyCorroboration(claims: Claim[], publishers: PublisherLookup): Claim[] {
  const views = buildTopicViews(claims, publishers);
  const corroborating = new Map<string, string[]>();
  for (const view of views) {
    if (view.publishers.length >= 2) corroborating.set(view.id, view.publishers);
  }

  return claims.map((claim) => {
    const sources = corroborating.get(claim.topic);
    if (!sources) return claim;
    return transitionClaim(
      claim,
      "corroborated",
      "corroboration",
      `${sources.length} independent publishers: ${sources.join(", ")}`,
    );
  });
}

// ============================================================================
// PASS 2: CONTESTATION
// ============================================================================

/**
 * Apply gathered verdicts. `contested: true` with no recognised ids
 * implicates every claim in the topic; unknown ids are reported, not applied.
 */
export function applyContestation(
  claims: Claim[],
  verdicts: ContestationVerdict[],
): { claims: Claim[]; unknownIds: string[] } {
  const topicClaimIds = new Map<string, Set<string>>();
  for (const claim of claims) {
    let ids = topicClaimIds.get(claim.topic);
    if (!ids) {
      ids = new Set();
      topicClaimIds.set(claim.topic, ids);
    }
    ids.add(claim.id);
  }

  const implicated = new Map<string, string>();
  const unknownIds: string[] = [];

  for (const verdict of verdicts) {
    if (!verdict.contested) continue;
    const inTopic = topicClaimIds.get(verdict.topic) ?? new Set<string>();
    const recognised = verdict.contestedClaimIds.filter((id) => inTopic.has(id));
    unknownIds.push(...verdict.contestedClaimIds.filter((id) => !inTopic.has(id)));

    const targets = recognised.length > 0 ? recognised : [...inTopic];
    const reason = verdict.rationale.trim() || "Contradicted by another source";
    for (const id of targets) implicated.set(id, reason);
  }

  return {
    claims: claims.map((claim) => {
      const reason = implicated.get(claim.id);
      return reason === undefined ? claim : transitionClaim(claim, "contested", "contestation", reason);
    }),
    unknownIds,
  };
}

/**
 * Ask the oracle about each topic with two or more claims, one topic at a
 * time. Failures and budget stops become warnings; the topic stays unchecked.
 */
export async function gatherContestationVerdicts(
  views: TopicView[],
  publishers: PublisherLookup,
  options: VerifierOptions,
): Promise<{ verdicts: ContestationVerdict[]; uncheckedTopics: string[] }> {
  const { oracle, governor, config, onWarning, signal } = options;
  const candidates = views.filter((v) => v.claims.length >= 2);
  const verdicts: ContestationVerdict[] = [];
  const uncheckedTopics: string[] = [];
  let stopReason: string | null = null;

  for (const view of candidates) {
    stopReason ??= signal?.aborted ? "cancelled" : governor.ledger.haltReason;
    if (stopReason) {
      uncheckedTopics.push(view.id);
      if (stopReason !== "cancelled") {
        onWarning({
          type: "contestation_skipped",
          severity: "warning",
          message: `Contestation check skipped for topic "${view.id}" (${stopReason})`,
          details: { topic: view.id, claimIds: view.claims.map((c) => c.id), reason: stopReason },
        });
      }
      continue;
    }

    try {
      const completion = await oracle.complete({
        task: "contestation",
        system: DETECT_CONTESTATION_SYSTEM_PROMPT,
        prompt: getDetectContestationPrompt({
          topic: view.id,
          claims: view.claims.map((c) => ({
            id: c.id,
            text: c.text,
            publisher: publishers.get(c.articleId) ?? "Unknown",
          })),
        }),
        schema: ContestationOutputSchema,
        maxOutputTokens: config.maxOutputTokens.contestation,
        signal,
      });
      verdicts.push({ topic: view.id, ...completion.output });
    } catch (err) {
      uncheckedTopics.push(view.id);
      if (err instanceof BudgetExceededError) {
        stopReason = "budget_exceeded";
        onWarning({
          type: "contestation_skipped",
          severity: "warning",
          message: `Contestation check skipped for topic "${view.id}" (budget_exceeded)`,
          details: { topic: view.id, claimIds: view.claims.map((c) => c.id), reason: stopReason },
        });
        continue;
      }
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Verifier] Contestation failed for topic "${view.id}": ${message}`);
      onWarning({
        type: "contestation_failed",
        severity: "warning",
        message: `Contestation check failed for topic "${view.id}"; corroboration result kept`,
        details: { topic: view.id, error: message },
      });
    }
  }

  return { verdicts, uncheckedTopics };
}

// ============================================================================
// VERIFICATION
// ============================================================================

export async function verifyClaims(
  claims: Claim[],
  articles: Article[],
  options: VerifierOptions,
): Promise<VerificationResult> {
  const publishers = publisherIndex(articles);

  const corroborated = applyCorroboration(claims, publishers);
  const upgraded = corroborated.filter((c, i) => c !== claims[i]).length;
  console.log(`[Verifier] Corroboration: ${upgraded} claim(s) upgraded`);

  const views = buildTopicViews(corroborated, publishers);
  const { verdicts, uncheckedTopics } = await gatherContestationVerdicts(views, publishers, options);

  const contested = applyContestation(corroborated, verdicts);
  if (contested.unknownIds.length > 0) {
    console.warn(
      `[Verifier] Ignored ${contested.unknownIds.length} unknown claim id(s): ${contested.unknownIds.join(", ")}`,
    );
  }
  const contestedCount = contested.claims.filter((c) => c.confidence === "contested").length;
  console.log(`[Verifier] Contestation: ${contestedCount} claim(s) contested`);

  return {
    claims: contested.claims,
    topics: buildTopicViews(contested.claims, publishers),
    verdicts,
    uncheckedTopics,
  };
}
