/**
 * Synthesizer
 *
 * Turns verified claims into the editorial briefing draft, then filters the
 * oracle's key points against the publishers that actually supplied claims.
 * A key point with no citations, or with any unresolved citation, is
 * dropped rather than retried.
 *
 * @module briefing/synthesizer
 */

import type { BriefingConfig } from "../config-schemas";
import { BriefingRunError, BudgetExceededError } from "./errors";
import type { OracleClient } from "./oracle";
import {
  SYNTHESIZE_BRIEFING_SYSTEM_PROMPT,
  getSynthesizeBriefingPrompt,
} from "./prompts/synthesize-briefing";
import { SynthesisOutputSchema, type SynthesisOutput } from "./schemas";
import type { Article, BriefingDraft, Claim, KeyPoint, RunWarning } from "./types";
import { buildTopicViews, publisherIndex } from "./verifier";

// ============================================================================
// TYPES
// ============================================================================

export interface UnresolvedCitation {
  keyPoint: string;
  citations: string[];
  unresolved: string[];
}

export interface SynthesisResult {
  draft: BriefingDraft;
  dropped: UnresolvedCitation[];
}

export interface SynthesizerOptions {
  oracle: OracleClient;
  config: Pick<BriefingConfig, "maxKeyPoints" | "reviewerFocus" | "maxOutputTokens">;
  onWarning: (warning: RunWarning) => void;
  signal?: AbortSignal;
}

// ============================================================================
// PROMPT LINES
// ============================================================================

export function formatClaimLine(claim: Claim, publisher: string): string {
  return `- [${claim.topic}] (${claim.confidence}) ${claim.text} [Sources: ${publisher}]`;
}

// ============================================================================
// CITATION FILTER
// ============================================================================

function citationKey(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * Keep key points whose every citation names a known publisher. Citations
 * are rewritten to the canonical spelling and de-duplicated; the result is
 * cut to `maxKeyPoints`.
 */
export function filterKeyPoints(
  keyPoints: KeyPoint[],
  knownPublishers: string[],
  maxKeyPoints: number,
): { keyPoints: KeyPoint[]; dropped: UnresolvedCitation[] } {
  const canonical = new Map<string, string>();
  for (const publisher of knownPublishers) {
    const key = citationKey(publisher);
    if (key && !canonical.has(key)) canonical.set(key, publisher.trim());
  }

  const kept: KeyPoint[] = [];
  const dropped: UnresolvedCitation[] = [];

  for (const point of keyPoints) {
    const unresolved = point.citations.filter((c) => !canonical.has(citationKey(c)));
    if (point.citations.length === 0 || unresolved.length > 0) {
      dropped.push({ keyPoint: point.text, citations: point.citations, unresolved });
      continue;
    }
    const citations: string[] = [];
    for (const c of point.citations) {
      const name = canonical.get(citationKey(c));
      if (name !== undefined && !citations.includes(name)) citations.push(name);
    }
    kept.push({ text: point.text.trim(), citations });
  }

  return { keyPoints: kept.slice(0, maxKeyPoints), dropped };
}

// ============================================================================
// SYNTHESIS
// ============================================================================

export async function synthesizeBriefing(
  claims: Claim[],
  articles: Article[],
  options: SynthesizerOptions,
): Promise<SynthesisResult> {
  const { oracle, config, onWarning, signal } = options;

  if (claims.length === 0) {
    throw new BriefingRunError("no_claims", "No claims to brief");
  }

  const publishers = publisherIndex(articles);
  const views = buildTopicViews(claims, publishers);
  const claimLines = views.flatMap((view) =>
    view.claims.map((c) => formatClaimLine(c, publishers.get(c.articleId) ?? "Unknown")),
  );
  const knownPublishers = [...new Set(views.flatMap((v) => v.publishers))];

  let output: SynthesisOutput;
  try {
    const completion = await oracle.complete({
      task: "synthesis",
      system: SYNTHESIZE_BRIEFING_SYSTEM_PROMPT,
      prompt: getSynthesizeBriefingPrompt({
        claimLines,
        maxKeyPoints: config.maxKeyPoints,
        reviewerFocus: config.reviewerFocus,
      }),
      schema: SynthesisOutputSchema,
      maxOutputTokens: config.maxOutputTokens.synthesis,
      signal,
    });
    output = completion.output;
  } catch (err) {
    if (err instanceof BudgetExceededError) {
      throw new BriefingRunError("budget_exceeded", `Synthesis not admitted: ${err.message}`, err);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new BriefingRunError("synthesis_failed", `Synthesis failed: ${message}`, err);
  }

  const { keyPoints, dropped } = filterKeyPoints(output.keyPoints, knownPublishers, config.maxKeyPoints);
  for (const d of dropped) {
    console.warn(
      `[Synthesizer] Dropped key point with unresolved citation(s): ${d.unresolved.join(", ") || "(none cited)"}`,
    );
    onWarning({
      type: "unresolved_citation",
      severity: "info",
      message:
        d.unresolved.length > 0
          ? `Key point dropped: unresolved citation(s) ${d.unresolved.join(", ")}`
          : "Key point dropped: no citations",
      details: { keyPoint: d.keyPoint, citations: d.citations },
    });
  }

  console.log(`[Synthesizer] ${keyPoints.length} key point(s), ${dropped.length} dropped`);
  return {
    draft: { headline: output.headline.trim(), summary: output.summary.trim(), keyPoints },
    dropped,
  };
}
