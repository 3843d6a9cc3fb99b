/**
 * Article intake
 *
 * Applies the ingestion limits before any extraction spend: de-duplication,
 * lookback window, per-category minimum body length, article cap, publisher
 * resolution and body truncation.
 *
 * @module briefing/intake
 */

import type { BriefingConfig } from "../config-schemas";
import type { PublisherResolver } from "./publisher-resolver";
import type { Article, ArticleCategory, ArticleInput, RunWarning } from "./types";

// ============================================================================
// POLICY
// ============================================================================

export const MIN_BODY_CHARS: Record<ArticleCategory, number> = {
  news: 0,
  corporate_research: 200,
  analysis_newsletter: 200,
  frontier_lab: 100,
  policy_org: 200,
  press_release: 100,
};

export const TRUNCATION_SUFFIX = "\n\n[Article truncated for cost control]";

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// TYPES
// ============================================================================

export const DROP_REASONS = ["duplicate", "missing_publisher", "too_old", "too_short", "over_cap"] as const;
export type DropReason = (typeof DROP_REASONS)[number];

export interface IntakeResult {
  articles: Article[];
  received: number;
  dropped: Record<DropReason, number>;
  truncated: number;
}

export interface IntakeOptions {
  resolver?: PublisherResolver;
  onWarning: (warning: RunWarning) => void;
  now?: Date;
}

type IntakeConfig = Pick<BriefingConfig, "articleCap" | "maxArticleChars" | "lookbackDays">;

// ============================================================================
// HELPERS
// ============================================================================

export function truncateBody(body: string, maxChars: number): { body: string; truncated: boolean } {
  if (body.length <= maxChars) return { body, truncated: false };
  return { body: body.slice(0, maxChars) + TRUNCATION_SUFFIX, truncated: true };
}

/** Unparseable dates are kept. */
export function isWithinLookback(publishedAt: string, lookbackDays: number, now: Date): boolean {
  const published = Date.parse(publishedAt);
  if (Number.isNaN(published)) return true;
  return published >= now.getTime() - lookbackDays * DAY_MS;
}

export function meetsMinimumLength(input: Pick<ArticleInput, "body" | "category">): boolean {
  return input.body.trim().length >= MIN_BODY_CHARS[input.category];
}

// ============================================================================
// INTAKE
// ============================================================================

/**
 * Filter and normalize raw inputs into the run's articles.
 * Zero accepted articles is the caller's run-level failure.
 */
export async function prepareArticles(
  inputs: ArticleInput[],
  config: IntakeConfig,
  options: IntakeOptions,
): Promise<IntakeResult> {
  const now = options.now ?? new Date();
  const dropped: Record<DropReason, number> = {
    duplicate: 0,
    missing_publisher: 0,
    too_old: 0,
    too_short: 0,
    over_cap: 0,
  };
  const droppedIds: Record<DropReason, string[]> = {
    duplicate: [],
    missing_publisher: [],
    too_old: [],
    too_short: [],
    over_cap: [],
  };
  const drop = (reason: DropReason, id: string) => {
    dropped[reason]++;
    droppedIds[reason].push(id);
  };

  const seen = new Set<string>();
  const kept: ArticleInput[] = [];

  for (const input of inputs) {
    if (seen.has(input.id)) {
      drop("duplicate", input.id);
      continue;
    }
    seen.add(input.id);

    if (!input.publisher?.trim() && !input.senderIdentifier?.trim()) {
      drop("missing_publisher", input.id);
      continue;
    }
    if (!isWithinLookback(input.publishedAt, config.lookbackDays, now)) {
      drop("too_old", input.id);
      continue;
    }
    if (!meetsMinimumLength(input)) {
      drop("too_short", input.id);
      continue;
    }
    kept.push(input);
  }

  for (const input of kept.slice(config.articleCap)) {
    drop("over_cap", input.id);
  }
  const capped = kept.slice(0, config.articleCap);

  // One resolution at a time: each may cost an oracle call
  const articles: Article[] = [];
  for (const input of capped) {
    articles.push(await resolvePublisher(input, options));
  }

  let truncated = 0;
  const accepted = articles.map((article) => {
    const result = truncateBody(article.body, config.maxArticleChars);
    if (result.truncated) truncated++;
    return result.truncated ? { ...article, body: result.body } : article;
  });

  for (const reason of DROP_REASONS) {
    if (dropped[reason] === 0) continue;
    console.log(`[Intake] Dropped ${dropped[reason]} article(s): ${reason}`);
    options.onWarning({
      type: "article_dropped",
      severity: reason === "over_cap" ? "warning" : "info",
      message: `${dropped[reason]} article(s) dropped at intake (${reason})`,
      details: { reason, articleIds: droppedIds[reason] },
    });
  }
  if (truncated > 0) {
    console.log(`[Intake] Truncated ${truncated} article(s) to ${config.maxArticleChars} chars`);
  }

  return { articles: accepted, received: inputs.length, dropped, truncated };
}

async function resolvePublisher(input: ArticleInput, options: IntakeOptions): Promise<Article> {
  const given = input.publisher?.trim();
  if (given) return { ...input, publisher: given };

  const identifier = input.senderIdentifier?.trim() ?? "";
  if (!options.resolver) {
    return { ...input, publisher: identifier };
  }

  const sample = [input.title, input.body].filter(Boolean).join("\n");
  const resolution = await options.resolver.resolve(identifier, sample);
  if (resolution.method === "fallback") {
    options.onWarning({
      type: "publisher_unresolved",
      severity: "info",
      message: `Publisher for ${resolution.cacheKey} not resolved; using "${resolution.publisher}"`,
      details: { articleId: input.id, identifier: resolution.cacheKey },
    });
  }
  return { ...input, publisher: resolution.publisher };
}
