/**
 * Test fixtures: articles, claims and a config with no retry delays.
 *
 * @module test/helpers/fixtures
 */

import { DEFAULT_BRIEFING_CONFIG, type BriefingConfig } from "@/lib/config-schemas";
import type { Article, Claim, RunWarning } from "@/lib/briefing/types";

export const NOW = new Date("2026-03-10T12:00:00.000Z");

export function testConfig(overrides: Partial<BriefingConfig> = {}): BriefingConfig {
  return {
    ...DEFAULT_BRIEFING_CONFIG,
    retryBaseDelayMs: 0,
    retryMaxDelayMs: 0,
    ...overrides,
  };
}

export function makeArticle(id: string, publisher: string, overrides: Partial<Article> = {}): Article {
  return {
    id,
    publisher,
    category: "news",
    body: `Body of ${id}.`,
    publishedAt: "2026-03-09T08:00:00.000Z",
    ...overrides,
  };
}

export function makeClaim(id: string, topic: string, overrides: Partial<Claim> = {}): Claim {
  const articleId = id.split("#")[0];
  return {
    id,
    articleId,
    text: `Claim ${id}`,
    rawTopic: topic,
    topic,
    topicNormalized: false,
    initialConfidence: "reported",
    confidence: "reported",
    transitions: [],
    ...overrides,
  };
}

/** Collects warnings passed to an `onWarning` hook. */
export function warningSink(): { warnings: RunWarning[]; onWarning: (w: RunWarning) => void } {
  const warnings: RunWarning[] = [];
  return { warnings, onWarning: (w) => warnings.push(w) };
}
