/**
 * Briefing pipeline types
 *
 * Data model shared by every stage: articles in, claims through the
 * confidence state machine, a briefing out.
 *
 * @module briefing/types
 */

// ============================================================================
// ARTICLES
// ============================================================================

export const ARTICLE_CATEGORIES = [
  "news",
  "corporate_research",
  "frontier_lab",
  "press_release",
  "policy_org",
  "analysis_newsletter",
] as const;

export type ArticleCategory = (typeof ARTICLE_CATEGORIES)[number];

export interface Article {
  id: string;
  /** Resolved publisher name, used for corroboration and citations */
  publisher: string;
  category: ArticleCategory;
  body: string;
  /** ISO timestamp */
  publishedAt: string;
  title?: string;
  url?: string;
  senderIdentifier?: string;
}

/** What the ingestion collaborator hands over. `publisher` may be resolved at intake. */
export interface ArticleInput extends Omit<Article, "publisher"> {
  publisher?: string;
}

// ============================================================================
// CLAIMS
// ============================================================================

/**
 * Ordered confidence labels. Index order is the precedence order:
 * speculative < inferred < reported < corroborated < contested.
 */
export const CONFIDENCE_LEVELS = [
  "speculative",
  "inferred",
  "reported",
  "corroborated",
  "contested",
] as const;

export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

/** Labels the extractor may assign. */
export const INITIAL_CONFIDENCE_LEVELS = ["reported", "inferred", "speculative"] as const;
export type InitialConfidence = (typeof INITIAL_CONFIDENCE_LEVELS)[number];

export type VerificationPass = "corroboration" | "contestation";

export interface ConfidenceTransition {
  from: ConfidenceLevel;
  to: ConfidenceLevel;
  pass: VerificationPass;
  reason: string;
}

export interface Claim {
  /** `<articleId>#<n>` */
  id: string;
  articleId: string;
  text: string;
  /** Topic tag as extracted */
  rawTopic: string;
  /** Canonical topic once normalized, else equal to rawTopic */
  topic: string;
  topicNormalized: boolean;
  initialConfidence: InitialConfidence;
  confidence: ConfidenceLevel;
  transitions: ConfidenceTransition[];
}

export interface TopicView {
  id: string;
  claims: Claim[];
  /** Distinct publishers contributing claims to this topic */
  publishers: string[];
}

// ============================================================================
// RUN STATE
// ============================================================================

export type WarningSeverity = "info" | "warning" | "error";

export type RunWarningType =
  | "article_dropped"
  | "publisher_unresolved"
  | "cost_warning"
  | "budget_exceeded"
  | "quota_exceeded"
  | "extraction_batch_failed"
  | "extraction_budget_exceeded"
  | "claim_dropped"
  | "topic_normalization_failed"
  | "topic_unmapped"
  | "contestation_failed"
  | "contestation_skipped"
  | "unresolved_citation";

export interface RunWarning {
  type: RunWarningType;
  severity: WarningSeverity;
  message: string;
  details?: Record<string, unknown>;
}

/** Progress callback, percent in [0, 100]. */
export type ProgressCallback = (message: string, percent: number) => void;

// ============================================================================
// BRIEFING
// ============================================================================

export interface KeyPoint {
  text: string;
  /** Plaintext publisher names, canonical spelling */
  citations: string[];
}

export interface BriefingDraft {
  headline: string;
  summary: string;
  keyPoints: KeyPoint[];
}

export interface Coverage {
  articlesReceived: number;
  articlesProcessed: number;
  articlesUnprocessed: number;
  complete: boolean;
}

export interface CostSummary {
  estimatedUsd: number;
  actualUsd: number;
  tokensIn: number;
  tokensOut: number;
  calls: number;
  haltReason: string | null;
}

export interface Briefing extends BriefingDraft {
  runId: string;
  generatedAt: string;
  coverage: Coverage;
  costLedger: CostSummary;
  configHash: string;
  warnings: RunWarning[];
}
