/**
 * Configuration Schemas
 *
 * Zod schema, defaults and canonicalization for the briefing pipeline config.
 *
 * @module config-schemas
 */

import { z } from "zod";
import crypto from "crypto";

// ============================================================================
// TYPES
// ============================================================================

export const LLM_PROVIDERS = ["anthropic", "openai", "google", "mistral"] as const;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// ============================================================================
// BRIEFING CONFIG SCHEMA
// ============================================================================

const OutputTokenLimitsSchema = z.object({
  extraction: z.number().int().min(256).max(32000),
  topicNormalization: z.number().int().min(128).max(16000),
  contestation: z.number().int().min(64).max(8000),
  synthesis: z.number().int().min(256).max(16000),
  publisherResolution: z.number().int().min(16).max(1000),
});

const BriefingConfigObjectSchema = z.object({
  // Intake limits
  articleCap: z.number().int().min(1).max(5000),
  maxArticleChars: z.number().int().min(200).max(100_000),
  lookbackDays: z.number().int().min(1).max(365),

  // Batching
  extractionBatchSize: z.number().int().min(1).max(500),
  topicNormalizationBatchSize: z.number().int().min(2).max(2000),

  // Cost governor (USD)
  hardCostCeilingUsd: z.number().positive().max(1000),
  warningThresholdUsd: z.number().nonnegative().max(1000),
  synthesisReserveUsd: z.number().nonnegative().max(1000),

  // Editorial
  maxKeyPoints: z.number().int().min(1).max(50),
  skipTopicNormalization: z.boolean(),
  analyzerInstructions: z.string().max(4000),
  reviewerFocus: z.string().max(4000),

  // Oracle
  llmProvider: z.enum(LLM_PROVIDERS),
  llmTiering: z.boolean(),
  modelExtraction: z.string().nullable(),
  modelTopicNormalization: z.string().nullable(),
  modelContestation: z.string().nullable(),
  modelSynthesis: z.string().nullable(),
  oracleTimeoutMs: z.number().int().min(1000).max(600_000),
  maxRetries: z.number().int().min(0).max(10),
  retryBaseDelayMs: z.number().int().min(0).max(60_000),
  retryMaxDelayMs: z.number().int().min(0).max(600_000),
  maxOutputTokens: OutputTokenLimitsSchema,

  // Observability
  costLogPath: z.string().min(1),
});

export const BriefingConfigSchema = BriefingConfigObjectSchema
  .refine((c) => c.warningThresholdUsd <= c.hardCostCeilingUsd, {
    message: "warningThresholdUsd must not exceed hardCostCeilingUsd",
    path: ["warningThresholdUsd"],
  })
  .refine((c) => c.synthesisReserveUsd < c.hardCostCeilingUsd, {
    message: "synthesisReserveUsd must be below hardCostCeilingUsd",
    path: ["synthesisReserveUsd"],
  });

/** Shape accepted from config files: any subset of fields, merged over defaults. */
export const PartialBriefingConfigSchema = BriefingConfigObjectSchema.partial().extend({
  maxOutputTokens: OutputTokenLimitsSchema.partial().optional(),
});

export type BriefingConfig = z.infer<typeof BriefingConfigSchema>;
export type PartialBriefingConfig = z.infer<typeof PartialBriefingConfigSchema>;
export type OutputTokenLimits = z.infer<typeof OutputTokenLimitsSchema>;

export const DEFAULT_BRIEFING_CONFIG: BriefingConfig = {
  articleCap: 200,
  maxArticleChars: 10_000,
  lookbackDays: 7,

  extractionBatchSize: 50,
  topicNormalizationBatchSize: 200,

  hardCostCeilingUsd: 1.0,
  warningThresholdUsd: 0.5,
  synthesisReserveUsd: 0.05,

  maxKeyPoints: 10,
  skipTopicNormalization: false,
  analyzerInstructions:
    "Focus on concrete technical developments, product releases, and policy changes.",
  reviewerFocus: "Prioritize highly relevant AI developments.",

  llmProvider: "openai",
  llmTiering: false,
  modelExtraction: null,
  modelTopicNormalization: null,
  modelContestation: null,
  modelSynthesis: null,
  oracleTimeoutMs: 60_000,
  maxRetries: 3,
  retryBaseDelayMs: 1_000,
  retryMaxDelayMs: 16_000,
  maxOutputTokens: {
    extraction: 8_000,
    topicNormalization: 4_000,
    contestation: 600,
    synthesis: 2_500,
    publisherResolution: 50,
  },

  costLogPath: "logs/costs.jsonl",
};

// ============================================================================
// CANONICALIZATION
// ============================================================================

/**
 * Serialize with sorted keys so equal configs hash equally.
 */
export function canonicalizeJson(obj: object): string {
  const sortKeys = (value: unknown): unknown => {
    if (Array.isArray(value)) return value.map(sortKeys);
    if (value && typeof value === "object") {
      const sorted: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[key] = sortKeys(entry);
      }
      return sorted;
    }
    return value;
  };
  return JSON.stringify(sortKeys(obj), null, 2);
}

export function computeContentHash(canonicalizedContent: string): string {
  return crypto.createHash("sha256").update(canonicalizedContent).digest("hex");
}

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Validate raw config JSON text without throwing.
 */
export function validateConfig(content: string): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    errors.push(`Failed to parse content: ${err instanceof Error ? err.message : String(err)}`);
    return { valid: false, errors, warnings };
  }

  const result = BriefingConfigSchema.safeParse(parsed);
  if (!result.success) {
    errors.push(...result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  } else if (result.data.warningThresholdUsd === 0) {
    warnings.push("warningThresholdUsd is 0: every run will raise a cost warning");
  }

  return { valid: errors.length === 0, errors, warnings };
}
