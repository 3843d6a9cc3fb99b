/**
 * Configuration Loader
 *
 * Loads the briefing config from a JSON file (partial files are merged over
 * the defaults), then resolves environment variable overrides.
 *
 * @module config-loader
 */

import fs from "fs";
import path from "path";
import {
  BriefingConfigSchema,
  DEFAULT_BRIEFING_CONFIG,
  PartialBriefingConfigSchema,
  canonicalizeJson,
  computeContentHash,
  type BriefingConfig,
} from "./config-schemas";

export type { BriefingConfig } from "./config-schemas";
export { DEFAULT_BRIEFING_CONFIG } from "./config-schemas";

// ============================================================================
// TYPES
// ============================================================================

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  value: unknown;
}

export interface ResolvedConfig {
  config: BriefingConfig;
  contentHash: string;
  overrides: OverrideRecord[];
  skippedOverrides: string[];
  fromDefault: boolean;
  sourcePath: string;
}

// ============================================================================
// ENVIRONMENT VARIABLE OVERRIDE MAPPING
// ============================================================================

type EnvMapping = { fieldPath: string; parser: (v: string) => unknown };

const parseIntValue = (v: string) => parseInt(v, 10);
const parseFloatValue = (v: string) => parseFloat(v);
const parseBool = (v: string) => v === "true" || v === "1";

const BRIEFING_ENV_MAP: Record<string, EnvMapping> = {
  BRIEFING_ARTICLE_CAP: { fieldPath: "articleCap", parser: parseIntValue },
  BRIEFING_MAX_ARTICLE_CHARS: { fieldPath: "maxArticleChars", parser: parseIntValue },
  BRIEFING_LOOKBACK_DAYS: { fieldPath: "lookbackDays", parser: parseIntValue },
  BRIEFING_EXTRACTION_BATCH_SIZE: { fieldPath: "extractionBatchSize", parser: parseIntValue },
  BRIEFING_HARD_COST_CEILING_USD: { fieldPath: "hardCostCeilingUsd", parser: parseFloatValue },
  BRIEFING_WARNING_THRESHOLD_USD: { fieldPath: "warningThresholdUsd", parser: parseFloatValue },
  BRIEFING_MAX_KEY_POINTS: { fieldPath: "maxKeyPoints", parser: parseIntValue },
  BRIEFING_SKIP_NORMALIZATION: { fieldPath: "skipTopicNormalization", parser: parseBool },
  BRIEFING_ANALYZER_INSTRUCTIONS: { fieldPath: "analyzerInstructions", parser: (v) => v },
  BRIEFING_REVIEWER_FOCUS: { fieldPath: "reviewerFocus", parser: (v) => v },
  BRIEFING_LLM_PROVIDER: { fieldPath: "llmProvider", parser: (v) => v.toLowerCase().trim() },
  BRIEFING_LLM_TIERING: { fieldPath: "llmTiering", parser: parseBool },
  BRIEFING_ORACLE_TIMEOUT_MS: { fieldPath: "oracleTimeoutMs", parser: parseIntValue },
  BRIEFING_MAX_RETRIES: { fieldPath: "maxRetries", parser: parseIntValue },
  BRIEFING_COST_LOG_PATH: { fieldPath: "costLogPath", parser: (v) => v },
};

// ============================================================================
// OVERRIDE RESOLUTION
// ============================================================================

/**
 * Apply BRIEFING_* overrides one at a time, keeping an override only if the
 * config still validates with it applied.
 */
export function applyEnvOverrides(
  base: BriefingConfig,
  env: NodeJS.ProcessEnv = process.env,
): { result: BriefingConfig; overrides: OverrideRecord[]; skippedOverrides: string[] } {
  let result: BriefingConfig = structuredClone(base);
  const overrides: OverrideRecord[] = [];
  const skippedOverrides: string[] = [];

  for (const [envVar, mapping] of Object.entries(BRIEFING_ENV_MAP)) {
    const envValue = env[envVar];
    if (envValue === undefined || envValue === "") continue;

    const value = mapping.parser(envValue);
    const candidate = { ...structuredClone(result), [mapping.fieldPath]: value };
    const validated = BriefingConfigSchema.safeParse(candidate);
    if (!validated.success) {
      console.warn(
        `[Config] Ignoring ${envVar}=${JSON.stringify(envValue)}: ${validated.error.issues
          .map((i) => i.message)
          .join("; ")}`,
      );
      skippedOverrides.push(envVar);
      continue;
    }

    result = validated.data;
    overrides.push({ envVar, fieldPath: mapping.fieldPath, value });
  }

  return { result, overrides, skippedOverrides };
}

// ============================================================================
// LOADING
// ============================================================================

export function getDefaultConfigPath(): string {
  return process.env.BRIEFING_CONFIG_PATH || path.join("configs", "briefing.default.json");
}

/**
 * Load and validate the briefing config.
 *
 * Missing file → defaults. A file that fails validation throws: a run must
 * not silently proceed on a config other than the one the operator wrote.
 */
export function loadBriefingConfig(
  configPath: string = getDefaultConfigPath(),
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  const sourcePath = path.resolve(configPath);
  let base: BriefingConfig = DEFAULT_BRIEFING_CONFIG;
  let fromDefault = true;

  if (fs.existsSync(sourcePath)) {
    const raw: unknown = JSON.parse(fs.readFileSync(sourcePath, "utf-8"));
    const partial = PartialBriefingConfigSchema.safeParse(raw);
    if (!partial.success) {
      const errors = partial.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      throw new Error(`Config validation failed for ${sourcePath}: ${errors.join(", ")}`);
    }

    const merged = BriefingConfigSchema.safeParse({
      ...DEFAULT_BRIEFING_CONFIG,
      ...partial.data,
      maxOutputTokens: {
        ...DEFAULT_BRIEFING_CONFIG.maxOutputTokens,
        ...partial.data.maxOutputTokens,
      },
    });
    if (!merged.success) {
      const errors = merged.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      throw new Error(`Config validation failed for ${sourcePath}: ${errors.join(", ")}`);
    }
    base = merged.data;
    fromDefault = false;
  } else {
    console.log(`[Config] No config at ${sourcePath}, using defaults.`);
  }

  const { result, overrides, skippedOverrides } = applyEnvOverrides(base, env);
  if (overrides.length > 0) {
    console.log(`[Config] Applied env overrides: ${overrides.map((o) => o.envVar).join(", ")}`);
  }

  return {
    config: result,
    contentHash: computeContentHash(canonicalizeJson(result)),
    overrides,
    skippedOverrides,
    fromDefault,
    sourcePath,
  };
}
