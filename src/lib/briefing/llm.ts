/**
 * LLM provider and model selection
 *
 * Resolves the provider and model for each oracle task from the briefing
 * config: one model for everything by default, task-tiered models (with
 * per-task overrides) when tiering is on.
 *
 * @module briefing/llm
 */

import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { mistral } from "@ai-sdk/mistral";
import type { LanguageModel } from "ai";
import type { BriefingConfig, LLMProvider } from "../config-schemas";
import type { OracleTask } from "./oracle";

// ============================================================================
// MODEL SELECTION
// ============================================================================

export interface ModelInfo {
  provider: LLMProvider;
  modelName: string;
  model: LanguageModel;
}

type ModelSelectionConfig = Pick<
  BriefingConfig,
  | "llmProvider"
  | "llmTiering"
  | "modelExtraction"
  | "modelTopicNormalization"
  | "modelContestation"
  | "modelSynthesis"
>;

export function normalizeProvider(raw: string): LLMProvider {
  const p = (raw || "").toLowerCase().trim();
  if (p === "anthropic" || p === "claude") return "anthropic";
  if (p === "google" || p === "gemini") return "google";
  if (p === "mistral") return "mistral";
  return "openai";
}

function detectProviderFromModelName(modelName: string): LLMProvider | null {
  const name = (modelName || "").toLowerCase();
  if (name.includes("claude")) return "anthropic";
  if (name.includes("gemini")) return "google";
  if (name.includes("mistral")) return "mistral";
  if (name.includes("gpt")) return "openai";
  return null;
}

function modelOverrideForTask(task: OracleTask, config: ModelSelectionConfig): string | null {
  switch (task) {
    case "extraction":
      return config.modelExtraction;
    case "topic_normalization":
      return config.modelTopicNormalization;
    case "contestation":
      return config.modelContestation;
    case "synthesis":
      return config.modelSynthesis;
    case "publisher_resolution":
      return null;
  }
}

/** Judgement-heavy tasks get the stronger model when tiering. */
function isPremiumTask(task: OracleTask): boolean {
  return task === "contestation" || task === "synthesis";
}

function premiumModelName(provider: LLMProvider): string {
  switch (provider) {
    case "anthropic":
      return "claude-sonnet-4-20250514";
    case "google":
      return "gemini-1.5-pro";
    case "mistral":
      return "mistral-large-latest";
    case "openai":
      return "gpt-4o";
  }
}

function budgetModelName(provider: LLMProvider): string {
  switch (provider) {
    case "anthropic":
      return "claude-3-5-haiku-20241022";
    case "google":
      return "gemini-1.5-flash";
    case "mistral":
      return "mistral-small-latest";
    case "openai":
      return "gpt-4o-mini";
  }
}

export function defaultModelNameForTask(provider: LLMProvider, task: OracleTask): string {
  return isPremiumTask(task) ? premiumModelName(provider) : budgetModelName(provider);
}

/**
 * Resolve the model name for a task without constructing a provider model.
 *
 * Tiering off: a single premium model for every task.
 * Tiering on: per-task override if it belongs to the configured provider,
 * otherwise the task-tier default.
 */
export function resolveModelNameForTask(task: OracleTask, config: ModelSelectionConfig): string {
  const provider = normalizeProvider(config.llmProvider);
  if (!config.llmTiering) {
    return premiumModelName(provider);
  }

  const overrideName = modelOverrideForTask(task, config);
  if (overrideName) {
    const inferredProvider = detectProviderFromModelName(overrideName);
    if (inferredProvider && inferredProvider !== provider) {
      console.warn(
        `[LLM] Ignoring model override "${overrideName}" for task "${task}" because provider is "${provider}"`,
      );
    } else {
      return overrideName;
    }
  }
  return defaultModelNameForTask(provider, task);
}

function buildModelInfo(provider: LLMProvider, modelName: string): ModelInfo {
  if (provider === "anthropic") {
    return { provider, modelName, model: anthropic(modelName) };
  }
  if (provider === "google") {
    return { provider, modelName, model: google(modelName) };
  }
  if (provider === "mistral") {
    return { provider, modelName, model: mistral(modelName) };
  }
  return { provider: "openai", modelName, model: openai(modelName) };
}

/**
 * Get the LLM model for an oracle task.
 */
export function getModelForTask(task: OracleTask, config: ModelSelectionConfig): ModelInfo {
  const provider = normalizeProvider(config.llmProvider);
  return buildModelInfo(provider, resolveModelNameForTask(task, config));
}
