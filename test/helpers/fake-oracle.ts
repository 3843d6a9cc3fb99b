/**
 * Scripted in-process oracle for tests.
 *
 * Each task gets a handler that receives the call and returns raw output (or
 * throws). Output goes through the same schema validation as the real client.
 *
 * @module test/helpers/fake-oracle
 */

import { OracleError } from "@/lib/briefing/errors";
import {
  validateOracleOutput,
  type OracleClient,
  type OracleCompletion,
  type OracleRequest,
  type OracleTask,
} from "@/lib/briefing/oracle";

export interface FakeCall {
  task: OracleTask;
  system: string;
  prompt: string;
  maxOutputTokens: number;
  /** 0-based call count for this task */
  index: number;
}

export type FakeHandler = (call: FakeCall) => unknown;

export interface FakeOracleOptions {
  /** Not in the pricing table, so the fallback price applies */
  modelName?: string;
  tokensIn?: number;
  tokensOut?: number;
}

export class FakeOracle implements OracleClient {
  readonly calls: FakeCall[] = [];
  private readonly handlers: Partial<Record<OracleTask, FakeHandler>>;

  constructor(
    handlers: Partial<Record<OracleTask, FakeHandler>> = {},
    private readonly options: FakeOracleOptions = {},
  ) {
    this.handlers = { ...handlers };
  }

  on(task: OracleTask, handler: FakeHandler): this {
    this.handlers[task] = handler;
    return this;
  }

  callsFor(task: OracleTask): FakeCall[] {
    return this.calls.filter((c) => c.task === task);
  }

  modelNameFor(): string {
    return this.options.modelName ?? "fake-model";
  }

  async complete<T>(request: OracleRequest<T>): Promise<OracleCompletion<T>> {
    const call: FakeCall = {
      task: request.task,
      system: request.system,
      prompt: request.prompt,
      maxOutputTokens: request.maxOutputTokens,
      index: this.callsFor(request.task).length,
    };
    this.calls.push(call);

    const handler = this.handlers[request.task];
    if (!handler) {
      throw new OracleError("transient", `No fake handler for ${request.task}`);
    }
    const raw = await handler(call);

    return {
      output: validateOracleOutput(request.schema, raw),
      tokensIn: this.options.tokensIn ?? 1000,
      tokensOut: this.options.tokensOut ?? 100,
      modelName: this.modelNameFor(),
    };
  }
}

// ============================================================================
// PROMPT PARSING
// ============================================================================

/** Article ids from an extraction prompt: lines like `[id] (Publisher)`. */
export function articleIdsInPrompt(prompt: string): string[] {
  return [...prompt.matchAll(/^\[([^\]]+)\] \(/gm)].map((m) => m[1]);
}

/** Claim ids from a contestation prompt: lines like `- [id] text (Publisher)`. */
export function claimIdsInPrompt(prompt: string): string[] {
  return [...prompt.matchAll(/^- \[([^\]]+)\] /gm)].map((m) => m[1]);
}

/** Topic list from a normalization prompt. */
export function topicsInPrompt(prompt: string): string[] {
  const match = prompt.match(/## TOPIC IDS\n([\s\S]*?)\n\n## INSTRUCTIONS/);
  if (!match) return [];
  const parsed: unknown = JSON.parse(match[1]);
  return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === "string") : [];
}

/** Identity normalization: every topic maps to itself. */
export const identityNormalization: FakeHandler = (call) => ({
  mappings: topicsInPrompt(call.prompt).map((t) => ({ rawTopic: t, canonicalTopic: t })),
});

export const noContestation: FakeHandler = () => ({
  contested: false,
  contestedClaimIds: [],
  rationale: "No contradiction",
});
