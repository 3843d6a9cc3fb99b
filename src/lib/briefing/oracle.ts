/**
 * Oracle boundary
 *
 * The narrow interface every stage talks to. An oracle call names its task,
 * carries a zod schema, and either returns output that satisfies the schema
 * or fails with an OracleError.
 *
 * @module briefing/oracle
 */

import type { z } from "zod";
import { OracleError } from "./errors";

// ============================================================================
// TYPES
// ============================================================================

export const ORACLE_TASKS = [
  "extraction",
  "topic_normalization",
  "contestation",
  "synthesis",
  "publisher_resolution",
] as const;

export type OracleTask = (typeof ORACLE_TASKS)[number];

export interface OracleRequest<T> {
  task: OracleTask;
  system: string;
  prompt: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Output ceiling; also the output side of the cost projection */
  maxOutputTokens: number;
  signal?: AbortSignal;
}

export interface OracleCompletion<T> {
  output: T;
  tokensIn: number;
  tokensOut: number;
  modelName: string;
}

export interface OracleClient {
  complete<T>(request: OracleRequest<T>): Promise<OracleCompletion<T>>;
  /** Model the client would use for a task; drives cost projection. */
  modelNameFor(task: OracleTask): string;
}

// ============================================================================
// OUTPUT VALIDATION
// ============================================================================

/**
 * Re-validate raw oracle output against the request schema.
 * Anything that does not conform is a malformed response.
 */
export function validateOracleOutput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  if (raw === null || raw === undefined) {
    throw new OracleError("malformed", "Oracle returned no structured output");
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new OracleError("malformed", `Oracle output failed schema validation: ${issues}`, parsed.error);
  }
  return parsed.data;
}
