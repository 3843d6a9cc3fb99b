/**
 * Error Classification
 *
 * Maps raw provider errors (AI SDK errors, HTTP failures, aborted calls) onto
 * the oracle error kinds the governed oracle acts on.
 *
 * @module error-classification
 */

import { APICallError, NoObjectGeneratedError } from "ai";
import { ZodError } from "zod";
import { OracleError, type OracleErrorKind } from "./briefing/errors";

export type ErrorCategory =
  | "rate_limit"
  | "quota"
  | "auth"
  | "timeout"
  | "network"
  | "schema"
  | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  kind: OracleErrorKind;
  message: string;
  statusCode: number | null;
};

const QUOTA_PATTERNS = [
  /insufficient[_\s]*quota/i,
  /quota\s*exceeded/i,
  /exceeded\s*your\s*current\s*quota/i,
  /billing/i,
  /credit\s*balance/i,
];

const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /capacity/i,
];

const AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /invalid.*key/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [/timeout/i, /timed?\s*out/i, /AbortError/i, /ETIMEDOUT/i];

const NETWORK_PATTERNS = [/ECONNRESET/i, /ECONNREFUSED/i, /ENOTFOUND/i, /EAI_AGAIN/i, /fetch failed/i, /socket hang up/i];

const SCHEMA_PATTERNS = [/no object generated/i, /json/i, /schema/i, /type validation/i];

const CATEGORY_KIND: Record<ErrorCategory, OracleErrorKind> = {
  rate_limit: "transient",
  quota: "quota_exceeded",
  auth: "quota_exceeded",
  timeout: "transient",
  network: "transient",
  schema: "malformed",
  unknown: "transient",
};

function classified(category: ErrorCategory, message: string, statusCode: number | null): ClassifiedError {
  return { category, kind: CATEGORY_KIND[category], message, statusCode };
}

function readStatusCode(error: unknown): number | null {
  if (APICallError.isInstance(error)) return error.statusCode ?? null;
  if (error && typeof error === "object") {
    const status = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
    if (typeof status === "number") return status;
  }
  return null;
}

/**
 * Classify an error thrown by a provider call.
 *
 * Order matters: an OracleError keeps its kind, structured SDK errors are
 * trusted over message text, and quota text wins over the generic 429 rule
 * because providers report exhausted quota with a 429.
 */
export function classifyOracleError(error: unknown): ClassifiedError {
  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";

  if (error instanceof OracleError) {
    const category: ErrorCategory =
      error.kind === "malformed" ? "schema" : error.kind === "quota_exceeded" ? "quota" : "unknown";
    return { category, kind: error.kind, message: msg, statusCode: null };
  }

  if (NoObjectGeneratedError.isInstance(error) || error instanceof ZodError) {
    return classified("schema", msg, null);
  }

  const statusCode = readStatusCode(error);

  if (QUOTA_PATTERNS.some((p) => p.test(msg))) {
    return classified("quota", msg, statusCode);
  }

  if (statusCode !== null) {
    if (statusCode === 401 || statusCode === 403) return classified("auth", msg, statusCode);
    if (statusCode === 402) return classified("quota", msg, statusCode);
    if (statusCode === 408) return classified("timeout", msg, statusCode);
    if (statusCode === 429 || statusCode === 529 || statusCode >= 500) {
      return classified("rate_limit", msg, statusCode);
    }
  }

  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return classified("timeout", msg, statusCode);
  }

  if (AUTH_PATTERNS.some((p) => p.test(msg))) {
    return classified("auth", msg, statusCode);
  }

  if (RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return classified("rate_limit", msg, statusCode);
  }

  if (NETWORK_PATTERNS.some((p) => p.test(msg))) {
    return classified("network", msg, statusCode);
  }

  if (SCHEMA_PATTERNS.some((p) => p.test(msg))) {
    return classified("schema", msg, statusCode);
  }

  return classified("unknown", msg, statusCode);
}

/**
 * Wrap any thrown value as an OracleError of the classified kind.
 */
export function toOracleError(error: unknown): OracleError {
  if (error instanceof OracleError) return error;
  const { kind, category, message } = classifyOracleError(error);
  return new OracleError(kind, `${category}: ${message}`, error);
}
