/**
 * Error Classification Tests
 *
 * Tests that provider errors map onto the oracle error kinds that drive the
 * retry policy: transient, malformed or quota_exceeded.
 */

import { describe, it, expect } from "vitest";
import { APICallError } from "ai";
import { z } from "zod";
import { classifyOracleError, toOracleError } from "@/lib/error-classification";
import { OracleError } from "@/lib/briefing/errors";

function apiError(statusCode: number, message: string): APICallError {
  return new APICallError({
    message,
    url: "https://api.example.test/v1/chat",
    requestBodyValues: {},
    statusCode,
  });
}

describe("error-classification", () => {
  describe("status codes", () => {
    it("classifies 429 as a transient rate limit", () => {
      const result = classifyOracleError(apiError(429, "Too many requests"));
      expect(result.category).toBe("rate_limit");
      expect(result.kind).toBe("transient");
      expect(result.statusCode).toBe(429);
    });

    it("treats quota text on a 429 as quota exhaustion", () => {
      const result = classifyOracleError(apiError(429, "You exceeded your current quota"));
      expect(result.category).toBe("quota");
      expect(result.kind).toBe("quota_exceeded");
    });

    it("classifies 401 and 403 as auth, which is not retried", () => {
      expect(classifyOracleError(apiError(401, "Unauthorized")).kind).toBe("quota_exceeded");
      expect(classifyOracleError(apiError(403, "Forbidden")).category).toBe("auth");
    });

    it("classifies 5xx as transient", () => {
      const result = classifyOracleError(Object.assign(new Error("Bad gateway"), { status: 502 }));
      expect(result.category).toBe("rate_limit");
      expect(result.kind).toBe("transient");
      expect(result.statusCode).toBe(502);
    });

    it("classifies 402 as quota", () => {
      expect(classifyOracleError(Object.assign(new Error("Payment required"), { statusCode: 402 })).category).toBe(
        "quota",
      );
    });
  });

  describe("message patterns", () => {
    it("classifies timeouts and aborts as transient", () => {
      expect(classifyOracleError(new Error("Request timed out")).category).toBe("timeout");
      const abort = new Error("The operation was aborted");
      abort.name = "AbortError";
      expect(classifyOracleError(abort)).toMatchObject({ category: "timeout", kind: "transient" });
    });

    it("classifies connection failures as network", () => {
      expect(classifyOracleError(new Error("connect ECONNREFUSED 127.0.0.1:443")).category).toBe("network");
      expect(classifyOracleError(new Error("fetch failed")).kind).toBe("transient");
    });

    it("classifies invalid API keys as auth", () => {
      expect(classifyOracleError(new Error("Invalid API key provided")).category).toBe("auth");
    });

    it("classifies JSON and schema failures as malformed", () => {
      expect(classifyOracleError(new Error("Failed to parse JSON response")).kind).toBe("malformed");
      const zodError = z.object({ a: z.string() }).safeParse({}).error;
      expect(classifyOracleError(zodError).category).toBe("schema");
    });

    it("falls back to unknown, retried as transient", () => {
      const result = classifyOracleError("something odd");
      expect(result).toEqual({
        category: "unknown",
        kind: "transient",
        message: "something odd",
        statusCode: null,
      });
    });
  });

  describe("toOracleError", () => {
    it("returns an OracleError unchanged", () => {
      const err = new OracleError("malformed", "bad output");
      expect(toOracleError(err)).toBe(err);
      expect(classifyOracleError(err).category).toBe("schema");
    });

    it("wraps other errors with the category in the message and keeps the cause", () => {
      const cause = new Error("Rate limit reached for requests");
      const err = toOracleError(cause);
      expect(err).toBeInstanceOf(OracleError);
      expect(err.kind).toBe("transient");
      expect(err.message).toBe("rate_limit: Rate limit reached for requests");
      expect(err.cause).toBe(cause);
    });
  });
});
