/**
 * Briefing Pipeline Tests
 *
 * End-to-end runs against the scripted oracle:
 * - Three publishers on one merged topic → corroborated
 * - A contradicting fourth source → every claim contested
 * - A failed extraction batch → briefing with a coverage gap
 * - Run-level failures (no articles, no claims, cancellation)
 * - Cost log records and the run summary
 *
 * @module briefing/pipeline.test
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { InMemoryCostLog } from "@/lib/briefing/cost-log";
import { OracleError } from "@/lib/briefing/errors";
import { runBriefingPipeline, type BriefingPipelineInput } from "@/lib/briefing/pipeline";
import { InMemoryKeyValueStore } from "@/lib/briefing/publisher-cache";
import type { ArticleInput } from "@/lib/briefing/types";
import { isRunAborted, setAbortSignal } from "@/lib/run-abort";
import {
  FakeOracle,
  articleIdsInPrompt,
  claimIdsInPrompt,
  identityNormalization,
  noContestation,
  type FakeHandler,
} from "@test/helpers/fake-oracle";
import { NOW, testConfig } from "@test/helpers/fixtures";

function input(id: string, publisher: string | undefined, overrides: Partial<ArticleInput> = {}): ArticleInput {
  return {
    id,
    publisher,
    category: "news",
    body: `Report ${id}`,
    publishedAt: "2026-03-09T08:00:00.000Z",
    ...overrides,
  };
}

/** Extraction handler: one claim per article, topic and text from the table. */
function extractFrom(table: Record<string, { topic: string; text: string }>): FakeHandler {
  return (call) => ({
    claims: articleIdsInPrompt(call.prompt).map((id) => ({
      articleId: id,
      text: table[id]?.text ?? `Fact from ${id}`,
      confidence: "reported",
      topic: table[id]?.topic ?? "misc",
    })),
  });
}

const GPT5_TABLE = {
  a1: { topic: "gpt5_release", text: "OpenAI released GPT-5 on Monday" },
  a2: { topic: "gpt5_launch", text: "GPT-5 launched this week" },
  a3: { topic: "openai_gpt5", text: "GPT-5 is now available to all users" },
  a4: { topic: "gpt5_delay", text: "GPT-5 has been delayed to next year" },
};

const mergeToRelease: FakeHandler = (call) => ({
  mappings: ["gpt5_delay", "gpt5_launch", "gpt5_release", "openai_gpt5"]
    .filter((t) => call.prompt.includes(`"${t}"`))
    .map((t) => ({ rawTopic: t, canonicalTopic: "gpt5_release" })),
});

const citeReutersAndWired: FakeHandler = () => ({
  headline: "GPT-5 arrives",
  summary: "Several outlets report the release.",
  keyPoints: [{ text: "GPT-5 is available", citations: ["Reuters", "Wired"] }],
});

function baseInput(oracle: FakeOracle, articles: ArticleInput[], overrides: Partial<BriefingPipelineInput> = {}) {
  const costLog = new InMemoryCostLog();
  const publisherStore = new InMemoryKeyValueStore();
  const events: Array<[string, number]> = [];
  const pipelineInput: BriefingPipelineInput = {
    runId: "run-test",
    articles,
    config: testConfig(),
    configHash: "hash-test",
    oracle,
    costLog,
    publisherStore,
    onEvent: (message, percent) => events.push([message, percent]),
    now: NOW,
    ...overrides,
  };
  return { pipelineInput, costLog, publisherStore, events };
}

describe("runBriefingPipeline", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("corroborates one topic reported by three publishers", async () => {
    const oracle = new FakeOracle({
      extraction: extractFrom(GPT5_TABLE),
      topic_normalization: mergeToRelease,
      contestation: noContestation,
      synthesis: citeReutersAndWired,
    });
    const { pipelineInput, costLog, publisherStore, events } = baseInput(oracle, [
      input("a1", "Reuters"),
      input("a2", "Wired"),
      input("a3", undefined, { senderIdentifier: "The Verge <newsletter@theverge.com>" }),
    ]);

    const { briefing, claims } = await runBriefingPipeline(pipelineInput);

    expect(claims.map((c) => [c.id, c.rawTopic, c.topic, c.confidence])).toEqual([
      ["a1#1", "gpt5_release", "gpt5_release", "corroborated"],
      ["a2#1", "gpt5_launch", "gpt5_release", "corroborated"],
      ["a3#1", "openai_gpt5", "gpt5_release", "corroborated"],
    ]);
    expect(claims[0].transitions[0].reason).toBe("3 independent publishers: Reuters, Wired, The Verge");
    expect(await publisherStore.get("newsletter@theverge.com")).toBe("The Verge");

    expect(briefing).toMatchObject({
      runId: "run-test",
      headline: "GPT-5 arrives",
      keyPoints: [{ text: "GPT-5 is available", citations: ["Reuters", "Wired"] }],
      configHash: "hash-test",
      coverage: { articlesReceived: 3, articlesProcessed: 3, articlesUnprocessed: 0, complete: true },
      warnings: [],
    });
    expect(briefing.costLedger.calls).toBe(4);
    expect(briefing.costLedger.tokensIn).toBe(4000);
    expect(briefing.costLedger.actualUsd).toBeCloseTo(0.0104, 9);
    expect(briefing.costLedger.haltReason).toBeNull();

    expect(events).toEqual([
      ["Preparing articles...", 5],
      ["Estimating cost for 3 articles...", 10],
      ["Extracting claims...", 15],
      ["Extracted batch 1/1", 50],
      ["Normalizing topics for 3 claims...", 50],
      ["Verifying claims across sources...", 65],
      ["Synthesizing briefing...", 85],
      ["Briefing complete", 100],
    ]);

    expect(costLog.calls().map((r) => r.stage)).toEqual([
      "extraction",
      "topic_normalization",
      "contestation",
      "synthesis",
    ]);
    expect(costLog.summaries()).toEqual([
      expect.objectContaining({ runId: "run-test", outcome: "completed", calls: 4, haltReason: null }),
    ]);
  });

  it("contests every claim when a fourth source contradicts the rest", async () => {
    const oracle = new FakeOracle({
      extraction: extractFrom(GPT5_TABLE),
      topic_normalization: mergeToRelease,
      contestation: (call) => ({
        contested: true,
        contestedClaimIds: claimIdsInPrompt(call.prompt),
        rationale: "Bloomberg reports a delay while others report a release",
      }),
      synthesis: citeReutersAndWired,
    });
    const { pipelineInput } = baseInput(oracle, [
      input("a1", "Reuters"),
      input("a2", "Wired"),
      input("a3", "The Verge"),
      input("a4", "Bloomberg"),
    ]);

    const { claims } = await runBriefingPipeline(pipelineInput);

    expect(claims.map((c) => c.confidence)).toEqual(["contested", "contested", "contested", "contested"]);
    expect(claims[3].transitions.map((t) => t.to)).toEqual(["corroborated", "contested"]);
    expect(oracle.callsFor("synthesis")[0].prompt).toContain(
      "- [gpt5_release] (contested) GPT-5 has been delayed to next year [Sources: Bloomberg]",
    );
  });

  it("still briefs when one extraction batch fails, with a coverage gap", async () => {
    const articles = ["a1", "a2", "a3", "a4", "a5", "a6", "a7", "a8"].map((id, i) =>
      input(id, i % 2 === 0 ? "Reuters" : "Wired"),
    );
    const extractChips = extractFrom({});
    const oracle = new FakeOracle({
      extraction: (call) => {
        if (articleIdsInPrompt(call.prompt).includes("a3")) {
          throw new OracleError("transient", "provider down");
        }
        return extractChips(call);
      },
      topic_normalization: identityNormalization,
      contestation: noContestation,
      synthesis: citeReutersAndWired,
    });
    const { pipelineInput, costLog } = baseInput(oracle, articles, {
      config: testConfig({ extractionBatchSize: 2 }),
    });

    const { briefing, claims } = await runBriefingPipeline(pipelineInput);

    // batch 2 is tried once and retried three times
    expect(oracle.callsFor("extraction")).toHaveLength(7);
    expect(claims.map((c) => c.articleId)).toEqual(["a1", "a2", "a5", "a6", "a7", "a8"]);
    expect(claims.every((c) => c.confidence === "corroborated")).toBe(true);
    expect(briefing.coverage).toEqual({
      articlesReceived: 8,
      articlesProcessed: 6,
      articlesUnprocessed: 2,
      complete: false,
    });
    expect(briefing.keyPoints).toHaveLength(1);
    expect(briefing.warnings.map((w) => w.type)).toEqual(["extraction_batch_failed"]);
    expect(briefing.warnings[0].details).toMatchObject({ batch: 2, articleIds: ["a3", "a4"] });
    expect(costLog.calls().filter((r) => !r.success)).toHaveLength(4);
    expect(costLog.summaries()[0].outcome).toBe("completed");
  });

  it("still briefs after the budget stops extraction", async () => {
    const articles = ["a1", "a2", "a3", "a4", "a5", "a6"].map((id, i) =>
      input(id, i % 2 === 0 ? "Reuters" : "Wired"),
    );
    const oracle = new FakeOracle({
      extraction: extractFrom({}),
      synthesis: citeReutersAndWired,
    });
    // Each extraction call projects ~$0.049, so the $0.07 pre-synthesis limit admits one
    const { pipelineInput } = baseInput(oracle, articles, {
      config: testConfig({
        extractionBatchSize: 2,
        hardCostCeilingUsd: 0.1,
        synthesisReserveUsd: 0.03,
        warningThresholdUsd: 0.05,
      }),
    });

    const { briefing, claims } = await runBriefingPipeline(pipelineInput);

    expect(oracle.callsFor("extraction")).toHaveLength(1);
    expect(oracle.callsFor("contestation")).toHaveLength(0);
    expect(oracle.callsFor("synthesis")).toHaveLength(1);
    expect(claims.map((c) => c.articleId)).toEqual(["a1", "a2"]);
    expect(briefing.coverage).toEqual({
      articlesReceived: 6,
      articlesProcessed: 2,
      articlesUnprocessed: 4,
      complete: false,
    });
    expect(briefing.keyPoints).toHaveLength(1);
    expect(briefing.costLedger.haltReason).toBe("budget_exceeded");
    expect(briefing.warnings.map((w) => w.type)).toEqual([
      "budget_exceeded",
      "extraction_budget_exceeded",
      "extraction_budget_exceeded",
      "contestation_skipped",
    ]);
  });

  it("still briefs after the oracle quota runs out mid-extraction", async () => {
    const articles = ["a1", "a2", "a3", "a4", "a5", "a6"].map((id, i) =>
      input(id, i % 2 === 0 ? "Reuters" : "Wired"),
    );
    const extractAll = extractFrom({});
    const oracle = new FakeOracle({
      extraction: (call) => {
        if (call.index === 1) throw new OracleError("quota_exceeded", "quota exhausted");
        return extractAll(call);
      },
      synthesis: citeReutersAndWired,
    });
    const { pipelineInput, costLog } = baseInput(oracle, articles, {
      config: testConfig({ extractionBatchSize: 2 }),
    });

    const { briefing } = await runBriefingPipeline(pipelineInput);

    // quota errors are not retried
    expect(oracle.callsFor("extraction")).toHaveLength(2);
    expect(oracle.callsFor("contestation")).toHaveLength(0);
    expect(oracle.callsFor("synthesis")).toHaveLength(1);
    expect(briefing.coverage).toEqual({
      articlesReceived: 6,
      articlesProcessed: 2,
      articlesUnprocessed: 4,
      complete: false,
    });
    expect(briefing.costLedger.haltReason).toBe("quota_exceeded");
    expect(briefing.warnings.map((w) => w.type)).toEqual([
      "quota_exceeded",
      "extraction_batch_failed",
      "extraction_budget_exceeded",
      "contestation_skipped",
    ]);
    expect(costLog.summaries()[0]).toMatchObject({ outcome: "completed", haltReason: "quota_exceeded" });
  });

  it("fails with no_articles when intake accepts nothing", async () => {
    const oracle = new FakeOracle();
    const { pipelineInput, costLog } = baseInput(oracle, [
      input("old", "Reuters", { publishedAt: "2025-01-01T00:00:00.000Z" }),
    ]);

    await expect(runBriefingPipeline(pipelineInput)).rejects.toMatchObject({
      name: "BriefingRunError",
      reason: "no_articles",
    });
    expect(oracle.calls).toHaveLength(0);
    expect(costLog.summaries()).toEqual([
      expect.objectContaining({ outcome: "no_articles", calls: 0, estimatedUsd: 0 }),
    ]);
  });

  it("fails with no_claims when extraction finds nothing", async () => {
    const oracle = new FakeOracle({ extraction: () => ({ claims: [] }) });
    const { pipelineInput, costLog } = baseInput(oracle, [input("a1", "Reuters")]);

    await expect(runBriefingPipeline(pipelineInput)).rejects.toMatchObject({ reason: "no_claims" });
    expect(oracle.callsFor("synthesis")).toHaveLength(0);
    expect(costLog.summaries()[0].outcome).toBe("no_claims");
  });

  it("stops between stages when the run is cancelled through the registry", async () => {
    const oracle = new FakeOracle({
      extraction: (call) => {
        setAbortSignal("run-cancel");
        return extractFrom(GPT5_TABLE)(call);
      },
      topic_normalization: mergeToRelease,
    });
    const { pipelineInput, costLog } = baseInput(oracle, [input("a1", "Reuters"), input("a2", "Wired")], {
      runId: "run-cancel",
    });

    await expect(runBriefingPipeline(pipelineInput)).rejects.toMatchObject({ reason: "cancelled" });
    expect(oracle.callsFor("topic_normalization")).toHaveLength(0);
    expect(costLog.summaries()[0]).toMatchObject({ runId: "run-cancel", outcome: "cancelled" });
    expect(isRunAborted("run-cancel")).toBe(false);
  });

  it("skips remaining batches once the caller aborts", async () => {
    const controller = new AbortController();
    const oracle = new FakeOracle({
      extraction: (call) => {
        controller.abort();
        return extractFrom(GPT5_TABLE)(call);
      },
    });
    const { pipelineInput } = baseInput(oracle, [input("a1", "Reuters"), input("a2", "Wired")], {
      config: testConfig({ extractionBatchSize: 1 }),
      signal: controller.signal,
    });

    const error = await runBriefingPipeline(pipelineInput).catch((err: unknown) => err);

    expect(error).toMatchObject({ reason: "cancelled" });
    expect(oracle.callsFor("extraction")).toHaveLength(1);
  });
});
