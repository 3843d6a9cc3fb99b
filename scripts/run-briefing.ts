/**
 * Run one briefing from a JSON file of articles.
 *
 * Usage:
 *   npx tsx scripts/run-briefing.ts <articles.json> [--config path] [--run-id id]
 *
 * Prints the briefing JSON to stdout. Per-call costs go to the configured
 * JSONL cost log; resolved publishers persist in the SQLite publisher cache
 * (BRIEFING_PUBLISHER_CACHE_PATH).
 */

import * as fs from "fs";
import { loadBriefingConfig } from "../src/lib/config-loader";
import { BriefingRunError } from "../src/lib/briefing/errors";
import { AiSdkOracleClient } from "../src/lib/briefing/oracle-client";
import { runBriefingPipeline } from "../src/lib/briefing/pipeline";
import { SqlitePublisherCache } from "../src/lib/briefing/publisher-cache";
import { ArticleInputListSchema } from "../src/lib/briefing/schemas";

function usage(): never {
  console.error("Usage: tsx scripts/run-briefing.ts <articles.json> [--config path] [--run-id id]");
  process.exit(1);
}

function parseArgs(argv: string[]): { articlesPath: string; configPath?: string; runId?: string } {
  let articlesPath: string | undefined;
  let configPath: string | undefined;
  let runId: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--config") {
      configPath = argv[++i];
      if (!configPath) usage();
    } else if (arg === "--run-id") {
      runId = argv[++i];
      if (!runId) usage();
    } else if (!articlesPath) {
      articlesPath = arg;
    } else {
      usage();
    }
  }

  if (!articlesPath) usage();
  return { articlesPath, configPath, runId };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));

  const resolved = loadBriefingConfig(args.configPath);
  console.error(`[Briefing] Config ${resolved.sourcePath} (hash ${resolved.contentHash.slice(0, 12)})`);

  const raw: unknown = JSON.parse(fs.readFileSync(args.articlesPath, "utf-8"));
  const articles = ArticleInputListSchema.safeParse(raw);
  if (!articles.success) {
    const issues = articles.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    console.error(`[Briefing] Invalid articles file: ${issues.join(", ")}`);
    process.exit(1);
  }

  const publisherStore = new SqlitePublisherCache();
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  try {
    const { briefing } = await runBriefingPipeline({
      runId: args.runId,
      articles: articles.data,
      config: resolved.config,
      configHash: resolved.contentHash,
      oracle: new AiSdkOracleClient(resolved.config),
      publisherStore,
      signal: controller.signal,
      onEvent: (message, percent) => console.error(`[${String(percent).padStart(3)}%] ${message}`),
      onBudgetAlert: (alert) =>
        console.error(`[Briefing] BUDGET ALERT (${alert.reason}) at ${alert.stage}: ${alert.message}`),
    });
    process.stdout.write(JSON.stringify(briefing, null, 2) + "\n");
  } catch (err) {
    if (err instanceof BriefingRunError) {
      console.error(`[Briefing] Run failed: ${err.reason}: ${err.message}`);
      process.exitCode = 2;
      return;
    }
    throw err;
  } finally {
    await publisherStore.close();
  }
}

main().catch((err: unknown) => {
  console.error("[Briefing] Fatal:", err);
  process.exit(1);
});
