/**
 * Cost log sink tests.
 *
 * @module briefing/cost-log.test
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import { JsonlCostLog, type OracleCallRecord } from "@/lib/briefing/cost-log";

const record: OracleCallRecord = {
  type: "oracle_call",
  timestamp: "2026-03-10T12:00:00.000Z",
  runId: "run-1",
  stage: "extraction",
  model: "gpt-4o-mini",
  tokensIn: 1200,
  tokensOut: 300,
  estimatedCostUsd: 0.005,
  actualCostUsd: 0.00036,
  success: true,
  attempt: 1,
};

describe("JsonlCostLog", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "briefing-costs-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("appends one JSON record per line, creating the directory", async () => {
    const filePath = path.join(tempDir, "nested", "costs.jsonl");
    const log = new JsonlCostLog(filePath);

    await log.append(record);
    await log.append({ ...record, attempt: 2, success: false, errorKind: "transient" });

    const lines = fs.readFileSync(filePath, "utf8").trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(record);
    expect(JSON.parse(lines[1])).toMatchObject({ attempt: 2, errorKind: "transient" });
  });

  it("logs and swallows write failures", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    // A regular file where the directory should be
    const blocker = path.join(tempDir, "blocker");
    fs.writeFileSync(blocker, "");
    const log = new JsonlCostLog(path.join(blocker, "costs.jsonl"));

    await expect(log.append(record)).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("retries creating the directory after a failed append", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const blocker = path.join(tempDir, "logs");
    fs.writeFileSync(blocker, "");
    const filePath = path.join(blocker, "costs.jsonl");
    const log = new JsonlCostLog(filePath);

    await log.append(record);
    fs.rmSync(blocker);
    await log.append(record);

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(fs.readFileSync(filePath, "utf8"))).toEqual(record);
  });
});
