/**
 * Cost log
 *
 * Append-only record of every oracle call and one summary per run.
 * The JSONL sink writes one record per line.
 *
 * @module briefing/cost-log
 */

import * as fs from "fs";
import * as path from "path";
import type { BriefingRunFailure, OracleErrorKind } from "./errors";
import type { OracleTask } from "./oracle";

// ============================================================================
// RECORDS
// ============================================================================

export interface OracleCallRecord {
  type: "oracle_call";
  timestamp: string;
  runId: string;
  stage: OracleTask;
  model: string;
  tokensIn: number;
  tokensOut: number;
  estimatedCostUsd: number;
  actualCostUsd: number;
  success: boolean;
  attempt: number;
  errorKind?: OracleErrorKind;
}

export interface StageTotals {
  calls: number;
  tokensIn: number;
  tokensOut: number;
  estimatedUsd: number;
  actualUsd: number;
}

export interface RunSummaryRecord {
  type: "run_summary";
  timestamp: string;
  runId: string;
  outcome: "completed" | BriefingRunFailure | "error";
  estimatedUsd: number;
  actualUsd: number;
  tokensIn: number;
  tokensOut: number;
  calls: number;
  haltReason: string | null;
  byStage: Partial<Record<OracleTask, StageTotals>>;
}

export type CostLogRecord = OracleCallRecord | RunSummaryRecord;

export interface CostLogSink {
  append(record: CostLogRecord): Promise<void>;
}

// ============================================================================
// SINKS
// ============================================================================

export class JsonlCostLog implements CostLogSink {
  private dirReady: Promise<unknown> | null = null;

  constructor(private readonly filePath: string) {}

  async append(record: CostLogRecord): Promise<void> {
    try {
      this.dirReady ??= fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await this.dirReady;
      await fs.promises.appendFile(this.filePath, JSON.stringify(record) + "\n");
    } catch (err) {
      this.dirReady = null;
      // Cost records are best-effort
      console.error(`[CostLog] Failed to append ${record.type} to ${this.filePath}:`, err);
    }
  }
}

export class InMemoryCostLog implements CostLogSink {
  readonly records: CostLogRecord[] = [];

  async append(record: CostLogRecord): Promise<void> {
    this.records.push(record);
  }

  calls(): OracleCallRecord[] {
    return this.records.filter((r): r is OracleCallRecord => r.type === "oracle_call");
  }

  summaries(): RunSummaryRecord[] {
    return this.records.filter((r): r is RunSummaryRecord => r.type === "run_summary");
  }
}
