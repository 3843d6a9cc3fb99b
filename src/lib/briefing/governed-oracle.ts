/**
 * Governed oracle
 *
 * Wraps any OracleClient with the run's cost governor, a bounded timeout per
 * call, cost logging and the retry policy:
 * - transient: retried up to `maxRetries` with capped exponential backoff
 * - malformed: retried once
 * - quota_exceeded: never retried; halts non-synthesis work
 * Budget refusals surface as BudgetExceededError and are never retried.
 *
 * @module briefing/governed-oracle
 */

import { toOracleError } from "../error-classification";
import type { CostGovernor } from "./cost-governor";
import { projectCall } from "./cost-governor";
import type { CostLogSink } from "./cost-log";
import { debugLog } from "./debug";
import { BudgetExceededError, OracleError } from "./errors";
import type { OracleClient, OracleCompletion, OracleRequest, OracleTask } from "./oracle";

export interface RetryPolicy {
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export interface GovernedOracleOptions extends RetryPolicy {
  runId: string;
  governor: CostGovernor;
  costLog: CostLogSink;
  timeoutMs: number;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Backoff before retry number `attempt` (0-based): base · 2^attempt, capped. */
export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.retryBaseDelayMs * 2 ** attempt, policy.retryMaxDelayMs);
}

export class GovernedOracle implements OracleClient {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly inner: OracleClient,
    private readonly options: GovernedOracleOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  modelNameFor(task: OracleTask): string {
    return this.inner.modelNameFor(task);
  }

  async complete<T>(request: OracleRequest<T>): Promise<OracleCompletion<T>> {
    const { governor, costLog, runId } = this.options;
    let transientRetries = 0;
    let malformedRetried = false;
    let attempt = 0;

    for (;;) {
      attempt++;
      const projection = projectCall(
        this.inner.modelNameFor(request.task),
        request.system,
        request.prompt,
        request.maxOutputTokens,
      );
      const admission = governor.admit(request.task, projection);
      if (!admission.admitted) {
        throw new BudgetExceededError(
          request.task,
          admission.projectedUsd,
          admission.limitUsd,
          admission.reason,
        );
      }

      try {
        const completion = await this.callWithTimeout(request);
        const actualCostUsd = governor.recordUsage(
          request.task,
          completion.modelName,
          completion.tokensIn,
          completion.tokensOut,
        );
        await costLog.append({
          type: "oracle_call",
          timestamp: new Date().toISOString(),
          runId,
          stage: request.task,
          model: completion.modelName,
          tokensIn: completion.tokensIn,
          tokensOut: completion.tokensOut,
          estimatedCostUsd: projection.usd,
          actualCostUsd,
          success: true,
          attempt,
        });
        return completion;
      } catch (err) {
        const error = toOracleError(err);
        governor.recordFailedCall(request.task);
        await costLog.append({
          type: "oracle_call",
          timestamp: new Date().toISOString(),
          runId,
          stage: request.task,
          model: projection.modelName,
          tokensIn: 0,
          tokensOut: 0,
          estimatedCostUsd: projection.usd,
          actualCostUsd: 0,
          success: false,
          attempt,
          errorKind: error.kind,
        });
        debugLog(`[Oracle] ${request.task} attempt ${attempt} failed (${error.kind})`, error.message);

        if (request.signal?.aborted) throw error;

        if (error.kind === "quota_exceeded") {
          governor.halt("quota_exceeded", request.task, error.message);
          throw error;
        }

        if (error.kind === "malformed") {
          if (malformedRetried) throw error;
          malformedRetried = true;
          console.warn(`[Oracle] ${request.task}: malformed output, retrying once`);
          continue;
        }

        if (transientRetries >= this.options.maxRetries) throw error;
        const delay = backoffDelayMs(this.options, transientRetries);
        transientRetries++;
        console.warn(
          `[Oracle] ${request.task}: transient failure, retry ${transientRetries}/${this.options.maxRetries} in ${delay}ms`,
        );
        await this.sleep(delay);
      }
    }
  }

  private async callWithTimeout<T>(request: OracleRequest<T>): Promise<OracleCompletion<T>> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    const external = request.signal;
    if (external?.aborted) {
      throw new OracleError("transient", "Oracle call cancelled before dispatch");
    }
    const onAbort = () => controller.abort(external?.reason);
    external?.addEventListener("abort", onAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new OracleError("transient", `Oracle call timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.inner.complete({ ...request, signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
      external?.removeEventListener("abort", onAbort);
    }
  }
}
