/**
 * Sequential batch scheduler.
 *
 * @module briefing/batching
 */

export function chunk<T>(items: T[], size: number): T[][] {
  if (size < 1) throw new Error(`Batch size must be at least 1, got ${size}`);
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export type BatchOutcome<R> =
  | { status: "done"; result: R }
  | { status: "failed"; error: unknown }
  | { status: "skipped"; reason: string };

export interface SequentialBatchOptions {
  /** Checked before every dispatch; a string stops this and every later batch. */
  stopReason?: () => string | null;
  /** A thrown error that should stop later batches, not just fail this one. */
  isFatal?: (error: unknown) => string | null;
}

/**
 * Run batches one at a time. Once a batch is skipped, every later batch is
 * skipped with the same reason.
 */
export async function runBatchesSequentially<T, R>(
  batches: T[],
  worker: (batch: T, index: number) => Promise<R>,
  options: SequentialBatchOptions = {},
): Promise<BatchOutcome<R>[]> {
  const outcomes: BatchOutcome<R>[] = [];
  let stopped: string | null = null;

  for (let i = 0; i < batches.length; i++) {
    stopped ??= options.stopReason?.() ?? null;
    if (stopped) {
      outcomes.push({ status: "skipped", reason: stopped });
      continue;
    }

    try {
      outcomes.push({ status: "done", result: await worker(batches[i], i) });
    } catch (error) {
      const fatal = options.isFatal?.(error) ?? null;
      if (fatal) {
        stopped = fatal;
        outcomes.push({ status: "skipped", reason: fatal });
      } else {
        outcomes.push({ status: "failed", error });
      }
    }
  }

  return outcomes;
}
