/**
 * Run abortion signal management.
 * Kept on globalThis so every module instance sees the same registry.
 */

type AbortRegistryHost = typeof globalThis & { __briefingAbortSignals?: Map<string, boolean> };

function getAbortSignals(): Map<string, boolean> {
  const g: AbortRegistryHost = globalThis;
  if (!g.__briefingAbortSignals) {
    g.__briefingAbortSignals = new Map<string, boolean>();
  }
  return g.__briefingAbortSignals;
}

/**
 * Check if a run has been aborted.
 */
export function isRunAborted(runId: string): boolean {
  return getAbortSignals().get(runId) === true;
}

/**
 * Clear the abort signal for a run (called after run completion).
 */
export function clearAbortSignal(runId: string): void {
  getAbortSignals().delete(runId);
}

/**
 * Set the abort signal for a run.
 */
export function setAbortSignal(runId: string): void {
  getAbortSignals().set(runId, true);
}
