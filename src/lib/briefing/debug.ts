/**
 * Debug logging utilities for the briefing pipeline
 *
 * Provides file-based and console logging for debugging pipeline runs.
 * Can be configured via environment variables.
 *
 * @module briefing/debug
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEBUG_LOG_PATH =
  process.env.BRIEFING_DEBUG_LOG_PATH || path.join(process.cwd(), "logs", "debug-briefing.log");

const DEBUG_LOG_FILE_ENABLED =
  (process.env.BRIEFING_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

/**
 * Log a message to the debug file and console
 */
export function debugLog(message: string, data?: unknown): void {
  const timestamp = new Date().toISOString();
  let logLine = `[${timestamp}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
    } catch {
      payload = "[unserializable]";
    }
    if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
    }
    logLine += ` | ${payload}`;
  }
  logLine += "\n";

  // Async append so long runs don't block on disk
  if (DEBUG_LOG_FILE_ENABLED) {
    fs.promises
      .mkdir(path.dirname(DEBUG_LOG_PATH), { recursive: true })
      .then(() => fs.promises.appendFile(DEBUG_LOG_PATH, logLine))
      .catch((err: unknown) => {
        console.error(`[Debug] Failed to write ${DEBUG_LOG_PATH}:`, err);
      });
  }

  console.log(logLine.trim());
}
