/**
 * Diagnostic Logger
 *
 * Lightweight conditional logger for engine and collaborator chokepoints.
 * Debug output is activated by the LOOPGRAPH_DEBUG=1 environment variable;
 * warnings and errors are always written.
 *
 * Logs are prefixed with `[loopgraph:<scope>]` for easy filtering:
 *   [loopgraph:Executor] stage_completed {"stage":"coder","step":3}
 *   [loopgraph:Checkpoint] saved {"sessionId":"s-1","seq":4}
 *   [loopgraph:Search] provider_failed {"provider":"brave"}
 *
 * Usage:
 * ```typescript
 * import { log } from "../utils/logger.ts";
 *
 * log("Executor", "route_taken", { from: "verifier", label: "repair" });
 * ```
 */

export type LogScope =
  | "Executor"
  | "Checkpoint"
  | "Governor"
  | "Classifier"
  | "Search"
  | "Fetch"
  | "Process"
  | "Completion"
  | "Workflow"
  | "Config";

export const DEBUG_ENV_VAR = "LOOPGRAPH_DEBUG";

let _debugEnabled: boolean | null = null;

/**
 * Check if diagnostic logging is enabled.
 * Caches the result after the first check.
 */
export function isDebugEnabled(): boolean {
  if (_debugEnabled === null) {
    _debugEnabled = process.env[DEBUG_ENV_VAR] === "1";
  }
  return _debugEnabled;
}

/**
 * Reset the cached debug flag (for testing).
 */
export function resetDebugCache(): void {
  _debugEnabled = null;
}

function format(scope: LogScope, action: string, data?: Record<string, unknown>): string {
  const payload = data ? ` ${JSON.stringify(data)}` : "";
  return `[loopgraph:${scope}] ${action}${payload}`;
}

/**
 * Log a diagnostic message from a specific scope.
 *
 * Only emits output when LOOPGRAPH_DEBUG=1.
 *
 * @param scope - Component emitting the entry
 * @param action - Short action descriptor (e.g., "stage_started", "saved")
 * @param data - Optional structured data to include in the log
 */
export function log(scope: LogScope, action: string, data?: Record<string, unknown>): void {
  if (!isDebugEnabled()) return;
  console.debug(format(scope, action, data));
}

export function logWarn(scope: LogScope, action: string, data?: Record<string, unknown>): void {
  console.warn(format(scope, action, data));
}

export function logError(scope: LogScope, action: string, data?: Record<string, unknown>): void {
  console.error(format(scope, action, data));
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
