/**
 * Response parsing shared by the workflows.
 */

import { join } from "node:path";

import type { LoopgraphConfig } from "../config/index.ts";

const LIST_MARKER = /^\s*(?:[-*•]|\d+[.)])\s+/;

/**
 * Split a newline-separated list answer into items, dropping bullets,
 * numbering, wrapping quotes and blank lines.
 *
 * @example
 * ```typescript
 * parseListResponse("1. tidal power\n- \"wave farms\"\n\n* ocean thermal", 2);
 * // ["tidal power", "wave farms"]
 * ```
 */
export function parseListResponse(text: string, limit?: number): string[] {
  const items = text
    .split("\n")
    .map((line) => line.replace(LIST_MARKER, "").trim().replace(/^"(.*)"$/, "$1").trim())
    .filter((line) => line.length > 0);
  return limit === undefined ? items : items.slice(0, limit);
}

/**
 * First http(s) URL in a model answer, without trailing punctuation.
 */
export function findUrl(text: string): string | null {
  const match = /https?:\/\/[^\s<>"'`]+/.exec(text);
  return match ? match[0].replace(/[).,;:\]]+$/, "") : null;
}

/**
 * Directory where a session's generated artifacts are written and run.
 */
export function sessionWorkspace(config: LoopgraphConfig, sessionId: string): string {
  return join(config.storage.workspaceDir, sessionId);
}
