/**
 * Sessions command - Inspect and remove stored workflow sessions
 */

import { resolve } from "node:path";
import { log } from "@clack/prompts";

import { ConfigError, loadConfig } from "../config/index.ts";
import { createCheckpointStore } from "../graph/checkpointer.ts";
import type { CheckpointStore, CheckpointSummary } from "../graph/checkpointer.ts";
import { TERMINAL } from "../graph/types.ts";
import { COLORS } from "../utils/colors.ts";
import { errorMessage } from "../utils/logger.ts";

export interface SessionsCommandOptions {
  config?: string;
  /** Replaces the file store (tests) */
  store?: CheckpointStore;
}

function openStore(options: SessionsCommandOptions): CheckpointStore | null {
  if (options.store) return options.store;
  try {
    const config = loadConfig({ configPath: options.config });
    return createCheckpointStore("file", { baseDir: resolve(config.storage.checkpointDir) });
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    log.error(error.message);
    return null;
  }
}

/**
 * One line per session: id, position and save time.
 */
export function formatSessionLine(summary: CheckpointSummary): string {
  const position =
    summary.stage === TERMINAL
      ? `${COLORS.green}finished${COLORS.reset}`
      : `next: ${summary.stage}`;
  return `${COLORS.bold}${summary.sessionId}${COLORS.reset}  ${position}  seq ${summary.seq}  ${COLORS.dim}${summary.savedAt}${COLORS.reset}`;
}

export async function listSessionsCommand(options: SessionsCommandOptions = {}): Promise<number> {
  const store = openStore(options);
  if (!store) return 1;

  const sessions = await store.list();
  if (sessions.length === 0) {
    log.info("No stored sessions.");
    return 0;
  }
  log.message(sessions.map(formatSessionLine).join("\n"));
  return 0;
}

export async function pruneSessionCommand(sessionId: string, options: SessionsCommandOptions = {}): Promise<number> {
  const store = openStore(options);
  if (!store) return 1;

  let removed: boolean;
  try {
    removed = await store.prune(sessionId);
  } catch (error) {
    log.error(errorMessage(error));
    return 1;
  }

  if (!removed) {
    log.warn(`No stored session '${sessionId}'`);
    return 1;
  }
  log.success(`Removed session ${sessionId}`);
  return 0;
}
