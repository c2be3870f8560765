/**
 * Run command - Start or resume a workflow session
 */

import { randomUUID } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { cancel, intro, isCancel, log, outro, spinner, text } from "@clack/prompts";

import { ConfigError, loadConfig } from "../config/index.ts";
import type { LoopgraphConfig } from "../config/index.ts";
import { createCheckpointStore } from "../graph/checkpointer.ts";
import type { ProgressEvent } from "../graph/types.ts";
import { OpenAICompleter } from "../services/completion.ts";
import { fetchPageText } from "../services/page-fetch.ts";
import { runProcess } from "../services/process.ts";
import { createDefaultSearch } from "../services/search.ts";
import { errorMessage } from "../utils/logger.ts";
import { getWorkflow, workflowNames } from "../workflows/index.ts";
import type { WorkflowDefinition, WorkflowDeps, WorkflowOutcome } from "../workflows/index.ts";

export interface RunCommandOptions {
  /** Session id; a short random id is generated when omitted */
  session?: string;
  /** Continue the stored session instead of starting over */
  resume?: boolean;
  /** Explicit config file */
  config?: string;
  /** Replaces the default collaborators (tests) */
  deps?: (config: LoopgraphConfig) => WorkflowDeps;
}

/**
 * Strip control characters from user input echoed in error messages.
 */
function sanitizeForDisplay(input: string): string {
  // eslint-disable-next-line no-control-regex
  return input.replace(/[\x00-\x1F\x7F]/g, "").slice(0, 50);
}

/**
 * Collaborators backed by the configured LLM endpoint, search chain,
 * page fetcher and process runner.
 */
export function createDefaultDeps(config: LoopgraphConfig): WorkflowDeps {
  return {
    config,
    completer: new OpenAICompleter(config.llm),
    search: createDefaultSearch({ ...config.search, timeoutMs: config.limits.fetchTimeoutMs }),
    fetchPage: (url) =>
      fetchPageText(url, { maxChars: config.limits.pageCharLimit, timeoutMs: config.limits.fetchTimeoutMs }),
    runProcess,
  };
}

/**
 * Path the rendered output of a session is written to.
 */
export function outputPath(config: LoopgraphConfig, workflow: string, sessionId: string): string {
  return resolve(config.storage.workspaceDir, `${workflow}-${sessionId}.md`);
}

async function promptForObjective(definition: WorkflowDefinition): Promise<string | null> {
  const answer = await text({
    message: `${definition.inputLabel}:`,
    validate: (value) => (value.trim().length === 0 ? "Please enter a value" : undefined),
  });
  if (isCancel(answer)) {
    return null;
  }
  return answer.trim();
}

/**
 * Run a workflow to completion.
 *
 * @returns Process exit code: 0 when the session completed, 1 otherwise
 *
 * @example
 * ```ts
 * // New session, objective given on the command line
 * await runCommand("quorum", "Why are there two tides a day?");
 *
 * // Continue an interrupted session
 * await runCommand("deep-research", undefined, { session: "a1b2c3d4", resume: true });
 * ```
 */
export async function runCommand(
  workflowName: string,
  objective: string | undefined,
  options: RunCommandOptions = {},
): Promise<number> {
  const definition = getWorkflow(workflowName);
  if (!definition) {
    log.error(`Unknown workflow '${sanitizeForDisplay(workflowName)}'`);
    log.message(`Available workflows: ${workflowNames().join(", ")}`);
    return 1;
  }

  if (options.resume && !options.session) {
    log.error("--resume needs --session <id>");
    return 1;
  }

  let config: LoopgraphConfig;
  try {
    config = loadConfig({ configPath: options.config });
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    log.error(error.message);
    return 1;
  }

  intro(`loopgraph ${definition.name}`);

  const sessionId = options.session ?? randomUUID().slice(0, 8);
  const checkpoints = createCheckpointStore("file", { baseDir: resolve(config.storage.checkpointDir) });
  const resuming = options.resume === true && (await checkpoints.exists(sessionId));

  if (options.resume && !resuming) {
    log.info(`No stored session '${sessionId}', starting a new one`);
  }

  let input = objective?.trim() || undefined;
  if (input === undefined && !resuming) {
    const answer = await promptForObjective(definition);
    if (answer === null) {
      cancel("Operation cancelled.");
      return 0;
    }
    input = answer;
  }

  const s = spinner();
  s.start(resuming ? `Resuming session ${sessionId}` : `Starting session ${sessionId}`);

  const onProgress = (event: ProgressEvent): void => {
    if (event.type === "stage_started") {
      s.message(definition.stageDescriptions[event.stage] ?? event.stage);
    }
  };

  const deps = (options.deps ?? createDefaultDeps)(config);
  let outcome: WorkflowOutcome;
  try {
    outcome = await definition.run(
      deps,
      {
        checkpoints,
        maxSteps: config.limits.maxSteps,
        terminalResumePolicy: config.terminalResumePolicy,
        onProgress,
      },
      { sessionId, objective: input, resume: options.resume === true },
    );
  } catch (error) {
    s.stop("Session aborted");
    log.error(errorMessage(error));
    return 1;
  }

  const path = outputPath(config, definition.name, outcome.sessionId);
  await mkdir(resolve(config.storage.workspaceDir), { recursive: true });
  await writeFile(path, outcome.output, "utf-8");

  if (outcome.status === "failed") {
    s.stop(`Session ${outcome.sessionId} stopped after ${outcome.steps} step(s)`);
    log.warn(outcome.error ? errorMessage(outcome.error) : "The session did not complete");
    log.info(`Resume with: loopgraph run ${definition.name} --session ${outcome.sessionId} --resume`);
    log.info(`Partial output saved to ${path}`);
    return 1;
  }

  s.stop(`Session ${outcome.sessionId} completed in ${outcome.steps} step(s)`);
  console.log(outcome.output);
  outro(`Saved to ${path}`);
  return 0;
}
