/**
 * In-process stand-ins for the external collaborators, used by workflow tests.
 */

import { loadConfig } from "../config/index.ts";
import type { LoopgraphConfigInput } from "../config/index.ts";
import type { CompletionRequest, TextCompleter } from "../services/completion.ts";
import type { ProcessOptions, ProcessResult, ProcessRunner } from "../services/process.ts";
import type { SearchProvider, SearchResult } from "../services/search.ts";
import type { WorkflowDeps } from "./types.ts";

/**
 * Completer that answers through `respond` and records every request.
 */
export class ScriptedCompleter implements TextCompleter {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly respond: (request: CompletionRequest, index: number) => string) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request, this.requests.length - 1);
  }

  /** Requests sent to one model */
  forModel(model: string): CompletionRequest[] {
    return this.requests.filter((request) => request.model === model);
  }
}

export class RecordingSearch implements SearchProvider {
  readonly name = "recording";
  readonly queries: string[] = [];

  constructor(private readonly results: (query: string) => SearchResult[] = () => []) {}

  async search(query: string): Promise<SearchResult[]> {
    this.queries.push(query);
    return this.results(query);
  }
}

export interface ProcessCall {
  executable: string;
  args: readonly string[];
  options: ProcessOptions;
}

/**
 * Process runner answering from `respond`; defaults to a clean exit.
 */
export function recordingRunner(
  respond: (call: ProcessCall, index: number) => Partial<ProcessResult> = () => ({}),
): ProcessRunner & { calls: ProcessCall[] } {
  const calls: ProcessCall[] = [];
  const runner = async (executable: string, args: readonly string[], options: ProcessOptions) => {
    const call = { executable, args, options };
    calls.push(call);
    return { stdout: "", stderr: "", exitCode: 0, timedOut: false, ...respond(call, calls.length - 1) };
  };
  return Object.assign(runner, { calls });
}

export function testConfig(overrides: LoopgraphConfigInput = {}) {
  return loadConfig({ cwd: "/nonexistent-loopgraph-config-dir", env: {}, overrides });
}

export function testDeps(parts: Partial<WorkflowDeps> = {}): WorkflowDeps {
  return {
    config: parts.config ?? testConfig(),
    completer: parts.completer ?? new ScriptedCompleter(() => ""),
    search: parts.search ?? new RecordingSearch(),
    fetchPage: parts.fetchPage ?? (async () => ""),
    runProcess: parts.runProcess ?? recordingRunner(),
  };
}
