/**
 * Workflow Definitions
 *
 * Every workflow is a compiled graph plus the metadata the CLI needs to run
 * it: which state field receives the objective, how the result is rendered,
 * and human-readable descriptions of each stage for progress output.
 */

import type { LoopgraphConfig } from "../config/index.ts";
import type { AnnotationRoot, StateFromAnnotation, StateUpdate } from "../graph/annotation.ts";
import { createExecutor } from "../graph/compiled.ts";
import type { CompiledGraph, ExecutionResult, GraphConfig } from "../graph/types.ts";
import type { TextCompleter } from "../services/completion.ts";
import type { ProcessRunner } from "../services/process.ts";
import type { SearchProvider } from "../services/search.ts";

// ============================================================================
// DEPENDENCIES
// ============================================================================

export type PageFetcher = (url: string) => Promise<string>;

/**
 * Collaborators injected into every workflow factory.
 */
export interface WorkflowDeps {
  config: LoopgraphConfig;
  completer: TextCompleter;
  search: SearchProvider;
  fetchPage: PageFetcher;
  runProcess: ProcessRunner;
}

// ============================================================================
// DEFINITION
// ============================================================================

export interface WorkflowRunOptions {
  sessionId: string;
  /** Required when a new session is started */
  objective?: string;
  /** Continue the stored session, starting a new one when none exists */
  resume: boolean;
}

export interface WorkflowOutcome {
  sessionId: string;
  status: "completed" | "failed";
  /** Rendered result, written to the workspace by the CLI */
  output: string;
  steps: number;
  error?: Error;
}

export interface WorkflowDefinition {
  name: string;
  description: string;
  /** Prompt shown when the objective is missing */
  inputLabel: string;
  /** Progress text per stage id */
  stageDescriptions: Readonly<Record<string, string>>;
  run(deps: WorkflowDeps, graphConfig: GraphConfig, options: WorkflowRunOptions): Promise<WorkflowOutcome>;
}

/**
 * Bind a typed graph factory to the untyped definition the registry holds.
 *
 * @example
 * ```typescript
 * export const quorumWorkflowDefinition = defineWorkflow({
 *   name: "quorum",
 *   description: "Draft an answer, then refine it through reviewer rounds",
 *   inputLabel: "Question",
 *   stageDescriptions: { drafter: "Drafting", critics: "Reviewing", refiner: "Refining" },
 *   create: createQuorumWorkflow,
 *   stepBudget: (config) => quorumStepBudget(config.limits),
 *   input: (question) => ({ question }),
 *   output: (state) => state.answer,
 * });
 * ```
 */
export function defineWorkflow<A extends AnnotationRoot>(options: {
  name: string;
  description: string;
  inputLabel: string;
  stageDescriptions: Readonly<Record<string, string>>;
  create: (deps: WorkflowDeps, graphConfig: GraphConfig) => CompiledGraph<A>;
  /** Step cap used when the caller sets none; covers the loop bounds in `config.limits` */
  stepBudget: (config: LoopgraphConfig) => number;
  input: (objective: string) => StateUpdate<A>;
  output: (state: StateFromAnnotation<A>) => string;
}): WorkflowDefinition {
  const { create, stepBudget, input, output, ...metadata } = options;

  const toOutcome = (result: ExecutionResult<A>): WorkflowOutcome => ({
    sessionId: result.sessionId,
    status: result.status,
    output: output(result.state),
    steps: result.steps,
    error: result.error,
  });

  return {
    ...metadata,
    async run(deps, graphConfig, { sessionId, objective, resume }) {
      const maxSteps = graphConfig.maxSteps ?? stepBudget(deps.config);
      const executor = createExecutor(create(deps, { name: metadata.name, ...graphConfig, maxSteps }));
      const initial = objective === undefined ? undefined : input(objective);

      if (resume) {
        return toOutcome(await executor.resumeOrStart(sessionId, initial));
      }
      return toOutcome(await executor.execute({ kind: "start", sessionId, input: initial }));
    },
  };
}
