/**
 * Proof Workflow
 *
 * Informal sketch, formalization and kernel check, with the arbiter deciding
 * which stage a failure goes back to:
 *
 *   theorist → formalizer → kernel → arbiter ─┬─ done / terminal → END
 *       ↑          ↑                          │
 *       │          └───── repair-syntax ──────┤
 *       └──────────────── repair-logic ───────┘
 *
 * Both repair routes tick the same `iterations` scope.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { createStage, graph } from "../../graph/builder.ts";
import { classifierStage, defineClassifier } from "../../graph/classifier.ts";
import { boundedRetryRouter, defineLoopScope, retryRoute } from "../../graph/governor.ts";
import type { CompiledGraph, GraphConfig, StageDefinition } from "../../graph/types.ts";
import { TERMINAL } from "../../graph/types.ts";
import { forRoles } from "../../services/completion.ts";
import { extractFencedBlock } from "../../services/fenced-block.ts";
import { describeProcessResult, isMissingExecutable } from "../../services/process.ts";
import { sessionWorkspace } from "../shared.ts";
import type { WorkflowDeps } from "../types.ts";
import {
  LEAN_FILE,
  LEAN_NOT_FOUND,
  buildArbiterPrompt,
  buildFormalizerPrompt,
  buildTheoristPrompt,
} from "./prompts.ts";
import { ProofState } from "./state.ts";
import type { ProofErrorType, ProofSchema } from "./state.ts";

export const PROOF_STAGE_IDS = {
  theorist: "theorist",
  formalizer: "formalizer",
  kernel: "kernel",
  arbiter: "arbiter",
} as const;

/** LOGIC wins when the diagnosis names both; no marker means SYNTAX */
export const proofErrorClassifier = defineClassifier<ProofErrorType>({
  markers: { LOGIC: "TYPE: LOGIC", SYNTAX: "TYPE: SYNTAX" },
  precedence: ["LOGIC", "SYNTAX"],
  fallback: "SYNTAX",
});

/**
 * Worst case is a logic repair every time: all four stages per attempt.
 */
export function proofStepBudget({ maxRetries }: { maxRetries: number }): number {
  return 4 * (maxRetries + 1);
}

export function createProofWorkflow(
  deps: Pick<WorkflowDeps, "config" | "completer" | "runProcess">,
  graphConfig: GraphConfig = {},
): CompiledGraph<ProofSchema> {
  const { config, runProcess } = deps;
  const ask = forRoles(deps.completer, config.models.proof);
  const timeoutSeconds = config.limits.processTimeoutSeconds;

  const attempts = defineLoopScope<ProofSchema>({
    name: "proof-repairs",
    field: "iterations",
    max: config.limits.maxRetries,
  });

  const theorist = createStage<ProofSchema>(
    PROOF_STAGE_IDS.theorist,
    async ({ state }) => ({ informalProof: await ask("theorist", buildTheoristPrompt(state)) }),
    { writes: ["informalProof"], description: "Sketch the proof" },
  );

  const formalizer = createStage<ProofSchema>(
    PROOF_STAGE_IDS.formalizer,
    async ({ state }) => {
      const response = await ask("formalizer", buildFormalizerPrompt(state));
      return { leanCode: extractFencedBlock(response, "lean") };
    },
    { writes: ["leanCode"], description: "Translate the sketch to Lean" },
  );

  const kernel = createStage<ProofSchema>(
    PROOF_STAGE_IDS.kernel,
    async ({ state, sessionId }) => {
      const dir = sessionWorkspace(config, sessionId);
      await mkdir(dir, { recursive: true });
      await writeFile(join(dir, LEAN_FILE), state.leanCode, "utf-8");

      const result = await runProcess(config.executables.lean, [LEAN_FILE], { timeoutSeconds, cwd: dir });
      if (isMissingExecutable(result)) {
        return { compilerOutput: LEAN_NOT_FOUND, success: false };
      }
      if (result.timedOut) {
        return { compilerOutput: describeProcessResult(result, timeoutSeconds), success: false };
      }
      return { compilerOutput: result.stdout + result.stderr, success: result.exitCode === 0 };
    },
    { writes: ["compilerOutput", "success"], description: "Compile the proof" },
  );

  const diagnose = classifierStage<ProofSchema, ProofErrorType>({
    id: PROOF_STAGE_IDS.arbiter,
    classifier: proofErrorClassifier,
    artifact: (state) => state.compilerOutput,
    analyze: (compilerOutput, { state }) => ask("arbiter", buildArbiterPrompt(state.leanCode, compilerOutput)),
    output: (result) => ({ errorType: result.label, critique: result.detail }),
    writes: ["errorType", "critique"],
    description: "Classify the failure",
  });

  // A verified proof needs no diagnosis
  const arbiter: StageDefinition<ProofSchema> = {
    ...diagnose,
    execute: async (context) => (context.state.success ? {} : diagnose.execute(context)),
  };

  const router = boundedRetryRouter(attempts, {
    succeeded: (state) => state.success,
    repair: (state) => (state.errorType === "LOGIC" ? ("repair-logic" as const) : ("repair-syntax" as const)),
  });

  return graph(ProofState)
    .start(theorist)
    .then(formalizer)
    .then(kernel)
    .then(arbiter)
    .branch(router, {
      done: TERMINAL,
      terminal: TERMINAL,
      "repair-syntax": retryRoute(attempts, PROOF_STAGE_IDS.formalizer),
      "repair-logic": retryRoute(attempts, PROOF_STAGE_IDS.theorist),
    })
    .compile(graphConfig);
}
