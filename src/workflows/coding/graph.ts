/**
 * Coding Workflow
 *
 * Test-first generation with a flat bounded retry:
 *
 *   tester → coder → executor → verifier ─┬─ done / terminal → END
 *                ↑                        │
 *                └──────── repair ────────┘  (ticks `iterations`)
 *
 * Tests are written once. The executor runs the script, then the test suite,
 * in the session workspace; the verifier reviews passing runs, looking at the
 * produced plot when there is one.
 */

import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { createStage, graph } from "../../graph/builder.ts";
import { boundedRetryRouter, defineLoopScope, retryRoute } from "../../graph/governor.ts";
import type { CompiledGraph, GraphConfig } from "../../graph/types.ts";
import { TERMINAL } from "../../graph/types.ts";
import { forRoles } from "../../services/completion.ts";
import { extractFencedBlock } from "../../services/fenced-block.ts";
import { describeProcessResult } from "../../services/process.ts";
import { log } from "../../utils/logger.ts";
import { sessionWorkspace } from "../shared.ts";
import type { WorkflowDeps } from "../types.ts";
import {
  PLOT_NAME,
  SCRIPT_NAME,
  TEST_NAME,
  buildCoderPrompt,
  buildTesterPrompt,
  buildVerifierPrompt,
  coderPromptKind,
  parseVerdict,
} from "./prompts.ts";
import { CodingState } from "./state.ts";
import type { CodingSchema } from "./state.ts";

export const CODING_STAGE_IDS = {
  tester: "tester",
  coder: "coder",
  executor: "executor",
  verifier: "verifier",
} as const;

/**
 * Stage executions of a loop that never passes: the tester once, then
 * coder, executor and verifier for the first attempt and every repair.
 */
export function codingStepBudget({ maxRetries }: { maxRetries: number }): number {
  return 1 + 3 * (maxRetries + 1);
}

export function createCodingWorkflow(
  deps: Pick<WorkflowDeps, "config" | "completer" | "runProcess">,
  graphConfig: GraphConfig = {},
): CompiledGraph<CodingSchema> {
  const { config, runProcess } = deps;
  const ask = forRoles(deps.completer, config.models.coding);
  const timeoutSeconds = config.limits.processTimeoutSeconds;

  const attempts = defineLoopScope<CodingSchema>({
    name: "coding-repairs",
    field: "iterations",
    max: config.limits.maxRetries,
  });

  const tester = createStage<CodingSchema>(
    CODING_STAGE_IDS.tester,
    async ({ state }) => {
      // Tests are written once per session
      if (state.testCode) return {};
      const response = await ask("tester", buildTesterPrompt(state.objective));
      return { testCode: extractFencedBlock(response, "python") };
    },
    { writes: ["testCode"], description: "Write the test suite" },
  );

  const coder = createStage<CodingSchema>(
    CODING_STAGE_IDS.coder,
    async ({ state }) => {
      log("Workflow", "coder_prompt", { kind: coderPromptKind(state), iterations: state.iterations });
      const response = await ask("coder", buildCoderPrompt(state));
      return { code: extractFencedBlock(response, "python"), verificationError: null };
    },
    { writes: ["code", "verificationError"], description: "Write or repair the script" },
  );

  const executor = createStage<CodingSchema>(
    CODING_STAGE_IDS.executor,
    async ({ state, sessionId }) => {
      const dir = sessionWorkspace(config, sessionId);
      await mkdir(dir, { recursive: true });
      await rm(join(dir, PLOT_NAME), { force: true });
      await writeFile(join(dir, SCRIPT_NAME), state.code, "utf-8");
      await writeFile(join(dir, TEST_NAME), state.testCode, "utf-8");

      let output = "--- SCRIPT EXECUTION ---\n";
      const script = await runProcess(config.executables.python, [SCRIPT_NAME], { timeoutSeconds, cwd: dir });
      output += describeProcessResult(script, timeoutSeconds);
      if (script.timedOut || script.exitCode !== 0) {
        return { output, success: false };
      }

      output += "\n\n--- TEST EXECUTION ---\n";
      const tests = await runProcess(config.executables.python, ["-m", "pytest", TEST_NAME], {
        timeoutSeconds,
        cwd: dir,
      });
      output += describeProcessResult(tests, timeoutSeconds);
      return { output, success: !tests.timedOut && tests.exitCode === 0 };
    },
    { writes: ["output", "success"], description: "Run the script and its tests" },
  );

  const verifier = createStage<CodingSchema>(
    CODING_STAGE_IDS.verifier,
    async ({ state, sessionId }) => {
      if (!state.success) return {};
      const response = await ask("verifier", {
        ...buildVerifierPrompt(state),
        imagePath: join(sessionWorkspace(config, sessionId), PLOT_NAME),
      });
      const verdict = parseVerdict(response);
      return { success: verdict.passed, verificationError: verdict.critique };
    },
    { writes: ["success", "verificationError"], description: "Review a passing run" },
  );

  const router = boundedRetryRouter(attempts, {
    succeeded: (state) => state.success,
    repair: () => "repair" as const,
  });

  return graph(CodingState)
    .start(tester)
    .then(coder)
    .then(executor)
    .then(verifier)
    .branch(router, {
      done: TERMINAL,
      terminal: TERMINAL,
      repair: retryRoute(attempts, CODING_STAGE_IDS.coder),
    })
    .compile(graphConfig);
}
