import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createExecutor } from "../../graph/compiled.ts";
import { ScriptedCompleter, recordingRunner, testConfig, testDeps } from "../test-doubles.ts";
import { createCodingWorkflow } from "./graph.ts";
import { PLOT_NAME, coderPromptKind } from "./prompts.ts";
import type { CodingRecord } from "./state.ts";

const MODELS = { tester: "tester-m", coder: "coder-m", verifier: "verifier-m" };

let workspace: string;

beforeEach(async () => {
  workspace = await mkdtemp(join(tmpdir(), "loopgraph-coding-"));
});

afterEach(async () => {
  await rm(workspace, { recursive: true, force: true });
});

function setup(options: {
  maxRetries?: number;
  verdicts?: string[];
  scriptExitCode?: number;
}) {
  const config = testConfig({
    models: { coding: MODELS },
    limits: { maxRetries: options.maxRetries ?? 10 },
    storage: { workspaceDir: workspace },
  });
  const verdicts = options.verdicts ?? ["PASSED"];
  let verdictIndex = 0;
  const completer = new ScriptedCompleter((request) => {
    if (request.model === MODELS.tester) return "```python\ndef test_area():\n    assert app.area(2) == 4\n```";
    if (request.model === MODELS.coder) return "```python\ndef area(x):\n    return x * x\n```";
    const verdict = verdicts[Math.min(verdictIndex, verdicts.length - 1)] ?? "PASSED";
    verdictIndex++;
    return verdict;
  });
  const runner = recordingRunner((call) =>
    call.args[0] === "-m" ? { exitCode: 0 } : { exitCode: options.scriptExitCode ?? 0, stderr: "boom" },
  );
  const workflow = createCodingWorkflow(testDeps({ config, completer, runProcess: runner }));
  return { executor: createExecutor(workflow), completer, runner };
}

describe("coding workflow", () => {
  test("writes tests, code and runs both before verifying", async () => {
    const { executor, completer, runner } = setup({});

    const result = await executor.execute({ kind: "start", sessionId: "coding-1", input: { objective: "square" } });

    expect(result.status).toBe("completed");
    expect(result.steps).toBe(4);
    expect(result.state.success).toBe(true);
    expect(result.state.iterations).toBe(0);
    expect(result.state.testCode).toBe("def test_area():\n    assert app.area(2) == 4");

    const dir = join(workspace, "coding-1");
    expect(runner.calls.map((call) => [call.executable, ...call.args])).toEqual([
      ["python3", "temp_sandbox_script.py"],
      ["python3", "-m", "pytest", "temp_generated_tests.py"],
    ]);
    expect(runner.calls[0]?.options).toEqual({ timeoutSeconds: 30, cwd: dir });
    expect(await readFile(join(dir, "temp_sandbox_script.py"), "utf-8")).toBe("def area(x):\n    return x * x");
    expect(completer.forModel(MODELS.verifier)[0]?.imagePath).toBe(join(dir, PLOT_NAME));
  });

  test("a run that never passes makes exactly maxRetries repairs", async () => {
    const { executor, completer, runner } = setup({ maxRetries: 2, scriptExitCode: 1 });

    const result = await executor.execute({ kind: "start", sessionId: "coding-2", input: { objective: "square" } });

    expect(result.status).toBe("completed");
    expect(result.state.success).toBe(false);
    expect(result.state.iterations).toBe(2);
    expect(result.steps).toBe(10);
    expect(completer.forModel(MODELS.tester)).toHaveLength(1);
    expect(completer.forModel(MODELS.coder)).toHaveLength(3);
    expect(completer.forModel(MODELS.verifier)).toHaveLength(0);
    // The test runner is skipped when the script crashes
    expect(runner.calls).toHaveLength(3);
    expect(result.state.output).toBe("--- SCRIPT EXECUTION ---\nExit code: 1\nSTDERR:\nboom");
  });

  test("a verifier rejection feeds the critique back to the coder", async () => {
    const { executor, completer } = setup({ verdicts: ["FAILED: the inputs are all zero", "PASSED"] });

    const result = await executor.execute({ kind: "start", sessionId: "coding-3", input: { objective: "square" } });

    expect(result.state.success).toBe(true);
    expect(result.state.iterations).toBe(1);
    const coderPrompts = completer.forModel(MODELS.coder).map((request) => request.userPrompt);
    expect(coderPrompts).toHaveLength(2);
    expect(coderPrompts[1]).toContain("Critique: the inputs are all zero");
  });
});

describe("coderPromptKind", () => {
  const base: CodingRecord = {
    objective: "o",
    testCode: "",
    code: "",
    output: "",
    verificationError: null,
    success: false,
    iterations: 0,
  };

  test("selects the prompt from the repair count and last critique", () => {
    expect(coderPromptKind(base)).toBe("first-attempt");
    expect(coderPromptKind({ ...base, iterations: 3 })).toBe("runtime-failure");
    expect(coderPromptKind({ ...base, iterations: 3, verificationError: "flat plot" })).toBe("verifier-rejection");
  });
});
