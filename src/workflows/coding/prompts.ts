/**
 * Prompts and response parsing for the coding workflow.
 */

import type { RolePrompt } from "../../services/completion.ts";
import type { CodingRecord } from "./state.ts";

export const SCRIPT_NAME = "temp_sandbox_script.py";
export const TEST_NAME = "temp_generated_tests.py";
export const PLOT_NAME = "output_plot.png";

const MODULE_NAME = SCRIPT_NAME.replace(/\.py$/, "");

export function buildTesterPrompt(objective: string): RolePrompt {
  return {
    system: [
      "You are a QA engineer practicing test-driven development.",
      `Write a pytest test file for a Python module named \`${MODULE_NAME}\`.`,
      "1. Derive the expected function signatures from the objective.",
      "2. Cover edge cases as well as the happy path.",
      `3. Import the module with \`import ${MODULE_NAME} as app\`.`,
      "4. Output only Python code.",
    ].join("\n"),
    user: `Objective: ${objective}`,
  };
}

const CODER_RULES = [
  "Rules:",
  "1. Output only the code, inside a ```python block.",
  "2. Never call input().",
  "3. Call matplotlib.use('Agg') before importing pyplot.",
  `4. Save any plot to '${PLOT_NAME}'.`,
  "5. The code must pass the provided test suite and expose what it imports.",
  '6. Include an `if __name__ == "__main__":` section that exercises the code with meaningful inputs.',
].join("\n");

export type CoderPromptKind = "first-attempt" | "runtime-failure" | "verifier-rejection";

/**
 * Which coder prompt applies: the first attempt, a repair after a failed
 * run, or a repair after the verifier rejected a passing run.
 */
export function coderPromptKind(state: Readonly<CodingRecord>): CoderPromptKind {
  if (state.iterations === 0) return "first-attempt";
  return state.verificationError === null ? "runtime-failure" : "verifier-rejection";
}

export function buildCoderPrompt(state: Readonly<CodingRecord>): RolePrompt {
  const tests = `\`\`\`python\n${state.testCode}\n\`\`\``;
  switch (coderPromptKind(state)) {
    case "first-attempt":
      return {
        user: [
          `Objective: ${state.objective}`,
          "",
          `Test suite to pass:\n${tests}`,
          "",
          `Write \`${SCRIPT_NAME}\` so that it passes these tests and meets the objective.`,
          CODER_RULES,
        ].join("\n"),
        temperature: 0.2,
      };
    case "runtime-failure":
      return {
        user: [
          `Objective: ${state.objective}`,
          `The script failed while running or testing:\n${state.output}`,
          "",
          `Tests:\n${tests}`,
          "Fix the code so that it runs and passes the tests. Output only the fixed code.",
        ].join("\n"),
        temperature: 0.2,
      };
    case "verifier-rejection":
      return {
        user: [
          `Objective: ${state.objective}`,
          `The verifier rejected the output.\nCritique: ${state.verificationError ?? ""}`,
          "",
          `Previous output:\n${state.output}`,
          "Change the code to address the critique. Output only the fixed code.",
        ].join("\n"),
        temperature: 0.2,
      };
  }
}

export function buildVerifierPrompt(state: Readonly<CodingRecord>): RolePrompt {
  return {
    user: [
      `Objective: ${state.objective}`,
      "",
      `--- SOURCE CODE ---\n${state.code}`,
      "",
      `--- EXECUTION LOG ---\n${state.output}`,
      "",
      "The automated tests passed. Check the logic and rigor:",
      "1. Inspect the `__main__` block. Are its inputs trivial (zero angles, zero time, zero mass)?",
      "2. Trivial inputs make the result meaningless even when it runs.",
      "3. Does the program actually do what the objective asks?",
      "",
      "Reply 'FAILED: <explanation>' if the inputs are trivial, the plot is a flat line or the logic is wrong.",
      "Reply 'PASSED' otherwise.",
    ].join("\n"),
  };
}

export interface Verdict {
  passed: boolean;
  /** Critique for the coder; null when passed */
  critique: string | null;
}

/**
 * Read the verifier's answer. An explicit "FAILED:" wins over "PASSED";
 * an answer with neither marker counts as a rejection.
 */
export function parseVerdict(text: string): Verdict {
  if (text.includes("FAILED:")) {
    return { passed: false, critique: text.replace("FAILED:", "").trim() };
  }
  if (text.includes("PASSED")) {
    return { passed: true, critique: null };
  }
  return { passed: false, critique: text.trim() || "The verifier gave no verdict." };
}
