import { defineWorkflow } from "../types.ts";
import { codingStepBudget, createCodingWorkflow } from "./graph.ts";
import type { CodingRecord } from "./state.ts";

/**
 * Markdown report of the best artifact produced, passing or not.
 */
export function renderCodingReport(state: CodingRecord): string {
  const status = state.success ? "PASSED" : "NOT PASSED";
  const sections = [
    `# ${state.objective}`,
    `Status: ${status} after ${state.iterations} repair(s)`,
    `## Script\n\n\`\`\`python\n${state.code}\n\`\`\``,
    `## Tests\n\n\`\`\`python\n${state.testCode}\n\`\`\``,
  ];
  if (state.verificationError) {
    sections.push(`## Last critique\n\n${state.verificationError}`);
  }
  if (state.output) {
    sections.push(`## Last run\n\n\`\`\`\n${state.output}\n\`\`\``);
  }
  return `${sections.join("\n\n")}\n`;
}

export const codingWorkflowDefinition = defineWorkflow({
  name: "coding",
  description: "Write tests first, then generate and repair a script until it passes review",
  inputLabel: "Objective",
  stageDescriptions: {
    tester: "Writing the test suite",
    coder: "Writing the script",
    executor: "Running the script and tests",
    verifier: "Reviewing the output",
  },
  create: createCodingWorkflow,
  stepBudget: (config) => codingStepBudget(config.limits),
  input: (objective) => ({ objective }),
  output: renderCodingReport,
});
