import { defineWorkflow } from "../types.ts";
import { createProofWorkflow, proofStepBudget } from "./graph.ts";
import type { ProofRecord } from "./state.ts";

export function renderProofReport(state: ProofRecord): string {
  const status = state.success ? "VERIFIED" : "NOT VERIFIED";
  const sections = [
    `# ${state.objective}`,
    `Status: ${status} after ${state.iterations} repair(s)`,
    `## Informal proof\n\n${state.informalProof}`,
    `## Lean\n\n\`\`\`lean\n${state.leanCode}\n\`\`\``,
  ];
  if (!state.success && state.compilerOutput) {
    sections.push(`## Compiler output\n\n\`\`\`\n${state.compilerOutput}\n\`\`\``);
  }
  if (!state.success && state.critique) {
    sections.push(`## Last diagnosis (${state.errorType ?? "SYNTAX"})\n\n${state.critique}`);
  }
  return `${sections.join("\n\n")}\n`;
}

export const proofWorkflowDefinition = defineWorkflow({
  name: "proof",
  description: "Sketch a proof, formalize it in Lean and repair it from compiler feedback",
  inputLabel: "Theorem to prove",
  stageDescriptions: {
    theorist: "Sketching the proof",
    formalizer: "Writing Lean code",
    kernel: "Compiling",
    arbiter: "Diagnosing the failure",
  },
  create: createProofWorkflow,
  stepBudget: (config) => proofStepBudget(config.limits),
  input: (objective) => ({ objective }),
  output: renderProofReport,
});
