/**
 * Prompts for the proof workflow.
 */

import type { RolePrompt } from "../../services/completion.ts";
import type { ProofRecord } from "./state.ts";

export const LEAN_FILE = "proof_attempt.lean";

export const LEAN_NOT_FOUND = "Error: 'lean' executable not found. Please install Lean4.";

const THEORIST_SYSTEM = [
  "You are an expert mathematician. Provide a rigorous INFORMAL proof sketch.",
  "1. State the definitions you need.",
  "2. State the theorem clearly.",
  "3. Give a step-by-step proof in natural language and LaTeX.",
  "4. Do not write Lean code yet.",
].join("\n");

export function buildTheoristPrompt(state: Readonly<ProofRecord>): RolePrompt {
  if (state.iterations === 0) {
    return { system: THEORIST_SYSTEM, user: `Objective: ${state.objective}` };
  }
  return {
    system: THEORIST_SYSTEM,
    user: [
      `Objective: ${state.objective}`,
      "The previous attempt failed.",
      `Arbiter critique: ${state.critique}`,
      "",
      "Restructure the proof strategy to avoid this logical pitfall.",
    ].join("\n"),
  };
}

const FORMALIZER_SYSTEM = [
  "You are a Lean 4 expert. Translate the informal proof into valid Lean 4 code.",
  "1. Use `import Mathlib` if needed.",
  "2. Declare all types and definitions explicitly.",
  "3. Output only the Lean code inside a ```lean block.",
].join("\n");

/**
 * A syntax repair patches the previous code; anything else translates the
 * current sketch from scratch.
 */
export function buildFormalizerPrompt(state: Readonly<ProofRecord>): RolePrompt {
  if (state.errorType === "SYNTAX") {
    return {
      system: FORMALIZER_SYSTEM,
      user: [
        "The previous Lean code had a syntax or tactic error.",
        `Error log:\n${state.compilerOutput}`,
        "",
        `Arbiter tip: ${state.critique}`,
        "",
        `Original code:\n\`\`\`lean\n${state.leanCode}\n\`\`\``,
        "Fix the code.",
      ].join("\n"),
    };
  }
  return {
    system: FORMALIZER_SYSTEM,
    user: [
      `Objective: ${state.objective}`,
      `Informal proof strategy:\n${state.informalProof}`,
      "",
      "Translate this into a complete `.lean` file.",
    ].join("\n"),
  };
}

export function buildArbiterPrompt(leanCode: string, compilerOutput: string): RolePrompt {
  return {
    system: [
      "You are an expert debugger for Lean 4.",
      "Analyze the error log and decide whether the failure is due to:",
      "1. SYNTAX: the math is likely right but the code or tactics are wrong ('unknown identifier', 'type mismatch').",
      "2. LOGIC: the proof strategy is flawed or the goal is unprovable ('unsolved goals', 'contradiction').",
      "",
      "Output format:",
      "TYPE: <SYNTAX or LOGIC>",
      "CRITIQUE: <short explanation of what to fix>",
    ].join("\n"),
    user: `Lean code:\n\`\`\`lean\n${leanCode}\n\`\`\`\nCompiler output:\n${compilerOutput}\n`,
  };
}
