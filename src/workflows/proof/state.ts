import { defineState, overwrite } from "../../graph/annotation.ts";
import type { StateFromAnnotation } from "../../graph/annotation.ts";

export type ProofErrorType = "SYNTAX" | "LOGIC";

/**
 * Informal sketch, formal proof and the arbiter's diagnosis of the last
 * failed compilation. `iterations` counts repairs of either kind.
 */
export const ProofState = defineState({
  objective: overwrite(""),
  informalProof: overwrite(""),
  leanCode: overwrite(""),
  compilerOutput: overwrite(""),
  errorType: overwrite<ProofErrorType | null>(null),
  critique: overwrite(""),
  success: overwrite(false),
  iterations: overwrite(0),
});

export type ProofSchema = typeof ProofState;
export type ProofRecord = StateFromAnnotation<ProofSchema>;
