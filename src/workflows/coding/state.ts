import { defineState, overwrite } from "../../graph/annotation.ts";
import type { StateFromAnnotation } from "../../graph/annotation.ts";

/**
 * Test-first coding loop state.
 *
 * `iterations` counts repair passes and is advanced by the repair route.
 */
export const CodingState = defineState({
  objective: overwrite(""),
  testCode: overwrite(""),
  code: overwrite(""),
  /** Combined script and test run log */
  output: overwrite(""),
  /** Verifier critique of the last passing run */
  verificationError: overwrite<string | null>(null),
  success: overwrite(false),
  iterations: overwrite(0),
});

export type CodingSchema = typeof CodingState;
export type CodingRecord = StateFromAnnotation<CodingSchema>;
