import { defineState, overwrite } from "../../graph/annotation.ts";
import type { StateFromAnnotation } from "../../graph/annotation.ts";

export const QuorumState = defineState({
  question: overwrite(""),
  answer: overwrite(""),
  /** Feedback from the current review round */
  critiques: overwrite<string[]>([]),
  /** Completed refinement rounds */
  iteration: overwrite(0),
});

export type QuorumSchema = typeof QuorumState;
export type QuorumRecord = StateFromAnnotation<QuorumSchema>;
