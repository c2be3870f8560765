import { appendOrdered, defineState, overwrite } from "../../graph/annotation.ts";
import type { StateFromAnnotation } from "../../graph/annotation.ts";

export const QuickResearchState = defineState({
  topic: overwrite(""),
  /** Queries not yet researched */
  plan: overwrite<string[]>([]),
  /** One block of sourced notes per researched query */
  notes: appendOrdered<string>(),
  finalReport: overwrite(""),
});

export type QuickResearchSchema = typeof QuickResearchState;
export type QuickResearchRecord = StateFromAnnotation<QuickResearchSchema>;
