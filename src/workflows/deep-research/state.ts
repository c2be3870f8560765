import { appendOrdered, defineState, overwrite } from "../../graph/annotation.ts";
import type { StateFromAnnotation } from "../../graph/annotation.ts";

/**
 * Deep research state.
 *
 * Report-level fields live for the whole session; the section fields are
 * reset by the section initiator each time a new section is entered.
 */
export const DeepResearchState = defineState({
  // Report
  mainTopic: overwrite(""),
  sectionPlan: overwrite<string[]>([]),
  sectionIndex: overwrite(0),
  completedSections: appendOrdered<string>(),
  /** Every search query issued, in issuance order */
  searchLog: appendOrdered<string>(),
  finalReport: overwrite(""),

  // Current section
  topic: overwrite(""),
  queries: overwrite<string[]>([]),
  notes: overwrite<string[]>([]),
  draft: overwrite(""),
  critiques: overwrite<string[]>([]),
  loopCount: overwrite(0),
});

export type DeepResearchSchema = typeof DeepResearchState;
export type DeepResearchRecord = StateFromAnnotation<DeepResearchSchema>;
