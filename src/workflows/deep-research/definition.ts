import { defineWorkflow } from "../types.ts";
import { createDeepResearchWorkflow, deepResearchStepBudget } from "./graph.ts";

export const deepResearchWorkflowDefinition = defineWorkflow({
  name: "deep-research",
  description: "Outline a report, then research, review and refine each section before editing the whole",
  inputLabel: "Main research topic",
  stageDescriptions: {
    "global-planner": "Outlining the report",
    "section-initiator": "Starting a section",
    "query-planner": "Planning searches",
    researcher: "Searching and reading",
    writer: "Drafting the section",
    quorum: "Reviewing the draft",
    refiner: "Refining the draft",
    "section-compiler": "Saving the section",
    "final-editor": "Editing the final report",
  },
  create: createDeepResearchWorkflow,
  stepBudget: (config) => deepResearchStepBudget(config.limits),
  input: (mainTopic) => ({ mainTopic }),
  output: (state) => state.finalReport,
});
