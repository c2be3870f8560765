import { defineWorkflow } from "../types.ts";
import { createQuickResearchWorkflow, quickResearchStepBudget } from "./graph.ts";

export const quickResearchWorkflowDefinition = defineWorkflow({
  name: "quick-research",
  description: "Search a few planned queries and write a cited report",
  inputLabel: "Research topic",
  stageDescriptions: {
    planner: "Planning searches",
    researcher: "Researching",
    writer: "Writing the report",
  },
  create: createQuickResearchWorkflow,
  stepBudget: () => quickResearchStepBudget(),
  input: (topic) => ({ topic }),
  output: (state) => state.finalReport,
});
