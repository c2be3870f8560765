import { defineWorkflow } from "../types.ts";
import { createQuorumWorkflow, quorumStepBudget } from "./graph.ts";

export const quorumWorkflowDefinition = defineWorkflow({
  name: "quorum",
  description: "Draft an answer, then refine it through reviewer rounds",
  inputLabel: "Question",
  stageDescriptions: {
    drafter: "Drafting",
    critics: "Reviewing",
    refiner: "Refining",
  },
  create: createQuorumWorkflow,
  stepBudget: (config) => quorumStepBudget(config.limits),
  input: (question) => ({ question }),
  output: (state) => state.answer,
});
