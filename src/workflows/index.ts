/**
 * Workflows Module
 *
 * Registry of the workflows the CLI can run. Each entry is a compiled-graph
 * factory plus the metadata needed to start it and render its result.
 *
 * Available workflows:
 * - coding: test-first script generation with a bounded repair loop
 * - proof: informal sketch, Lean formalization and classified repairs
 * - deep-research: sectioned report with a nested research/review loop
 * - quick-research: a few searches and a cited report
 * - quorum: an answer refined through reviewer rounds
 */

import { codingWorkflowDefinition } from "./coding/definition.ts";
import { deepResearchWorkflowDefinition } from "./deep-research/definition.ts";
import { proofWorkflowDefinition } from "./proof/definition.ts";
import { quickResearchWorkflowDefinition } from "./quick-research/definition.ts";
import { quorumWorkflowDefinition } from "./quorum/definition.ts";
import type { WorkflowDefinition } from "./types.ts";

export type { PageFetcher, WorkflowDefinition, WorkflowDeps, WorkflowOutcome, WorkflowRunOptions } from "./types.ts";
export { defineWorkflow } from "./types.ts";

export { createCodingWorkflow, CODING_STAGE_IDS } from "./coding/graph.ts";
export { createProofWorkflow, PROOF_STAGE_IDS, proofErrorClassifier } from "./proof/graph.ts";
export { createDeepResearchWorkflow, DEEP_RESEARCH_STAGE_IDS } from "./deep-research/graph.ts";
export { createQuickResearchWorkflow, QUICK_RESEARCH_STAGE_IDS } from "./quick-research/graph.ts";
export { createQuorumWorkflow, QUORUM_STAGE_IDS } from "./quorum/graph.ts";

const WORKFLOWS: readonly WorkflowDefinition[] = [
  codingWorkflowDefinition,
  proofWorkflowDefinition,
  deepResearchWorkflowDefinition,
  quickResearchWorkflowDefinition,
  quorumWorkflowDefinition,
];

const registry = new Map(WORKFLOWS.map((definition) => [definition.name, definition]));

export function listWorkflows(): readonly WorkflowDefinition[] {
  return WORKFLOWS;
}

export function getWorkflow(name: string): WorkflowDefinition | undefined {
  return registry.get(name);
}

export function workflowNames(): string[] {
  return WORKFLOWS.map((definition) => definition.name);
}
