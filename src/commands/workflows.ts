/**
 * Workflows command - List the registered workflows
 */

import { log } from "@clack/prompts";

import { COLORS } from "../utils/colors.ts";
import { listWorkflows } from "../workflows/index.ts";

export function workflowsCommand(): number {
  const lines = listWorkflows().map(
    (workflow) => `${COLORS.bold}${workflow.name.padEnd(16)}${COLORS.reset}${workflow.description}`,
  );
  log.message(lines.join("\n"));
  return 0;
}
