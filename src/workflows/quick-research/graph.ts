/**
 * Quick Research Workflow
 *
 *   planner → researcher ─┬─ research → researcher
 *                         └─ write → writer → END
 *
 * Each researcher pass takes the first remaining query, so the loop ends
 * once the plan is empty.
 */

import { createStage, graph } from "../../graph/builder.ts";
import type { CompiledGraph, GraphConfig } from "../../graph/types.ts";
import { forRoles, isCompletionError } from "../../services/completion.ts";
import type { RolePrompt } from "../../services/completion.ts";
import { formatSearchResults } from "../../services/search.ts";
import { parseListResponse } from "../shared.ts";
import type { WorkflowDeps } from "../types.ts";
import { QuickResearchState } from "./state.ts";
import type { QuickResearchRecord, QuickResearchSchema } from "./state.ts";

export const QUICK_RESEARCH_STAGE_IDS = {
  planner: "planner",
  researcher: "researcher",
  writer: "writer",
} as const;

const PLAN_SIZE = 3;

export function routeQuickResearch(state: Readonly<QuickResearchRecord>): "research" | "write" {
  return state.plan.length > 0 ? "research" : "write";
}

function notesPrompt(results: string): RolePrompt {
  return {
    user: [
      "You are a researcher. Extract facts from the search results below.",
      "Include the source URL for every fact, formatted as:",
      "- [Fact or finding] (Source: [URL])",
      "",
      `Search results:\n${results}`,
      "",
      "Research notes:",
    ].join("\n"),
    temperature: 0,
  };
}

function reportPrompt(topic: string, notes: string): RolePrompt {
  return {
    user: [
      `You are a technical writer. Write a detailed Markdown report on '${topic}'.`,
      "",
      "Citation rules:",
      "1. Use inline citations such as [1], [2].",
      "2. End with a 'References' section.",
      "3. Every [n] must correspond to a URL from the research notes.",
      "4. Do not invent links.",
      "",
      `Research notes:\n${notes}`,
      "",
      "Final report:",
    ].join("\n"),
    temperature: 0,
  };
}

/** Planner, one researcher pass per planned query, writer */
export function quickResearchStepBudget(): number {
  return 2 + PLAN_SIZE;
}

export function createQuickResearchWorkflow(
  deps: Pick<WorkflowDeps, "config" | "completer" | "search">,
  graphConfig: GraphConfig = {},
): CompiledGraph<QuickResearchSchema> {
  const { config, search } = deps;
  const ask = forRoles(deps.completer, config.models.quickResearch);

  const planner = createStage<QuickResearchSchema>(
    QUICK_RESEARCH_STAGE_IDS.planner,
    async ({ state }) => {
      const response = await ask("planner", {
        system: `You are a research planning assistant. Given a topic, generate ${PLAN_SIZE} targeted search queries. Return ONLY the queries, one per line.`,
        user: state.topic,
        temperature: 0,
      });
      const plan = isCompletionError(response) ? [] : parseListResponse(response, PLAN_SIZE);
      return { plan: plan.length > 0 ? plan : [state.topic] };
    },
    { writes: ["plan"], description: "Plan search queries" },
  );

  const researcher = createStage<QuickResearchSchema>(
    QUICK_RESEARCH_STAGE_IDS.researcher,
    async ({ state }) => {
      const [query, ...rest] = state.plan;
      if (query === undefined) return {};
      const results = formatSearchResults(await search.search(query, config.limits.maxSearchResults));
      const summary = await ask("researcher", notesPrompt(results));
      return { plan: rest, notes: [`### Sources for '${query}':\n${summary}\n\n`] };
    },
    { writes: ["plan", "notes"], description: "Research the next query" },
  );

  const writer = createStage<QuickResearchSchema>(
    QUICK_RESEARCH_STAGE_IDS.writer,
    async ({ state }) => ({
      finalReport: await ask("writer", reportPrompt(state.topic, state.notes.join("\n"))),
    }),
    { writes: ["finalReport"], description: "Write the report" },
  );

  return graph(QuickResearchState)
    .start(planner)
    .then(researcher)
    .branch(routeQuickResearch, {
      research: QUICK_RESEARCH_STAGE_IDS.researcher,
      write: QUICK_RESEARCH_STAGE_IDS.writer,
    })
    .addStage(writer)
    .from(QUICK_RESEARCH_STAGE_IDS.writer)
    .end()
    .compile(graphConfig);
}
