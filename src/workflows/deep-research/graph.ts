/**
 * Deep Research Workflow
 *
 * Two-level loop. The outer loop walks the section plan; the inner loop
 * researches, drafts, reviews and refines one section a bounded number of
 * times:
 *
 *   global-planner → section-initiator → query-planner → researcher → writer
 *                          ↑                   ↑                        │
 *                          │                   └── loop ── refiner ← quorum
 *                          │                                 │ done
 *                          └──────── next ── section-compiler ←┘
 *                                                │ finalize
 *                                          final-editor → END
 *
 * `completedSections` and `searchLog` are append-ordered; the per-section
 * fields are reset whenever a section is entered.
 */

import { createStage, graph } from "../../graph/builder.ts";
import { defineLoopScope, innerLoopRouter, outerLoopRouter, subtaskCursor } from "../../graph/governor.ts";
import type { CompiledGraph, GraphConfig } from "../../graph/types.ts";
import { forRoles, isCompletionError } from "../../services/completion.ts";
import { formatSearchResults } from "../../services/search.ts";
import { log, logWarn } from "../../utils/logger.ts";
import { mapInOrder } from "../../utils/ordered.ts";
import { findUrl, parseListResponse } from "../shared.ts";
import type { WorkflowDeps } from "../types.ts";
import {
  buildClaimQueryPrompt,
  buildCritiquePrompt,
  buildDraftPrompt,
  buildEditorPrompt,
  buildExtractionPrompt,
  buildGapQueriesPrompt,
  buildInitialQueriesPrompt,
  buildOutlinePrompt,
  buildRefinePrompt,
  buildRevisionPrompt,
  buildSelectorPrompt,
} from "./prompts.ts";
import { DeepResearchState } from "./state.ts";
import type { DeepResearchSchema } from "./state.ts";

export const DEEP_RESEARCH_STAGE_IDS = {
  globalPlanner: "global-planner",
  sectionInitiator: "section-initiator",
  queryPlanner: "query-planner",
  researcher: "researcher",
  writer: "writer",
  quorum: "quorum",
  refiner: "refiner",
  sectionCompiler: "section-compiler",
  finalEditor: "final-editor",
} as const;

const MAX_SECTIONS = 6;

const isString = (value: unknown): value is string => typeof value === "string";

/**
 * Text of one completed section as it appears in the report body.
 */
export function formatSection(topic: string, draft: string): string {
  return `## ${topic}\n\n${draft}\n\n`;
}

/**
 * Upper bound on stage executions for a full plan: each section runs its
 * initiator and compiler once and the five-stage refinement body at least
 * once, and the report is planned and edited once.
 */
export function deepResearchStepBudget({ maxSectionLoops }: { maxSectionLoops: number }): number {
  const perSection = 2 + 5 * Math.max(maxSectionLoops, 1);
  return 2 + MAX_SECTIONS * perSection;
}

export function createDeepResearchWorkflow(
  deps: Pick<WorkflowDeps, "config" | "completer" | "search" | "fetchPage">,
  graphConfig: GraphConfig = {},
): CompiledGraph<DeepResearchSchema> {
  const { config, completer, search, fetchPage } = deps;
  const models = config.models.deepResearch;
  const ask = forRoles(completer, {
    globalPlanner: models.globalPlanner,
    planner: models.planner,
    researcher: models.researcher,
    writer: models.writer,
    editor: models.editor,
    search: config.models.search,
  });
  const { maxSearchResults, fanOutConcurrency: concurrency } = config.limits;

  const sectionLoops = defineLoopScope<DeepResearchSchema>({
    name: "section-refinements",
    field: "loopCount",
    max: config.limits.maxSectionLoops,
  });
  const sections = subtaskCursor<DeepResearchSchema, string>({
    listField: "sectionPlan",
    indexField: "sectionIndex",
    guard: isString,
  });

  const globalPlanner = createStage<DeepResearchSchema>(
    DEEP_RESEARCH_STAGE_IDS.globalPlanner,
    async ({ state }) => {
      const response = await ask("globalPlanner", buildOutlinePrompt(state.mainTopic));
      const plan = isCompletionError(response) ? [] : parseListResponse(response, MAX_SECTIONS);
      if (plan.length === 0) {
        logWarn("Workflow", "empty_section_plan", { mainTopic: state.mainTopic });
      }
      return { sectionPlan: plan.length > 0 ? plan : [state.mainTopic], sectionIndex: 0 };
    },
    { writes: ["sectionPlan", "sectionIndex"], description: "Outline the report" },
  );

  const sectionInitiator = createStage<DeepResearchSchema>(
    DEEP_RESEARCH_STAGE_IDS.sectionInitiator,
    async ({ state }) => {
      const topic = sections.current(state);
      if (topic === undefined) {
        throw new Error(`No section at index ${state.sectionIndex} of ${state.sectionPlan.length}`);
      }
      log("Workflow", "section_started", { topic, index: state.sectionIndex, total: state.sectionPlan.length });
      return { topic, queries: [], notes: [], draft: "", critiques: [], ...sectionLoops.reset() };
    },
    {
      writes: ["topic", "queries", "notes", "draft", "critiques", "loopCount"],
      description: "Start the next section",
    },
  );

  const queryPlanner = createStage<DeepResearchSchema>(
    DEEP_RESEARCH_STAGE_IDS.queryPlanner,
    async ({ state }) => {
      const first = sectionLoops.count(state) === 0;
      const prompt = first
        ? buildInitialQueriesPrompt(state.mainTopic, state.topic)
        : buildGapQueriesPrompt(state.topic, state.critiques);
      const response = await ask("planner", prompt);
      const queries = isCompletionError(response) ? [] : parseListResponse(response, first ? 3 : 2);
      return { queries: queries.length > 0 ? queries : [state.topic] };
    },
    { writes: ["queries"], description: "Plan search queries" },
  );

  const researcher = createStage<DeepResearchSchema>(
    DEEP_RESEARCH_STAGE_IDS.researcher,
    async ({ state }) => {
      const notes = await mapInOrder(
        state.queries,
        async (query) => {
          const results = formatSearchResults(await search.search(query, maxSearchResults));
          const url = findUrl(await ask("search", buildSelectorPrompt(query, results)));
          if (url === null) {
            return `### Findings for '${query}':\n${results}\n`;
          }
          const content = await fetchPage(url);
          const summary = await ask("researcher", buildExtractionPrompt(query, url, content));
          return `### Deep Dive on '${query}':\n${summary}\n`;
        },
        { concurrency },
      );
      return { notes: [...state.notes, ...notes], searchLog: state.queries };
    },
    { writes: ["notes", "searchLog"], description: "Search and read sources" },
  );

  const writer = createStage<DeepResearchSchema>(
    DEEP_RESEARCH_STAGE_IDS.writer,
    async ({ state }) => {
      const notes = state.notes.join("\n");
      const prompt =
        sectionLoops.count(state) === 0
          ? buildDraftPrompt(state.mainTopic, state.topic, notes)
          : buildRevisionPrompt(state.topic, state.draft, notes);
      return { draft: await ask("writer", prompt) };
    },
    { writes: ["draft"], description: "Draft the section" },
  );

  const quorum = createStage<DeepResearchSchema>(
    DEEP_RESEARCH_STAGE_IDS.quorum,
    async ({ state }) => {
      const reviews = await mapInOrder(
        models.skeptics,
        async (model) => {
          const claim = buildClaimQueryPrompt(state.draft);
          const query = (
            await completer.complete({ model, userPrompt: claim.user, temperature: claim.temperature })
          )
            .replaceAll('"', "")
            .trim();
          const evidence = formatSearchResults(await search.search(query, maxSearchResults));
          const critique = buildCritiquePrompt(state.draft, query, evidence);
          const text = await completer.complete({
            model,
            userPrompt: critique.user,
            temperature: critique.temperature,
          });
          return { query, critique: `[${model}]: ${text}` };
        },
        { concurrency },
      );
      return {
        critiques: reviews.map((review) => review.critique),
        searchLog: reviews.map((review) => review.query),
      };
    },
    { writes: ["critiques", "searchLog"], description: "Review the draft" },
  );

  const refiner = createStage<DeepResearchSchema>(
    DEEP_RESEARCH_STAGE_IDS.refiner,
    async ({ state }) => {
      const draft = await ask("writer", buildRefinePrompt(state.draft, state.critiques, state.notes.join("\n")));
      return { draft, ...sectionLoops.tick(state) };
    },
    { writes: ["draft", "loopCount"], description: "Refine the draft" },
  );

  const sectionCompiler = createStage<DeepResearchSchema>(
    DEEP_RESEARCH_STAGE_IDS.sectionCompiler,
    async ({ state }) => ({
      completedSections: [formatSection(state.topic, state.draft)],
      ...sections.advance(state),
    }),
    { writes: ["completedSections", "sectionIndex"], description: "Save the section" },
  );

  const finalEditor = createStage<DeepResearchSchema>(
    DEEP_RESEARCH_STAGE_IDS.finalEditor,
    async ({ state }) => {
      const body = state.completedSections.join("\n");
      const report = await ask("editor", buildEditorPrompt(state.mainTopic, body));
      if (isCompletionError(report)) {
        logWarn("Workflow", "editor_failed", { error: report });
        return { finalReport: `# ${state.mainTopic}\n\n${body}` };
      }
      return { finalReport: report };
    },
    { writes: ["finalReport"], description: "Assemble the final report" },
  );

  return graph(DeepResearchState)
    .start(globalPlanner)
    .then(sectionInitiator)
    .then(queryPlanner)
    .then(researcher)
    .then(writer)
    .then(quorum)
    .then(refiner)
    .branch(innerLoopRouter(sectionLoops), {
      loop: DEEP_RESEARCH_STAGE_IDS.queryPlanner,
      done: DEEP_RESEARCH_STAGE_IDS.sectionCompiler,
    })
    .addStage(sectionCompiler)
    .from(DEEP_RESEARCH_STAGE_IDS.sectionCompiler)
    .branch(outerLoopRouter<DeepResearchSchema>({ listField: "sectionPlan", indexField: "sectionIndex" }), {
      next: DEEP_RESEARCH_STAGE_IDS.sectionInitiator,
      finalize: DEEP_RESEARCH_STAGE_IDS.finalEditor,
    })
    .addStage(finalEditor)
    .from(DEEP_RESEARCH_STAGE_IDS.finalEditor)
    .end()
    .compile(graphConfig);
}
