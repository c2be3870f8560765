/**
 * Quorum Workflow
 *
 *   drafter → critics → refiner ─┬─ critique → critics
 *                                └─ done → END
 *
 * Two reviewer personas critique the current answer each round; the
 * refiner rewrites it and advances the round counter.
 */

import { createStage, graph } from "../../graph/builder.ts";
import { defineLoopScope } from "../../graph/governor.ts";
import type { LoopScope } from "../../graph/governor.ts";
import type { CompiledGraph, GraphConfig } from "../../graph/types.ts";
import { TERMINAL } from "../../graph/types.ts";
import { forRoles } from "../../services/completion.ts";
import type { RolePrompt } from "../../services/completion.ts";
import { mapInOrder } from "../../utils/ordered.ts";
import type { WorkflowDeps } from "../types.ts";
import { QuorumState } from "./state.ts";
import type { QuorumRecord, QuorumSchema } from "./state.ts";

export const QUORUM_STAGE_IDS = {
  drafter: "drafter",
  critics: "critics",
  refiner: "refiner",
} as const;

interface Persona {
  role: "skeptic" | "structuralist";
  label: string;
  prompt: (state: Readonly<QuorumRecord>) => string;
}

const PERSONAS: readonly Persona[] = [
  {
    role: "skeptic",
    label: "Skeptic's Feedback",
    prompt: ({ question, answer }) =>
      [
        "You are 'The Skeptic'. Find flaws, logical fallacies, missing context or weak arguments in the answer.",
        "Be harsh but fair. If the answer is good, acknowledge it but find at least one improvement.",
        "",
        `Question: ${question}`,
        `Draft answer: ${answer}`,
        "",
        "Critique:",
      ].join("\n"),
  },
  {
    role: "structuralist",
    label: "Structuralist's Feedback",
    prompt: ({ answer }) =>
      [
        "You are 'The Structuralist'. Focus ONLY on clarity, structure, formatting and flow.",
        "Is the answer easy to read? Does it use headers effectively?",
        "",
        `Draft answer: ${answer}`,
        "",
        "Critique:",
      ].join("\n"),
  },
];

export function quorumRouter(rounds: LoopScope<QuorumSchema>) {
  return (state: Readonly<QuorumRecord>): "critique" | "done" => (rounds.exhausted(state) ? "done" : "critique");
}

function refinePrompt(state: Readonly<QuorumRecord>): RolePrompt {
  return {
    user: [
      "You are the lead editor. Rewrite the draft so that it incorporates the panel's feedback.",
      "",
      `Original question: ${state.question}`,
      `Current draft: ${state.answer}`,
      "",
      `--- Panel feedback ---\n${state.critiques.join("\n\n")}\n----------------------`,
      "",
      "Give only the rewritten answer, without a preamble about the changes.",
    ].join("\n"),
    temperature: 0.5,
  };
}

/** Drafter once, then critics and refiner for every round (at least one) */
export function quorumStepBudget({ maxQuorumRounds }: { maxQuorumRounds: number }): number {
  return 1 + 2 * Math.max(maxQuorumRounds, 1);
}

export function createQuorumWorkflow(
  deps: Pick<WorkflowDeps, "config" | "completer">,
  graphConfig: GraphConfig = {},
): CompiledGraph<QuorumSchema> {
  const { config } = deps;
  const ask = forRoles(deps.completer, config.models.quorum);

  const rounds = defineLoopScope<QuorumSchema>({
    name: "quorum-rounds",
    field: "iteration",
    max: config.limits.maxQuorumRounds,
  });

  const drafter = createStage<QuorumSchema>(
    QUORUM_STAGE_IDS.drafter,
    async ({ state }) => {
      const answer = await ask("drafter", {
        user: [
          "You are an expert assistant. Give a detailed, preliminary answer to the question.",
          "Be comprehensive but open to refinement.",
          "",
          `Question: ${state.question}`,
        ].join("\n"),
        temperature: 0.7,
      });
      return { answer, ...rounds.reset() };
    },
    { writes: ["answer", "iteration"], description: "Draft the first answer" },
  );

  const critics = createStage<QuorumSchema>(
    QUORUM_STAGE_IDS.critics,
    async ({ state }) => {
      const critiques = await mapInOrder(
        PERSONAS,
        async (persona) => `${persona.label}: ${await ask(persona.role, { user: persona.prompt(state), temperature: 0.3 })}`,
        { concurrency: config.limits.fanOutConcurrency },
      );
      return { critiques };
    },
    { writes: ["critiques"], description: "Collect reviewer feedback" },
  );

  const refiner = createStage<QuorumSchema>(
    QUORUM_STAGE_IDS.refiner,
    async ({ state }) => ({
      answer: await ask("drafter", refinePrompt(state)),
      critiques: [],
      ...rounds.tick(state),
    }),
    { writes: ["answer", "critiques", "iteration"], description: "Rewrite the answer" },
  );

  return graph(QuorumState)
    .start(drafter)
    .then(critics)
    .then(refiner)
    .branch(quorumRouter(rounds), {
      critique: QUORUM_STAGE_IDS.critics,
      done: TERMINAL,
    })
    .compile(graphConfig);
}
