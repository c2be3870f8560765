/**
 * Classifier-driven Branching
 *
 * Maps free text (a compiler log, a reviewer verdict) to exactly one label
 * from a closed set. Markers are searched verbatim; when several are present
 * the precedence order decides, and when none is present the declared
 * fallback is used. The result records which of those cases applied.
 */

import type { AnnotationRoot, StateFromAnnotation, StateUpdate } from "./annotation.ts";
import { GraphDefinitionError } from "./errors.ts";
import type { StageContext, StageDefinition, StageId } from "./types.ts";
import { log } from "../utils/logger.ts";

export interface Classification<L extends string> {
  label: L;
  /** False when the fallback label was used */
  matched: boolean;
  /** True when markers for more than one label were present */
  ambiguous: boolean;
  /** Input text with every marker removed, trimmed */
  detail: string;
}

export interface ClassifierDefinition<L extends string> {
  /** Marker text for each label */
  markers: Record<L, string>;
  /** Labels in the order they win when several markers are present */
  precedence: readonly L[];
  fallback: L;
}

export interface Classifier<L extends string> {
  readonly labels: readonly L[];
  readonly fallback: L;
  classify(text: string): Classification<L>;
}

function removeAll(text: string, marker: string): string {
  return text.split(marker).join("");
}

/**
 * Build a classifier over a closed label set.
 *
 * @example
 * ```typescript
 * const arbiter = defineClassifier({
 *   markers: { LOGIC: "TYPE: LOGIC", SYNTAX: "TYPE: SYNTAX" },
 *   precedence: ["LOGIC", "SYNTAX"],
 *   fallback: "SYNTAX",
 * });
 *
 * arbiter.classify("TYPE: LOGIC\nThe induction step is wrong.").label; // "LOGIC"
 * ```
 */
export function defineClassifier<L extends string>(
  definition: ClassifierDefinition<L>,
): Classifier<L> {
  const { markers, precedence, fallback } = definition;
  const labels = [...precedence];

  if (!labels.includes(fallback)) {
    throw new GraphDefinitionError(`Classifier fallback "${fallback}" is not in its precedence list`);
  }
  if (new Set(labels).size !== labels.length) {
    throw new GraphDefinitionError("Classifier precedence lists a label twice");
  }
  for (const label of labels) {
    if (!markers[label]) {
      throw new GraphDefinitionError(`Classifier label "${label}" has no marker`);
    }
  }

  return {
    labels,
    fallback,
    classify(text: string): Classification<L> {
      const present = labels.filter((label) => text.includes(markers[label]));
      const detail = labels
        .reduce((remaining, label) => removeAll(remaining, markers[label]), text)
        .trim();

      const winner = present[0];
      if (winner === undefined) {
        log("Classifier", "fallback", { label: fallback });
        return { label: fallback, matched: false, ambiguous: false, detail };
      }

      const ambiguous = present.length > 1;
      if (ambiguous) {
        log("Classifier", "ambiguous", { present, label: winner });
      }
      return { label: winner, matched: true, ambiguous, detail };
    },
  };
}

/**
 * Stage that reads a failure artifact from state, optionally analyzes it
 * (e.g., asks a model to diagnose it), classifies the result and writes
 * the outcome back.
 */
export function classifierStage<A extends AnnotationRoot, L extends string>(options: {
  id: StageId;
  classifier: Classifier<L>;
  artifact: (state: Readonly<StateFromAnnotation<A>>) => string;
  analyze?: (artifact: string, context: StageContext<A>) => Promise<string>;
  output: (result: Classification<L>, state: Readonly<StateFromAnnotation<A>>) => StateUpdate<A>;
  writes?: ReadonlyArray<keyof A & string>;
  description?: string;
}): StageDefinition<A> {
  const { id, classifier, artifact, analyze, output, writes, description } = options;
  return {
    id,
    writes,
    description,
    execute: async (context) => {
      const input = artifact(context.state);
      const text = analyze ? await analyze(input, context) : input;
      const result = classifier.classify(text);
      log("Classifier", "classified", {
        stage: id,
        label: result.label,
        matched: result.matched,
        ambiguous: result.ambiguous,
      });
      return output(result, context.state);
    },
  };
}
