/**
 * Tests for marker classifiers and classifier stages
 */

import { describe, expect, test } from "vitest";
import { defineState, overwrite } from "./annotation.ts";
import { createStage, graph } from "./builder.ts";
import { classifierStage, defineClassifier } from "./classifier.ts";
import { createExecutor } from "./compiled.ts";
import { GraphDefinitionError } from "./errors.ts";
import { TERMINAL } from "./types.ts";

const arbiter = defineClassifier({
  markers: { LOGIC: "TYPE: LOGIC", SYNTAX: "TYPE: SYNTAX" },
  precedence: ["LOGIC", "SYNTAX"],
  fallback: "SYNTAX",
});

describe("defineClassifier", () => {
  test("matches the logic marker", () => {
    expect(arbiter.classify("TYPE: LOGIC\nThe lemma does not hold for n = 0.")).toEqual({
      label: "LOGIC",
      matched: true,
      ambiguous: false,
      detail: "The lemma does not hold for n = 0.",
    });
  });

  test("matches the syntax marker", () => {
    const result = arbiter.classify("Analysis done. TYPE: SYNTAX missing `by`");

    expect(result.label).toBe("SYNTAX");
    expect(result.detail).toBe("Analysis done.  missing `by`");
  });

  test("falls back deterministically when no marker is present", () => {
    const results = [1, 2, 3].map(() => arbiter.classify("unknown identifier 'foo'"));

    for (const result of results) {
      expect(result).toEqual({
        label: "SYNTAX",
        matched: false,
        ambiguous: false,
        detail: "unknown identifier 'foo'",
      });
    }
  });

  test("precedence decides when both markers appear", () => {
    const result = arbiter.classify("TYPE: SYNTAX or maybe TYPE: LOGIC");

    expect(result.label).toBe("LOGIC");
    expect(result.ambiguous).toBe(true);
    expect(result.detail).toBe("or maybe");
  });

  test("rejects a fallback outside the label set", () => {
    expect(() =>
      defineClassifier<"A" | "B">({
        markers: { A: "[A]", B: "[B]" },
        precedence: ["A"],
        fallback: "B",
      }),
    ).toThrow('Classifier fallback "B" is not in its precedence list');
  });

  test("rejects empty markers", () => {
    expect(() =>
      defineClassifier({ markers: { A: "" }, precedence: ["A"], fallback: "A" }),
    ).toThrow(GraphDefinitionError);
  });
});

describe("classifierStage", () => {
  const State = defineState({
    log: overwrite(""),
    category: overwrite(""),
    critique: overwrite(""),
    route: overwrite(""),
  });
  type S = typeof State;

  function build(analysis: string) {
    return graph(State)
      .start(createStage<S>("kernel", async () => ({ log: "error: type mismatch" })))
      .then(
        classifierStage<S, "LOGIC" | "SYNTAX">({
          id: "arbiter",
          classifier: arbiter,
          artifact: (state) => state.log,
          analyze: async (artifact) => `${analysis}\n${artifact}`,
          output: (result) => ({ category: result.label, critique: result.detail }),
        }),
      )
      .branch((state) => (state.category === "LOGIC" ? "repair-logic" : "repair-syntax"), {
        "repair-logic": "theorist",
        "repair-syntax": "formalizer",
      })
      .addStage(createStage<S>("theorist", async () => ({ route: "theorist" })))
      .addStage(createStage<S>("formalizer", async () => ({ route: "formalizer" })))
      .addEdge("theorist", TERMINAL)
      .addEdge("formalizer", TERMINAL)
      .compile();
  }

  test("routes logic failures to the strategy repair stage", async () => {
    const result = await createExecutor(build("TYPE: LOGIC")).execute({ kind: "start" });

    expect(result.state.route).toBe("theorist");
    expect(result.state.critique).toBe("error: type mismatch");
  });

  test("routes syntax failures to the artifact repair stage", async () => {
    const result = await createExecutor(build("TYPE: SYNTAX")).execute({ kind: "start" });

    expect(result.state.route).toBe("formalizer");
  });

  test("routes unmarked analyses to the fallback repair stage", async () => {
    const result = await createExecutor(build("no idea")).execute({ kind: "start" });

    expect(result.state.category).toBe("SYNTAX");
    expect(result.state.route).toBe("formalizer");
    expect(result.state.critique).toBe("no idea\nerror: type mismatch");
  });
});
