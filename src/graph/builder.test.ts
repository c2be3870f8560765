/**
 * Tests for GraphBuilder validation
 */

import { describe, expect, test } from "vitest";
import { appendOrdered, defineState, overwrite, type AnnotationRoot } from "./annotation.ts";
import { createStage, graph } from "./builder.ts";
import { GraphDefinitionError, SchemaViolationError } from "./errors.ts";
import { TERMINAL } from "./types.ts";

const State = defineState({
  value: overwrite(0),
  log: appendOrdered<string>(),
});
type S = typeof State;

// ============================================================================
// FIXTURES
// ============================================================================

function noop(id: string, writes?: Array<keyof S & string>) {
  return createStage<S>(id, async () => ({}), { writes });
}

describe("GraphBuilder", () => {
  test("fluent chain produces static edges and the entry stage", () => {
    const compiled = graph(State).start(noop("a")).then(noop("b")).end().compile();

    expect(compiled.entry).toBe("a");
    expect(compiled.edges.get("a")).toEqual({ kind: "static", from: "a", to: "b" });
    expect(compiled.edges.get("b")).toEqual({ kind: "static", from: "b", to: TERMINAL });
  });

  test("conditional edges keep their declared labels in order", () => {
    const compiled = graph(State)
      .start(noop("check"))
      .branch((state) => (state.value > 0 ? "done" : "again"), {
        done: TERMINAL,
        again: "check",
      })
      .compile();

    const edge = compiled.edges.get("check");
    expect(edge?.kind).toBe("conditional");
    if (edge?.kind === "conditional") {
      expect([...edge.routes.keys()]).toEqual(["done", "again"]);
    }
  });

  test("explicit API is equivalent to chaining", () => {
    const compiled = graph(State)
      .addStage(noop("a"))
      .addStage(noop("b"))
      .addEdge("a", "b")
      .addEdge("b", TERMINAL)
      .setEntry("a")
      .compile();

    expect([...compiled.stages.keys()]).toEqual(["a", "b"]);
  });

  test("rejects a graph without an entry stage", () => {
    const builder = graph(State).addStage(noop("a")).addEdge("a", TERMINAL);

    expect(() => builder.compile()).toThrow("Cannot compile graph without an entry stage");
  });

  test("rejects a stage without an outgoing edge", () => {
    const builder = graph(State).start(noop("a")).then(noop("b"));

    expect(() => builder.compile()).toThrow('Stage "b" has no outgoing edge');
  });

  test("rejects a second outgoing edge from the same stage", () => {
    const builder = graph(State).start(noop("a")).end();

    expect(() => builder.addEdge("a", "a")).toThrow(GraphDefinitionError);
  });

  test("rejects edges to unknown stages", () => {
    const builder = graph(State)
      .start(noop("a"))
      .branch(() => "go", { go: "missing" });

    expect(() => builder.compile()).toThrow('Edge from "a" targets unknown stage "missing"');
  });

  test("rejects duplicate and reserved stage ids", () => {
    expect(() => graph(State).addStage(noop("a")).addStage(noop("a"))).toThrow(
      'Stage with id "a" already exists',
    );
    expect(() => graph(State).addStage(noop(TERMINAL))).toThrow(GraphDefinitionError);
  });

  test("rejects declared writes to undeclared fields", () => {
    // A widened schema type lets the stage name any field.
    const wide: AnnotationRoot = State;
    const builder = graph(wide)
      .start({ id: "a", execute: async () => ({}), writes: ["ghost"] })
      .end();

    expect(() => builder.compile()).toThrow(SchemaViolationError);
    expect(() => builder.compile()).toThrow('Stage "a" declares write to undeclared field "ghost"');
  });

  test("rejects a conditional edge with no routes", () => {
    const routes: Record<string, string> = {};
    expect(() => graph(State).start(noop("a")).branch((): string => "x", routes)).toThrow(
      'Conditional edge from "a" declares no routes',
    );
  });

  test("then() needs a preceding stage", () => {
    expect(() => graph(State).then(noop("a"))).toThrow(
      "then() needs a preceding start(), then() or from()",
    );
  });
});
