/**
 * Tests for state annotations and merge policies
 */

import { describe, expect, test } from "vitest";
import {
  annotation,
  appendOrdered,
  applyStateUpdate,
  defineState,
  initializeState,
  isAppendField,
  overwrite,
} from "./annotation.ts";
import { SchemaViolationError } from "./errors.ts";

const TestState = defineState({
  topic: overwrite(""),
  attempts: overwrite(0),
  notes: appendOrdered<string>(),
  verdict: overwrite<string | null>(null),
});

describe("initializeState", () => {
  test("fills every field with its default", () => {
    expect(initializeState(TestState)).toEqual({
      topic: "",
      attempts: 0,
      notes: [],
      verdict: null,
    });
  });

  test("applies input as an overwrite of provided fields", () => {
    const state = initializeState(TestState, { topic: "tides", notes: ["seed"] });

    expect(state.topic).toBe("tides");
    expect(state.notes).toEqual(["seed"]);
    expect(state.attempts).toBe(0);
  });

  test("hands out independent copies of array defaults", () => {
    const first = initializeState(TestState);
    const second = initializeState(TestState);

    first.notes.push("mutated");

    expect(second.notes).toEqual([]);
  });

  test("rejects undeclared input fields", () => {
    expect(() => initializeState(TestState, { unknown: 1 })).toThrow(SchemaViolationError);
  });
});

describe("applyStateUpdate", () => {
  test("overwrite fields replace the previous value", () => {
    const current = initializeState(TestState, { topic: "old" });
    const next = applyStateUpdate(TestState, current, { topic: "new" });

    expect(next.topic).toBe("new");
  });

  test("append fields concatenate in emission order", () => {
    let state = initializeState(TestState);
    state = applyStateUpdate(TestState, state, { notes: ["a", "b"] });
    state = applyStateUpdate(TestState, state, { notes: ["c"] });

    expect(state.notes).toEqual(["a", "b", "c"]);
  });

  test("a single non-array value is appended as one element", () => {
    const state = applyStateUpdate(TestState, initializeState(TestState), { notes: "solo" });

    expect(state.notes).toEqual(["solo"]);
  });

  test("leaves fields absent from the update untouched", () => {
    const current = initializeState(TestState, { topic: "kept", attempts: 3 });
    const next = applyStateUpdate(TestState, current, { verdict: "PASSED" });

    expect(next).toEqual({ topic: "kept", attempts: 3, notes: [], verdict: "PASSED" });
  });

  test("does not mutate the current state", () => {
    const current = initializeState(TestState, { notes: ["x"] });
    applyStateUpdate(TestState, current, { notes: ["y"], topic: "changed" });

    expect(current.notes).toEqual(["x"]);
    expect(current.topic).toBe("");
  });

  test("rejects undeclared fields and names the stage", () => {
    const current = initializeState(TestState);

    try {
      applyStateUpdate(TestState, current, { draft: "text" }, "writer");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaViolationError);
      if (error instanceof SchemaViolationError) {
        expect(error.field).toBe("draft");
        expect(error.stageId).toBe("writer");
        expect(error.message).toBe('Stage "writer" wrote undeclared field "draft"');
      }
    }
  });

  test("append fields never shrink, even when an empty sequence is emitted", () => {
    let state = initializeState(TestState, { notes: ["a"] });
    const lengths: number[] = [state.notes.length];
    for (const update of [["b"], [], ["c", "d"], []]) {
      state = applyStateUpdate(TestState, state, { notes: update });
      lengths.push(state.notes.length);
    }

    expect(lengths).toEqual([1, 2, 2, 4, 4]);
    expect(state.notes).toEqual(["a", "b", "c", "d"]);
  });
});

describe("schema declaration", () => {
  test("frozen schemas reject policy changes", () => {
    const schema = defineState({ items: annotation<number[]>([], "append") });

    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.items)).toBe(true);
    expect(isAppendField(schema, "items")).toBe(true);
    expect(isAppendField(schema, "missing")).toBe(false);
  });
});
