/**
 * Tests for the GraphExecutor
 */

import { describe, expect, test } from "vitest";
import { appendOrdered, defineState, overwrite } from "./annotation.ts";
import { createStage, graph } from "./builder.ts";
import { createCheckpointStore, type CheckpointStore } from "./checkpointer.ts";
import { createExecutor } from "./compiled.ts";
import {
  SchemaViolationError,
  SessionExistsError,
  SessionLockedError,
  SessionNotFoundError,
  StageExecutionError,
  UnknownRouteError,
} from "./errors.ts";
import type { GraphConfig, ProgressEvent } from "./types.ts";
import { TERMINAL } from "./types.ts";

const LoopState = defineState({
  counter: overwrite(0),
  trail: appendOrdered<string>(),
});
type L = typeof LoopState;

// ============================================================================
// FIXTURES
// ============================================================================

interface Probe {
  calls: string[];
  /** Number of times stage "b" should throw before succeeding */
  failB: number;
}

/**
 * a -> b -> (counter < 3 ? a : TERMINAL)
 */
function buildLoop(probe: Probe, config: GraphConfig = {}) {
  return graph(LoopState)
    .start(
      createStage<L>("a", async ({ state }) => {
        probe.calls.push("a");
        return { counter: state.counter + 1, trail: ["a"] };
      }),
    )
    .then(
      createStage<L>("b", async () => {
        probe.calls.push("b");
        if (probe.failB > 0) {
          probe.failB--;
          throw new Error("b is down");
        }
        return { trail: ["b"] };
      }),
    )
    .branch((state) => (state.counter < 3 ? "again" : "stop"), {
      again: "a",
      stop: TERMINAL,
    })
    .compile(config);
}

function memoryStore(): CheckpointStore {
  return createCheckpointStore("memory");
}

describe("GraphExecutor.execute", () => {
  test("runs a loop to TERMINAL and checkpoints after every stage", async () => {
    const probe: Probe = { calls: [], failB: 0 };
    const checkpoints = memoryStore();
    const executor = createExecutor(buildLoop(probe, { checkpoints }));

    const result = await executor.execute({ kind: "start", sessionId: "loop-1" });

    expect(result.status).toBe("completed");
    expect(result.steps).toBe(6);
    expect(result.seq).toBe(6);
    expect(result.next).toBe(TERMINAL);
    expect(result.lastLabel).toBe("stop");
    expect(result.state).toEqual({ counter: 3, trail: ["a", "b", "a", "b", "a", "b"] });

    const stored = await checkpoints.load("loop-1");
    expect(stored?.seq).toBe(6);
    expect(stored?.stage).toBe(TERMINAL);
    expect(stored?.lastStage).toBe("b");
  });

  test("applies start input over the defaults", async () => {
    const probe: Probe = { calls: [], failB: 0 };
    const executor = createExecutor(buildLoop(probe));

    const result = await executor.execute({ kind: "start", input: { counter: 2, trail: ["seed"] } });

    expect(result.state.trail).toEqual(["seed", "a", "b"]);
    expect(result.sessionId).toMatch(/^session-/);
  });

  test("a failing stage ends the run as failed and keeps the checkpoint", async () => {
    const probe: Probe = { calls: [], failB: 1 };
    const checkpoints = memoryStore();
    const executor = createExecutor(buildLoop(probe, { checkpoints }));

    const result = await executor.execute({ kind: "start", sessionId: "flaky" });

    expect(result.status).toBe("failed");
    expect(result.error).toBeInstanceOf(StageExecutionError);
    expect(result.error?.message).toBe('Stage "b" failed after 1 attempt(s): b is down');
    expect(result.next).toBe("b");
    expect(result.seq).toBe(1);
    expect(result.state.trail).toEqual(["a"]);
  });

  test("resume continues at the stored pointer without re-running completed stages", async () => {
    const probe: Probe = { calls: [], failB: 1 };
    const checkpoints = memoryStore();
    const executor = createExecutor(buildLoop(probe, { checkpoints }));

    await executor.execute({ kind: "start", sessionId: "flaky" });
    const resumed = await executor.execute({ kind: "resume", sessionId: "flaky" });

    expect(resumed.status).toBe("completed");
    expect(resumed.steps).toBe(5);
    expect(probe.calls).toEqual(["a", "b", "b", "a", "b", "a", "b"]);
    expect(resumed.state.trail).toEqual(["a", "b", "a", "b", "a", "b"]);
  });

  test("append fields only grow across repeated interruption and resume", async () => {
    const probe: Probe = { calls: [], failB: 0 };
    const checkpoints = memoryStore();
    const executor = createExecutor(buildLoop(probe, { checkpoints, maxSteps: 1 }));

    let result = await executor.execute({ kind: "start", sessionId: "stepwise" });
    const lengths = [result.state.trail.length];
    let calls = 1;
    while (result.status !== "completed" && calls < 20) {
      result = await executor.execute({ kind: "resume", sessionId: "stepwise" });
      lengths.push(result.state.trail.length);
      calls++;
    }

    expect(calls).toBe(6);
    expect(lengths).toEqual([1, 2, 3, 4, 5, 6]);
    expect(result.state.trail).toEqual(["a", "b", "a", "b", "a", "b"]);
  });

  test("retries a stage per its retry config", async () => {
    const attempts: number[] = [];
    const compiled = graph(LoopState)
      .start(
        createStage<L>(
          "a",
          async ({ attempt }) => {
            attempts.push(attempt);
            if (attempt === 1) throw new Error("transient");
            return { counter: 1 };
          },
          { retry: { maxAttempts: 2, backoffMs: 0 } },
        ),
      )
      .end()
      .compile();

    const result = await createExecutor(compiled).execute({ kind: "start" });

    expect(result.status).toBe("completed");
    expect(attempts).toEqual([1, 2]);
  });

  test("reports the attempt count once retries are used up", async () => {
    const compiled = graph(LoopState)
      .start(
        createStage<L>(
          "a",
          async () => {
            throw new Error("boom");
          },
          { retry: { maxAttempts: 2, backoffMs: 0 } },
        ),
      )
      .end()
      .compile();

    const result = await createExecutor(compiled).execute({ kind: "start" });

    expect(result.status).toBe("failed");
    expect(result.error?.message).toBe('Stage "a" failed after 2 attempt(s): boom');
  });

  test("stops at maxSteps with status failed", async () => {
    const compiled = graph(LoopState)
      .start(createStage<L>("spin", async ({ state }) => ({ counter: state.counter + 1 })))
      .branch(() => "again", { again: "spin" })
      .compile({ maxSteps: 5 });

    const result = await createExecutor(compiled).execute({ kind: "start", sessionId: "spin" });

    expect(result.status).toBe("failed");
    expect(result.steps).toBe(5);
    expect(result.state.counter).toBe(5);
    expect(result.error?.message).toBe('Exceeded maximum steps (5) in session "spin"');
  });
});

describe("fatal errors", () => {
  test("an undeclared route label aborts with UnknownRouteError", async () => {
    const compiled = graph(LoopState)
      .start(createStage<L>("a", async () => ({})))
      .branch((): string => "sideways", { left: TERMINAL })
      .compile();

    const run = createExecutor(compiled).execute({ kind: "start" });

    await expect(run).rejects.toBeInstanceOf(UnknownRouteError);
  });

  test("unknown route errors list the declared labels", async () => {
    const compiled = graph(LoopState)
      .start(createStage<L>("a", async () => ({})))
      .branch((): string => "sideways", { left: TERMINAL, right: TERMINAL })
      .compile();

    await expect(createExecutor(compiled).execute({ kind: "start" })).rejects.toThrow(
      'Router for stage "a" returned "sideways"; expected one of: left, right',
    );
  });

  test("writing outside declared writes aborts with SchemaViolationError", async () => {
    const compiled = graph(LoopState)
      .start(createStage<L>("a", async () => ({ counter: 1 }), { writes: ["trail"] }))
      .end()
      .compile();

    await expect(createExecutor(compiled).execute({ kind: "start" })).rejects.toThrow(
      'Stage "a" wrote "counter" outside its declared writes',
    );
  });

  test("writing an undeclared field aborts with SchemaViolationError", async () => {
    const compiled = graph(LoopState)
      .start(
        createStage<L>("a", async () => {
          const update = { trail: ["x"], ghost: 1 };
          return update;
        }),
      )
      .end()
      .compile();

    await expect(createExecutor(compiled).execute({ kind: "start" })).rejects.toBeInstanceOf(
      SchemaViolationError,
    );
  });
});

describe("sessions", () => {
  test("starting an existing session fails with SessionExistsError", async () => {
    const checkpoints = memoryStore();
    const executor = createExecutor(buildLoop({ calls: [], failB: 0 }, { checkpoints }));
    await executor.execute({ kind: "start", sessionId: "dup" });

    await expect(executor.execute({ kind: "start", sessionId: "dup" })).rejects.toBeInstanceOf(
      SessionExistsError,
    );
  });

  test("resuming an unknown session fails with SessionNotFoundError", async () => {
    const executor = createExecutor(buildLoop({ calls: [], failB: 0 }));

    await expect(executor.execute({ kind: "resume", sessionId: "ghost" })).rejects.toBeInstanceOf(
      SessionNotFoundError,
    );
  });

  test("resumeOrStart starts a new session when none is stored", async () => {
    const executor = createExecutor(buildLoop({ calls: [], failB: 0 }));

    const result = await executor.resumeOrStart("fresh", { counter: 2 });

    expect(result.sessionId).toBe("fresh");
    expect(result.status).toBe("completed");
    expect(result.state).toEqual({ counter: 3, trail: ["a", "b"] });
  });

  test("a second traversal of a held session fails fast with SessionLockedError", async () => {
    const executor = createExecutor(buildLoop({ calls: [], failB: 0 }));
    const first = executor.stream({ kind: "start", sessionId: "busy" });
    await first.next();

    await expect(executor.execute({ kind: "resume", sessionId: "busy" })).rejects.toBeInstanceOf(
      SessionLockedError,
    );

    let step = await first.next();
    while (!step.done) {
      step = await first.next();
    }
    expect(step.value.status).toBe("completed");

    const resumed = await executor.execute({ kind: "resume", sessionId: "busy" });
    expect(resumed.steps).toBe(0);
  });

  test("resuming a TERMINAL session is a no-op by default", async () => {
    const probe: Probe = { calls: [], failB: 0 };
    const executor = createExecutor(buildLoop(probe));
    const done = await executor.execute({ kind: "start", sessionId: "finished" });

    const again = await executor.execute({ kind: "resume", sessionId: "finished" });

    expect(again.status).toBe("completed");
    expect(again.steps).toBe(0);
    expect(again.seq).toBe(done.seq);
    expect(again.state).toEqual(done.state);
    expect(probe.calls).toHaveLength(6);
  });

  test("the reenter policy runs the last stage once more and routes normally", async () => {
    const probe: Probe = { calls: [], failB: 0 };
    const executor = createExecutor(buildLoop(probe, { terminalResumePolicy: "reenter" }));
    await executor.execute({ kind: "start", sessionId: "finished" });

    const again = await executor.execute({ kind: "resume", sessionId: "finished" });

    expect(again.steps).toBe(1);
    expect(again.seq).toBe(7);
    expect(again.state.trail).toEqual(["a", "b", "a", "b", "a", "b", "b"]);
    expect(probe.calls.slice(-1)).toEqual(["b"]);
  });

  test("inspect restores stored state without running stages", async () => {
    const probe: Probe = { calls: [], failB: 1 };
    const executor = createExecutor(buildLoop(probe));
    await executor.execute({ kind: "start", sessionId: "peek" });

    const snapshot = await executor.inspect("peek");

    expect(snapshot).toEqual({ state: { counter: 1, trail: ["a"] }, next: "b", seq: 1 });
    expect(await executor.inspect("nothing")).toBeNull();
  });
});

describe("GraphExecutor.stream", () => {
  test("yields one step per stage with its chosen route", async () => {
    const executor = createExecutor(buildLoop({ calls: [], failB: 0 }));
    const steps: string[] = [];

    for await (const step of executor.stream({ kind: "start", input: { counter: 1 } })) {
      steps.push(`${step.stage}->${step.next}${step.label ? `:${step.label}` : ""}`);
    }

    expect(steps).toEqual(["a->b", "b->a:again", "a->b", `b->${TERMINAL}:stop`]);
  });

  test("emits progress events in order", async () => {
    const events: ProgressEvent["type"][] = [];
    const compiled = graph(LoopState)
      .start(createStage<L>("only", async () => ({ trail: ["x"] })))
      .end()
      .compile({ onProgress: (event) => events.push(event.type) });

    await createExecutor(compiled).execute({ kind: "start" });

    expect(events).toEqual([
      "session_started",
      "stage_started",
      "stage_completed",
      "route_taken",
      "checkpoint_saved",
    ]);
  });
});
