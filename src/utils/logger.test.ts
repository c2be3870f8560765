import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { DEBUG_ENV_VAR, errorMessage, isDebugEnabled, log, logWarn, resetDebugCache } from "./logger.ts";

describe("logger", () => {
  let original: string | undefined;

  beforeEach(() => {
    original = process.env[DEBUG_ENV_VAR];
    resetDebugCache();
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    if (original === undefined) {
      delete process.env[DEBUG_ENV_VAR];
    } else {
      process.env[DEBUG_ENV_VAR] = original;
    }
    resetDebugCache();
    vi.mocked(console.debug).mockRestore();
    vi.mocked(console.warn).mockRestore();
  });

  test("debug output is off unless LOOPGRAPH_DEBUG=1", () => {
    delete process.env[DEBUG_ENV_VAR];
    log("Executor", "stage_started", { step: 1 });

    expect(isDebugEnabled()).toBe(false);
    expect(console.debug).not.toHaveBeenCalled();
  });

  test("writes scoped debug lines when enabled", () => {
    process.env[DEBUG_ENV_VAR] = "1";
    log("Executor", "stage_started", { step: 1 });
    log("Checkpoint", "saved");

    expect(vi.mocked(console.debug).mock.calls).toEqual([
      ['[loopgraph:Executor] stage_started {"step":1}'],
      ["[loopgraph:Checkpoint] saved"],
    ]);
  });

  test("caches the flag until reset", () => {
    delete process.env[DEBUG_ENV_VAR];
    expect(isDebugEnabled()).toBe(false);

    process.env[DEBUG_ENV_VAR] = "1";
    expect(isDebugEnabled()).toBe(false);

    resetDebugCache();
    expect(isDebugEnabled()).toBe(true);
  });

  test("warnings are always written", () => {
    delete process.env[DEBUG_ENV_VAR];
    logWarn("Search", "provider_failed", { provider: "brave" });

    expect(console.warn).toHaveBeenCalledWith('[loopgraph:Search] provider_failed {"provider":"brave"}');
  });

  test("errorMessage renders thrown values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
