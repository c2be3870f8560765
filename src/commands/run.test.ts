import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

const { prompts, CANCELLED } = vi.hoisted(() => {
  const CANCELLED = Symbol("cancelled");
  const prompts = {
    intro: vi.fn(),
    outro: vi.fn(),
    cancel: vi.fn(),
    text: vi.fn(),
    isCancel: vi.fn((value: unknown) => value === CANCELLED),
    spinner: vi.fn(() => ({ start: vi.fn(), stop: vi.fn(), message: vi.fn() })),
    log: { error: vi.fn(), warn: vi.fn(), info: vi.fn(), message: vi.fn(), success: vi.fn() },
  };
  return { prompts, CANCELLED };
});

vi.mock("@clack/prompts", () => prompts);

import { ScriptedCompleter, testDeps } from "../workflows/test-doubles.ts";
import { runCommand } from "./run.ts";

describe("runCommand", () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
    dir = await mkdtemp(join(tmpdir(), "loopgraph-run-"));
    configPath = join(dir, "loopgraph.config.json");
    await writeFile(
      configPath,
      JSON.stringify({
        storage: { checkpointDir: join(dir, "checkpoints"), workspaceDir: join(dir, "workspace") },
      }),
    );
  });

  afterEach(async () => {
    vi.mocked(console.log).mockRestore();
    await rm(dir, { recursive: true, force: true });
  });

  const answering = (answer: string) => () => testDeps({ completer: new ScriptedCompleter(() => answer) });

  test("rejects an unknown workflow", async () => {
    const code = await runCommand("haiku", "a poem", { config: configPath });

    expect(code).toBe(1);
    expect(prompts.log.error).toHaveBeenCalledWith("Unknown workflow 'haiku'");
    expect(prompts.log.message).toHaveBeenCalledWith(
      "Available workflows: coding, proof, deep-research, quick-research, quorum",
    );
  });

  test("requires a session id to resume", async () => {
    const code = await runCommand("quorum", undefined, { resume: true, config: configPath });

    expect(code).toBe(1);
    expect(prompts.log.error).toHaveBeenCalledWith("--resume needs --session <id>");
  });

  test("reports a missing config file", async () => {
    const missing = join(dir, "missing.json");
    const code = await runCommand("quorum", "Why tides?", { config: missing });

    expect(code).toBe(1);
    expect(prompts.log.error).toHaveBeenCalledWith(`Config file not found: ${missing}`);
  });

  test("writes the rendered output to the workspace", async () => {
    const code = await runCommand("quorum", "Why tides?", {
      session: "s1",
      config: configPath,
      deps: answering("final answer"),
    });

    expect(code).toBe(0);
    expect(await readFile(join(dir, "workspace", "quorum-s1.md"), "utf-8")).toBe("final answer");
    expect(console.log).toHaveBeenCalledWith("final answer");
    expect(prompts.text).not.toHaveBeenCalled();
  });

  test("prompts for the objective when none is given", async () => {
    prompts.text.mockResolvedValueOnce("  Why tides?  ");
    const completer = new ScriptedCompleter(() => "final answer");

    const code = await runCommand("quorum", undefined, {
      session: "s2",
      config: configPath,
      deps: () => testDeps({ completer }),
    });

    expect(code).toBe(0);
    expect(prompts.text).toHaveBeenCalledTimes(1);
    expect(completer.requests[0]?.userPrompt).toContain("Why tides?");
  });

  test("stops quietly when the prompt is cancelled", async () => {
    prompts.text.mockResolvedValueOnce(CANCELLED);

    const code = await runCommand("quorum", undefined, { session: "s3", config: configPath });

    expect(code).toBe(0);
    expect(prompts.cancel).toHaveBeenCalledWith("Operation cancelled.");
  });

  test("a failed session returns 1 with a resume hint, and resuming completes it", async () => {
    const failing = () =>
      testDeps({
        completer: new ScriptedCompleter(() => {
          throw new Error("connection refused");
        }),
      });

    const failed = await runCommand("quorum", "Why tides?", { session: "s4", config: configPath, deps: failing });

    expect(failed).toBe(1);
    expect(prompts.log.warn).toHaveBeenCalledWith('Stage "drafter" failed after 1 attempt(s): connection refused');
    expect(prompts.log.info).toHaveBeenCalledWith("Resume with: loopgraph run quorum --session s4 --resume");

    const resumed = await runCommand("quorum", "Why tides?", {
      session: "s4",
      resume: true,
      config: configPath,
      deps: answering("final answer"),
    });

    expect(resumed).toBe(0);
    expect(await readFile(join(dir, "workspace", "quorum-s4.md"), "utf-8")).toBe("final answer");
  });
});
