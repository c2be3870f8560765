import { describe, expect, test } from "vitest";
import { createExecutor } from "../../graph/compiled.ts";
import { RecordingSearch, ScriptedCompleter, testConfig, testDeps } from "../test-doubles.ts";
import { createQuickResearchWorkflow, routeQuickResearch } from "./graph.ts";

const MODELS = { planner: "planner-m", researcher: "notes-m", writer: "writer-m" };

function setup(plan: string) {
  const config = testConfig({ models: { quickResearch: MODELS } });
  let noteCalls = 0;
  const completer = new ScriptedCompleter((request) => {
    if (request.model === MODELS.planner) return plan;
    if (request.model === MODELS.researcher) return `- fact ${++noteCalls} (Source: https://example.com/${noteCalls})`;
    return "REPORT";
  });
  const search = new RecordingSearch((query) => [{ title: query, url: `https://example.com/${query}`, snippet: "s" }]);
  const workflow = createQuickResearchWorkflow(testDeps({ config, completer, search }));
  return { executor: createExecutor(workflow), completer, search };
}

describe("quick research workflow", () => {
  test("researches each planned query once, in order, then writes", async () => {
    const { executor, completer, search } = setup("1. wave farms\n2. tidal lagoons\n3. ocean thermal\n4. extra");

    const result = await executor.execute({ kind: "start", sessionId: "qr-1", input: { topic: "Ocean energy" } });

    expect(result.status).toBe("completed");
    expect(result.steps).toBe(5);
    expect(search.queries).toEqual(["wave farms", "tidal lagoons", "ocean thermal"]);
    expect(result.state.plan).toEqual([]);
    expect(result.state.notes).toEqual([
      "### Sources for 'wave farms':\n- fact 1 (Source: https://example.com/1)\n\n",
      "### Sources for 'tidal lagoons':\n- fact 2 (Source: https://example.com/2)\n\n",
      "### Sources for 'ocean thermal':\n- fact 3 (Source: https://example.com/3)\n\n",
    ]);
    expect(result.state.finalReport).toBe("REPORT");
    expect(completer.forModel(MODELS.writer)[0]?.userPrompt).toContain(
      "Research notes:\n### Sources for 'wave farms':",
    );
  });

  test("falls back to the topic when the planner returns nothing", async () => {
    const { executor, search } = setup("\n\n");

    const result = await executor.execute({ kind: "start", sessionId: "qr-2", input: { topic: "Ocean energy" } });

    expect(search.queries).toEqual(["Ocean energy"]);
    expect(result.steps).toBe(3);
  });
});

describe("routeQuickResearch", () => {
  test("keeps researching while queries remain", () => {
    const base = { topic: "t", notes: [], finalReport: "" };
    expect(routeQuickResearch({ ...base, plan: ["q"] })).toBe("research");
    expect(routeQuickResearch({ ...base, plan: [] })).toBe("write");
  });
});
