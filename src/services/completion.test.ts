import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import {
  type ChatCompletionsClient,
  OpenAICompleter,
  forRoles,
  isCompletionError,
  stripReasoning,
} from "./completion.ts";

function fakeClient(reply: string | Error) {
  const calls: ChatCompletionCreateParamsNonStreaming[] = [];
  const client: ChatCompletionsClient = {
    chat: {
      completions: {
        create: async (body) => {
          calls.push(body);
          if (reply instanceof Error) throw reply;
          return { choices: [{ message: { content: reply } }] };
        },
      },
    },
  };
  return { client, calls };
}

function completer(client: ChatCompletionsClient): OpenAICompleter {
  return new OpenAICompleter({ baseUrl: "http://localhost:0/v1", apiKey: "test-secret", timeoutMs: 1000, client });
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("stripReasoning", () => {
  test("removes every think block and trims", () => {
    expect(stripReasoning("<think>a</think> x <think>\nb\n</think>y ")).toBe("x y");
  });

  test("leaves text without reasoning alone", () => {
    expect(stripReasoning("plain")).toBe("plain");
  });
});

describe("OpenAICompleter", () => {
  test("sends system and user messages with the default temperature", async () => {
    const { client, calls } = fakeClient("<think>hmm</think>Answer");
    const text = await completer(client).complete({
      model: "qwen3:14b",
      systemPrompt: "Be brief.",
      userPrompt: "Question?",
    });

    expect(text).toBe("Answer");
    expect(calls).toHaveLength(1);
    expect(calls[0]?.model).toBe("qwen3:14b");
    expect(calls[0]?.temperature).toBe(0.1);
    expect(calls[0]?.messages).toEqual([
      { role: "system", content: "Be brief." },
      { role: "user", content: "Question?" },
    ]);
  });

  test("turns failures into an error string", async () => {
    const { client } = fakeClient(new Error("connection refused"));
    const text = await completer(client).complete({ model: "m", userPrompt: "hi" });

    expect(text).toBe("LLM Error: connection refused");
    expect(isCompletionError(text)).toBe(true);
  });

  describe("with an image", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "loopgraph-vision-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    test("attaches an existing image as a data URL", async () => {
      const image = join(dir, "plot.png");
      await writeFile(image, Buffer.from([1, 2, 3]));
      const { client, calls } = fakeClient("looks right");

      await completer(client).complete({ model: "vl", userPrompt: "Check", imagePath: image });

      expect(calls[0]?.messages).toEqual([
        {
          role: "user",
          content: [
            { type: "text", text: "Check" },
            { type: "image_url", image_url: { url: "data:image/png;base64,AQID" } },
          ],
        },
      ]);
    });

    test("sends text only when the image is missing", async () => {
      const { client, calls } = fakeClient("ok");
      await completer(client).complete({ model: "vl", userPrompt: "Check", imagePath: join(dir, "none.png") });

      expect(calls[0]?.messages).toEqual([{ role: "user", content: [{ type: "text", text: "Check" }] }]);
    });

    test("uses the vision prefix on failure", async () => {
      const { client } = fakeClient(new Error("timeout"));
      const text = await completer(client).complete({ model: "vl", userPrompt: "Check", imagePath: join(dir, "x.png") });
      expect(text).toBe("Vision LLM Error: timeout");
    });
  });
});

describe("forRoles", () => {
  test("resolves the model from the role table", async () => {
    const { client, calls } = fakeClient("done");
    const ask = forRoles(completer(client), { writer: "model-w", editor: "model-e" });

    await ask("editor", { user: "Polish", temperature: 0.5 });

    expect(calls[0]?.model).toBe("model-e");
    expect(calls[0]?.temperature).toBe(0.5);
  });
});
