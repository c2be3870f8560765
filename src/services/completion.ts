/**
 * Text Completion Client
 *
 * Chat completion against an OpenAI-compatible endpoint (Ollama serves one at
 * http://localhost:11434/v1). Responses are normalized by removing
 * `<think>...</think>` reasoning blocks. Failures never throw: the caller
 * receives an "LLM Error: ..." (or "Vision LLM Error: ...") string instead.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import OpenAI from "openai";
import type {
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";

import { errorMessage, log, logWarn } from "../utils/logger.ts";

// ============================================================================
// TYPES
// ============================================================================

export interface CompletionRequest {
  model: string;
  systemPrompt?: string;
  userPrompt: string;
  temperature?: number;
  /** Local image attached to the request when the file exists */
  imagePath?: string;
}

/**
 * Anything that turns a prompt into text.
 */
export interface TextCompleter {
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * The part of the OpenAI client this module calls.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
      ): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface CompleterOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  /** Pre-built client (tests, custom transports) */
  client?: ChatCompletionsClient;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const COMPLETION_ERROR_PREFIX = "LLM Error: ";
export const VISION_ERROR_PREFIX = "Vision LLM Error: ";
export const DEFAULT_TEMPERATURE = 0.1;

const IMAGE_MIME_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
};

// ============================================================================
// NORMALIZATION
// ============================================================================

/**
 * Remove every `<think>...</think>` block and trim the remainder.
 */
export function stripReasoning(text: string): string {
  return text.replace(/<think>[\s\S]*?<\/think>/g, "").trim();
}

/**
 * True when `text` is the sentinel returned for a failed completion.
 */
export function isCompletionError(text: string): boolean {
  return text.startsWith(COMPLETION_ERROR_PREFIX) || text.startsWith(VISION_ERROR_PREFIX);
}

// ============================================================================
// CLIENT
// ============================================================================

/**
 * Completion client for OpenAI-compatible APIs.
 *
 * @example
 * ```typescript
 * const completer = new OpenAICompleter({
 *   baseUrl: "http://localhost:11434/v1",
 *   apiKey: "ollama",
 *   timeoutMs: 120_000,
 * });
 * const plan = await completer.complete({ model: "qwen3:14b", userPrompt: "Outline..." });
 * ```
 */
export class OpenAICompleter implements TextCompleter {
  private readonly client: ChatCompletionsClient;

  constructor(options: CompleterOptions) {
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const vision = request.imagePath !== undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: request.model,
        messages: await buildMessages(request),
        temperature: request.temperature ?? DEFAULT_TEMPERATURE,
        stream: false,
      });
      const content = response.choices[0]?.message.content ?? "";
      log("Completion", "completed", { model: request.model, chars: content.length, vision });
      return stripReasoning(content);
    } catch (error) {
      logWarn("Completion", "request_failed", { model: request.model, error: errorMessage(error) });
      return `${vision ? VISION_ERROR_PREFIX : COMPLETION_ERROR_PREFIX}${errorMessage(error)}`;
    }
  }
}

async function buildMessages(request: CompletionRequest): Promise<ChatCompletionMessageParam[]> {
  const messages: ChatCompletionMessageParam[] = [];
  if (request.systemPrompt) {
    messages.push({ role: "system", content: request.systemPrompt });
  }

  if (request.imagePath === undefined) {
    messages.push({ role: "user", content: request.userPrompt });
    return messages;
  }

  const parts: ChatCompletionContentPart[] = [{ type: "text", text: request.userPrompt }];
  if (existsSync(request.imagePath)) {
    const data = await readFile(request.imagePath);
    const mime = IMAGE_MIME_TYPES[extname(request.imagePath).toLowerCase()] ?? "image/png";
    parts.push({
      type: "image_url",
      image_url: { url: `data:${mime};base64,${data.toString("base64")}` },
    });
  }
  messages.push({ role: "user", content: parts });
  return messages;
}

// ============================================================================
// ROLE BINDING
// ============================================================================

export interface RolePrompt {
  system?: string;
  user: string;
  temperature?: number;
  imagePath?: string;
}

export type RoleCompletion<R extends string> = (role: R, prompt: RolePrompt) => Promise<string>;

/**
 * Bind a completer to a fixed role → model table.
 */
export function forRoles<R extends string>(
  completer: TextCompleter,
  models: Readonly<Record<R, string>>,
): RoleCompletion<R> {
  return (role, prompt) =>
    completer.complete({
      model: models[role],
      systemPrompt: prompt.system,
      userPrompt: prompt.user,
      temperature: prompt.temperature,
      imagePath: prompt.imagePath,
    });
}
