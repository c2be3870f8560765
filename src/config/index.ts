/**
 * Configuration Module
 *
 * Resolves the single immutable configuration object that workflow factories
 * and commands receive. Sources, later ones winning:
 *
 *   defaults ← loopgraph.config.json (or --config <path>) ← environment ← overrides
 *
 * The merged value is validated with zod and deep-frozen.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";

import { log } from "../utils/logger.ts";

// ============================================================================
// SCHEMA
// ============================================================================

const model = (name: string) => z.string().min(1).default(name);
const positiveInt = (value: number) => z.number().int().positive().default(value);

const CODER_MODEL = "qwen2.5-coder:14b";
const GENERAL_MODEL = "qwen3:14b";
const VISION_MODEL = "qwen3-vl:8b";

const ModelsSchema = z
  .object({
    coding: z
      .object({
        tester: model(CODER_MODEL),
        coder: model(CODER_MODEL),
        verifier: model(VISION_MODEL),
      })
      .default({}),
    proof: z
      .object({
        theorist: model(CODER_MODEL),
        formalizer: model(CODER_MODEL),
        arbiter: model(CODER_MODEL),
      })
      .default({}),
    deepResearch: z
      .object({
        globalPlanner: model(GENERAL_MODEL),
        planner: model(GENERAL_MODEL),
        researcher: model(GENERAL_MODEL),
        writer: model(GENERAL_MODEL),
        editor: model("ministral-3:14b"),
        skeptics: z.array(z.string().min(1)).min(1).default(["cogito:14b", GENERAL_MODEL]),
      })
      .default({}),
    quickResearch: z
      .object({
        planner: model(GENERAL_MODEL),
        researcher: model(GENERAL_MODEL),
        writer: model(GENERAL_MODEL),
      })
      .default({}),
    quorum: z
      .object({
        drafter: model(VISION_MODEL),
        skeptic: model(VISION_MODEL),
        structuralist: model(VISION_MODEL),
      })
      .default({}),
    /** Picks the most promising search result to read */
    search: model(CODER_MODEL),
  })
  .default({});

export const LoopgraphConfigSchema = z.object({
  llm: z
    .object({
      baseUrl: z.string().url().default("http://localhost:11434/v1"),
      apiKey: z.string().default("ollama"),
      timeoutMs: positiveInt(300_000),
    })
    .default({}),
  models: ModelsSchema,
  search: z
    .object({
      braveApiKey: z.string().min(1).optional(),
      googleApiKey: z.string().min(1).optional(),
      googleCseId: z.string().min(1).optional(),
    })
    .default({}),
  limits: z
    .object({
      maxRetries: z.number().int().nonnegative().default(10),
      maxSectionLoops: z.number().int().nonnegative().default(2),
      maxQuorumRounds: z.number().int().nonnegative().default(2),
      maxSearchResults: positiveInt(10),
      pageCharLimit: positiveInt(10_000),
      processTimeoutSeconds: z.number().positive().default(30),
      fetchTimeoutMs: positiveInt(10_000),
      /** Hard cap on stage executions per run; each workflow derives one from its loop bounds when unset */
      maxSteps: z.number().int().positive().optional(),
      /** Parallel calls within one fan-out stage; results keep issuance order */
      fanOutConcurrency: positiveInt(1),
    })
    .default({}),
  storage: z
    .object({
      checkpointDir: z.string().min(1).default(".loopgraph/checkpoints"),
      workspaceDir: z.string().min(1).default(".loopgraph/workspace"),
    })
    .default({}),
  executables: z
    .object({
      python: z.string().min(1).default("python3"),
      lean: z.string().min(1).default("lean"),
    })
    .default({}),
  terminalResumePolicy: z.enum(["no-op", "reenter"]).default("no-op"),
});

export type LoopgraphConfig = z.infer<typeof LoopgraphConfigSchema>;

/** Partial configuration as written in a file or passed as overrides */
export type LoopgraphConfigInput = z.input<typeof LoopgraphConfigSchema>;

// ============================================================================
// CONSTANTS
// ============================================================================

export const CONFIG_FILE_NAME = "loopgraph.config.json";

/**
 * Environment variables read by loadConfig().
 */
export const LOOPGRAPH_ENV_VARS = {
  LLM_BASE_URL: "LOOPGRAPH_LLM_BASE_URL",
  LLM_API_KEY: "LOOPGRAPH_LLM_API_KEY",
  CHECKPOINT_DIR: "LOOPGRAPH_CHECKPOINT_DIR",
  WORKSPACE_DIR: "LOOPGRAPH_WORKSPACE_DIR",
  MAX_RETRIES: "LOOPGRAPH_MAX_RETRIES",
  BRAVE_API_KEY: "BRAVE_API_KEY",
  GOOGLE_API_KEY: "GOOGLE_API_KEY",
  GOOGLE_CSE_ID: "GOOGLE_CSE_ID",
} as const;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface LoadConfigOptions {
  /** Explicit config file; it must exist */
  configPath?: string;
  /** Directory searched for loopgraph.config.json (default: process.cwd()) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: LoopgraphConfigInput;
}

// ============================================================================
// HELPERS
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge `patch` into `base`; nested objects merge, everything else replaces.
 */
export function deepMerge(
  base: Record<string, unknown>,
  patch: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return merged;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function readConfigFile(options: LoadConfigOptions): Record<string, unknown> {
  const path = options.configPath
    ? resolve(options.cwd ?? process.cwd(), options.configPath)
    : resolve(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);

  if (!existsSync(path)) {
    if (options.configPath) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `Config file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  log("Config", "file_loaded", { path });
  return parsed;
}

/**
 * Translate recognized environment variables into a partial config.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  // Empty variables count as unset
  const read = (name: string): string | undefined => env[name] || undefined;
  const vars = LOOPGRAPH_ENV_VARS;
  const maxRetries = read(vars.MAX_RETRIES);

  return {
    llm: { baseUrl: read(vars.LLM_BASE_URL), apiKey: read(vars.LLM_API_KEY) },
    storage: { checkpointDir: read(vars.CHECKPOINT_DIR), workspaceDir: read(vars.WORKSPACE_DIR) },
    search: {
      braveApiKey: read(vars.BRAVE_API_KEY),
      googleApiKey: read(vars.GOOGLE_API_KEY),
      googleCseId: read(vars.GOOGLE_CSE_ID),
    },
    // Left as a number even when malformed so validation reports it
    limits: { maxRetries: maxRetries === undefined ? undefined : Number(maxRetries) },
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

// ============================================================================
// MAIN CONFIGURATION LOADER
// ============================================================================

/**
 * Load the configuration.
 *
 * @throws ConfigError when an explicit config file is missing, a file is not
 *   a JSON object, or the merged value fails validation
 *
 * @example
 * ```typescript
 * const config = loadConfig({ configPath: "ci.config.json" });
 * const maxRetries = config.limits.maxRetries;
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): LoopgraphConfig {
  const fromFile = readConfigFile(options);
  const fromEnv = configFromEnv(options.env ?? process.env);
  const overrides: Record<string, unknown> = isRecord(options.overrides) ? options.overrides : {};

  const merged = deepMerge(deepMerge(fromFile, fromEnv), overrides);
  const parsed = LoopgraphConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return deepFreeze(parsed.data);
}

/**
 * Human-readable summary of the active configuration. API keys are masked.
 */
export function describeConfig(config: LoopgraphConfig): string {
  const mask = (value: string | undefined) => (value ? "set" : "not set");
  const { limits } = config;

  return [
    `LLM endpoint: ${config.llm.baseUrl}`,
    `Checkpoints: ${config.storage.checkpointDir}`,
    `Workspace: ${config.storage.workspaceDir}`,
    `Max retries: ${limits.maxRetries}`,
    `Section loops: ${limits.maxSectionLoops}, quorum rounds: ${limits.maxQuorumRounds}`,
    `Step cap: ${limits.maxSteps ?? "per workflow, from its loop bounds"}`,
    `Search keys: brave ${mask(config.search.braveApiKey)}, google ${mask(config.search.googleApiKey)}`,
    `Terminal resume policy: ${config.terminalResumePolicy}`,
  ].join("\n");
}
