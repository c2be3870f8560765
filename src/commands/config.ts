/**
 * Config command - Show the resolved configuration
 *
 * Usage: loopgraph config [--config <path>]
 */

import { log } from "@clack/prompts";

import { ConfigError, describeConfig, loadConfig } from "../config/index.ts";

/**
 * Print the configuration after file, environment and defaults are merged.
 *
 * @example
 * ```ts
 * configCommand({ config: "ci.config.json" });
 * ```
 */
export function configCommand(options: { config?: string; env?: NodeJS.ProcessEnv } = {}): number {
  try {
    const config = loadConfig({ configPath: options.config, env: options.env });
    log.message(describeConfig(config));
    return 0;
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    log.error(error.message);
    return 1;
  }
}
