#!/usr/bin/env tsx
/**
 * loopgraph CLI entry point
 */

import { createProgram } from "./program.ts";
import { COLORS } from "./utils/colors.ts";
import { errorMessage } from "./utils/logger.ts";

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync();
  } catch (error) {
    console.error(`${COLORS.red}Error: ${errorMessage(error)}${COLORS.reset}`);
    process.exitCode = 1;
  }
}

await main();
