/**
 * Command tree for the loopgraph CLI
 *
 * Usage:
 *   loopgraph run <workflow> [objective]          Start a session
 *   loopgraph run <workflow> --session <id> --resume
 *                                                 Continue a stored session
 *   loopgraph sessions list                       Show stored sessions
 *   loopgraph sessions prune <id>                 Delete a stored session
 *   loopgraph workflows                           List workflows
 *   loopgraph config                              Show the resolved configuration
 */

import { Command } from "@commander-js/extra-typings";

import { configCommand } from "./commands/config.ts";
import { runCommand } from "./commands/run.ts";
import { listSessionsCommand, pruneSessionCommand } from "./commands/sessions.ts";
import { workflowsCommand } from "./commands/workflows.ts";
import { COLORS } from "./utils/colors.ts";
import { VERSION } from "./version.ts";
import { workflowNames } from "./workflows/index.ts";

/**
 * Action results are exit codes; the caller decides when to exit.
 */
export type ExitCodeSink = (code: number) => void;

/**
 * Create and configure the CLI program.
 *
 * @param setExitCode - Receives the exit code of the command that ran
 */
export function createProgram(setExitCode: ExitCodeSink = (code) => (process.exitCode = code)) {
  const program = new Command()
    .name("loopgraph")
    .description("Resumable LLM workflows with bounded retry loops")
    .version(VERSION, "-v, --version", "Show version number")
    .option("-c, --config <path>", "Config file (default: ./loopgraph.config.json)")

    .configureOutput({
      writeErr: (str) => {
        process.stderr.write(`${COLORS.red}${str}${COLORS.reset}`);
      },
      outputError: (str, write) => {
        write(`${COLORS.red}${str}${COLORS.reset}`);
      },
    })

    .showHelpAfterError("(Run 'loopgraph --help' for usage information)");

  program
    .command("run")
    .description("Run a workflow, or resume a stored session")
    .argument("<workflow>", `Workflow to run (${workflowNames().join(", ")})`)
    .argument("[objective]", "Task, theorem, topic or question; prompted for when omitted")
    .option("-s, --session <id>", "Session id (default: generated)")
    .option("-r, --resume", "Continue the stored session")
    .addHelpText(
      "after",
      `
Examples:
  $ loopgraph run coding "Plot a sine wave and save it as plot.png"
  $ loopgraph run deep-research "History of the transistor" --session transistor
  $ loopgraph run deep-research --session transistor --resume`,
    )
    .action(async (workflow, objective, localOpts) => {
      setExitCode(
        await runCommand(workflow, objective, {
          session: localOpts.session,
          resume: localOpts.resume,
          config: program.opts().config,
        }),
      );
    });

  const sessionsCmd = program.command("sessions").description("Manage stored sessions");

  sessionsCmd
    .command("list")
    .description("Show stored sessions and where each stopped")
    .action(async () => {
      setExitCode(await listSessionsCommand({ config: program.opts().config }));
    });

  sessionsCmd
    .command("prune")
    .description("Delete a stored session")
    .argument("<id>", "Session id")
    .action(async (id) => {
      setExitCode(await pruneSessionCommand(id, { config: program.opts().config }));
    });

  program
    .command("workflows")
    .description("List available workflows")
    .action(() => {
      setExitCode(workflowsCommand());
    });

  program
    .command("config")
    .description("Show the resolved configuration")
    .action(() => {
      setExitCode(configCommand({ config: program.opts().config }));
    });

  return program;
}
