/**
 * External process runner with a wall-clock bound.
 *
 * Used for the sandboxed script run, the test runner and the proof kernel.
 * A run that exceeds its timeout is killed and reported with `timedOut`.
 * Spawn failures are reported in `stderr` rather than thrown.
 */

import { spawn } from "node:child_process";

import { errorMessage, log, logWarn } from "../utils/logger.ts";

export interface ProcessResult {
  stdout: string;
  stderr: string;
  /** null when the process was killed or never started */
  exitCode: number | null;
  timedOut: boolean;
}

export interface ProcessOptions {
  timeoutSeconds: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export type ProcessRunner = (
  executable: string,
  args: readonly string[],
  options: ProcessOptions,
) => Promise<ProcessResult>;

export const runProcess: ProcessRunner = (executable, args, options) =>
  new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    const finish = (exitCode: number | null): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      log("Process", "exited", { executable, exitCode, timedOut });
      resolve({ stdout, stderr, exitCode, timedOut });
    };

    const child = spawn(executable, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const timer = setTimeout(() => {
      timedOut = true;
      logWarn("Process", "timed_out", { executable, timeoutSeconds: options.timeoutSeconds });
      child.kill("SIGKILL");
    }, options.timeoutSeconds * 1000);

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error) => {
      stderr += errorMessage(error);
      finish(null);
    });
    child.on("close", (code) => finish(timedOut ? null : code));
  });

/**
 * One printable report of a finished run.
 */
export function describeProcessResult(result: ProcessResult, timeoutSeconds: number): string {
  if (result.timedOut) {
    return `Execution timed out after ${timeoutSeconds} seconds.`;
  }
  const parts = [`Exit code: ${result.exitCode ?? "none"}`];
  if (result.stdout.trim()) parts.push(`STDOUT:\n${result.stdout.trim()}`);
  if (result.stderr.trim()) parts.push(`STDERR:\n${result.stderr.trim()}`);
  return parts.join("\n");
}

/**
 * True when the run never started because the executable was not found.
 */
export function isMissingExecutable(result: ProcessResult): boolean {
  return result.exitCode === null && !result.timedOut && /\bENOENT\b/.test(result.stderr);
}
