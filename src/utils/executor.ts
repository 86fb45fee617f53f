/**
 * Executor Utility
 *
 * Executes external tools (ansible-lint, pip) as subprocesses.
 * Uses execa for process management.
 *
 * Features:
 * - Combined stdout/stderr capture
 * - Structured logging
 * - Non-zero exits returned, never thrown
 */

import { execa } from "execa";
import { logger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

export interface ExecuteResult {
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in the order they were written */
  all: string;
  exitCode: number;
  signal?: string;
}

export interface ExecuteOptions {
  /** Working directory for the command */
  cwd?: string;
  /** Environment variables to add */
  env?: Record<string, string>;
}

/**
 * Anything that can run a command the way `executeCommand` does.
 * The lint runner and the override installer take one of these so tests can
 * substitute an in-process fake.
 */
export type CommandExecutor = (
  command: string,
  args: readonly string[],
  options?: ExecuteOptions
) => Promise<ExecuteResult>;

// ============================================================================
// Execute Command
// ============================================================================

/**
 * Execute a command and capture its output.
 *
 * Does NOT throw on non-zero exit codes — returns the result for the caller
 * to handle. ansible-lint exits non-zero whenever it has findings.
 * There is no timeout: the command runs until it exits.
 *
 * @example
 * ```ts
 * const result = await executeCommand("ansible-lint", ["-v", "site.yml"], { cwd: workspace });
 * if (result.exitCode !== 0) {
 *   logger.warn("ansible-lint reported findings", { exitCode: result.exitCode });
 * }
 * ```
 */
export async function executeCommand(
  command: string,
  args: readonly string[],
  options: ExecuteOptions = {}
): Promise<ExecuteResult> {
  try {
    logger.debug(`Executing command: ${command} ${args.join(" ")}`, {
      cwd: options.cwd,
    });

    const result = await execa(command, [...args], {
      cwd: options.cwd,
      reject: false, // Don't throw on non-zero exit codes
      all: true,
      env: {
        ...process.env,
        ...options.env,
      },
      encoding: "utf8",
    });

    const executeResult: ExecuteResult = {
      stdout: String(result.stdout ?? ""),
      stderr: String(result.stderr ?? ""),
      all: String(result.all ?? ""),
      exitCode: result.exitCode ?? (result.failed ? 1 : 0),
    };

    if (result.signal) {
      executeResult.signal = result.signal;
    }

    // Spawn failures (missing binary, bad cwd) produce no output of their own
    if (result.failed && result.exitCode === undefined && !result.signal && !executeResult.all) {
      executeResult.all = `Failed to start command: ${command}`;
      executeResult.stderr = executeResult.all;
    }

    return executeResult;
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error executing command";
    return {
      stdout: "",
      stderr: message,
      all: message,
      exitCode: 1,
    };
  }
}
