/**
 * Lint Runner
 *
 * Invokes ansible-lint either once over every target (the aggregate run) or
 * once per target (attribution runs). Runs are sequential and never retried.
 */

import { executeCommand, type CommandExecutor } from "../utils/executor.js";
import { logger } from "../utils/logger.js";
import { ok, err, tryCatch } from "../types/result.js";
import { AGGREGATE, type LintOutcome, type LintResult, type LintSubject } from "../types/lint.js";
import { GlobExpansion } from "./globExpansion.js";

// ============================================================================
// Types
// ============================================================================

export interface LintRunnerConfig {
  /** Linter executable, normally `ansible-lint` */
  command: string;
  /** Directory the linter runs in (the checked-out workspace) */
  cwd: string;
  executor?: CommandExecutor;
  globs?: GlobExpansion;
}

interface InvocationOptions {
  /** Colorized output for the aggregate run, plain output for attribution runs */
  color: boolean;
  verbose: boolean;
}

const runnerLogger = logger.child({ component: "lint-runner" });

/**
 * Fold a finished invocation into a LintOutcome.
 */
export function toLintOutcome(result: LintResult): LintOutcome {
  return result.exitCode === 0 ? ok(result) : err(result);
}

// ============================================================================
// Runner
// ============================================================================

export class LintRunner {
  readonly command: string;
  private readonly cwd: string;
  private readonly executor: CommandExecutor;
  private readonly globs: GlobExpansion;

  constructor(config: LintRunnerConfig) {
    this.command = config.command;
    this.cwd = config.cwd;
    this.executor = config.executor ?? executeCommand;
    this.globs = config.globs ?? new GlobExpansion(config.cwd);
  }

  /**
   * Lint every target in a single invocation, with verbose colorized output.
   * Glob targets are expanded with recursive `**` enabled for this call only.
   */
  async runAggregate(targets: readonly string[], options: readonly string[]): Promise<LintOutcome> {
    return this.globs.withRecursiveGlobs(async () => {
      const expanded = await this.globs.expand(targets);
      return this.invoke(AGGREGATE, options, expanded, { color: true, verbose: true });
    });
  }

  /**
   * Lint one target with plain output. The target is passed literally.
   */
  async runTarget(target: string, options: readonly string[]): Promise<LintOutcome> {
    return this.invoke(target, options, [target], { color: false, verbose: false });
  }

  /**
   * Lint each target on its own, in order. A target whose run blows up is
   * recorded as a failure and the remaining targets still run.
   */
  async runEachTarget(targets: readonly string[], options: readonly string[]): Promise<LintOutcome[]> {
    const outcomes: LintOutcome[] = [];

    for (const target of targets) {
      const attempt = await tryCatch(() => this.runTarget(target, options));
      if (attempt.ok) {
        outcomes.push(attempt.value);
        continue;
      }

      runnerLogger.warn("Attribution run crashed", { target, error: attempt.error.message });
      outcomes.push(err({ target, exitCode: 1, output: attempt.error.message }));
    }

    return outcomes;
  }

  private async invoke(
    subject: LintSubject,
    options: readonly string[],
    targets: readonly string[],
    { color, verbose }: InvocationOptions
  ): Promise<LintOutcome> {
    const argv = [
      ...(verbose ? ["-v"] : []),
      color ? "--force-color" : "--nocolor",
      ...options,
      ...targets,
    ];

    runnerLogger.debug("Running linter", {
      target: subject === AGGREGATE ? "aggregate" : subject,
      args: argv,
    });

    const result = await this.executor(this.command, argv, { cwd: this.cwd });

    return toLintOutcome({
      target: subject,
      exitCode: result.exitCode,
      output: result.all,
    });
  }
}
