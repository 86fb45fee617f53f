/**
 * Lint Action
 *
 * Runs the whole pipeline: resolve targets, translate options, apply
 * dependency overrides, lint in aggregate and, when a pull request run fails
 * with commenting on, attribute the failure per target and post a report.
 *
 * The exit code is always the aggregate run's. Posting the report can fail
 * without changing it.
 */

import chalk from "chalk";
import type { ActionConfig } from "../config/actionConfig.js";
import { buildReport, type Report } from "../ci/reportBuilder.js";
import { publishReport, shouldPublish, type FetchLike } from "../ci/githubComment.js";
import { installOverrides } from "../lint/dependencyOverrides.js";
import { LintRunner } from "../lint/lintRunner.js";
import { resolveTargets } from "../lint/targetResolver.js";
import { translateOptions } from "../lint/optionTranslator.js";
import { executeCommand, type CommandExecutor } from "../utils/executor.js";
import { logger } from "../utils/logger.js";
import { tryCatch } from "../types/result.js";
import type { LintResult } from "../types/lint.js";

// ============================================================================
// Types
// ============================================================================

export interface LintActionDeps {
  executor?: CommandExecutor;
  runner?: LintRunner;
  fetch?: FetchLike;
  /** Receives linter output and status lines meant for stdout */
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

export interface LintActionResult {
  exitCode: number;
  /** Whether a comment was posted */
  published: boolean;
  report?: Report;
  publishError?: Error;
}

// ============================================================================
// Action
// ============================================================================

/**
 * @example
 * ```ts
 * const action = new LintAction(loadActionConfig(process.env));
 * const { exitCode } = await action.run(["-x", "yaml[line-length]"]);
 * process.exit(exitCode);
 * ```
 */
export class LintAction {
  private readonly executor: CommandExecutor;
  private readonly runner: LintRunner;
  private readonly fetchImpl: FetchLike;
  private readonly stdout: (text: string) => void;
  private readonly stderr: (text: string) => void;

  constructor(
    private readonly config: ActionConfig,
    deps: LintActionDeps = {}
  ) {
    this.executor = deps.executor ?? executeCommand;
    this.runner =
      deps.runner ??
      new LintRunner({
        command: config.linterCommand,
        cwd: config.workspace,
        executor: this.executor,
      });
    this.fetchImpl = deps.fetch ?? fetch;
    this.stdout = deps.stdout ?? ((text) => process.stdout.write(`${text}\n`));
    this.stderr = deps.stderr ?? ((text) => process.stderr.write(`${text}\n`));
  }

  /**
   * @param argv - option tokens passed to the action
   * @throws UnsupportedFlagError or MissingOptionValueError before any subprocess runs
   * @throws DependencyOverrideError when OVERRIDE packages cannot be installed
   */
  async run(argv: readonly string[]): Promise<LintActionResult> {
    const { targets, printable } = resolveTargets(this.config.targets);
    const options = translateOptions(argv);

    await installOverrides(this.config.override, {
      cwd: this.config.workspace,
      executor: this.executor,
    });

    const invocation = [this.config.linterCommand, "-v", "--force-color", options.text, printable]
      .filter((part) => part.length > 0)
      .join(" ");
    this.stdout(`Executing '${invocation}'`);

    const aggregate = await logger.time("aggregate-lint", () =>
      this.runner.runAggregate(targets, options.args)
    );

    if (aggregate.ok) {
      this.stdout(chalk.green(`Successfully linted '${printable}'`));
      this.stdout(aggregate.value.output);
      return { exitCode: 0, published: false };
    }

    const failure = aggregate.error;
    this.stderr(chalk.red(`Linting errors were found in '${printable}':`));
    this.stdout(failure.output);

    if (!shouldPublish(this.config.publish)) {
      return { exitCode: failure.exitCode, published: false };
    }

    const attribution = await this.runner.runEachTarget(targets, options.args);
    const results: LintResult[] = attribution.map((outcome) =>
      outcome.ok ? outcome.value : outcome.error
    );

    const report = buildReport({
      options: options.text,
      targets: printable,
      results,
      workflow: this.config.workflow,
      action: this.config.action,
      linterCommand: this.config.linterCommand,
    });

    const published = await tryCatch(() =>
      publishReport(report, this.config.publish, this.fetchImpl)
    );

    if (!published.ok) {
      logger.error("Failed to comment on the pull request", {
        error: published.error.message,
        exitCode: failure.exitCode,
      });
      return {
        exitCode: failure.exitCode,
        published: false,
        report,
        publishError: published.error,
      };
    }

    logger.info("Commented on the pull request", {
      commentsUrl: published.value.commentsUrl,
      failingTargets: report.sections.length,
    });
    return { exitCode: failure.exitCode, published: true, report };
  }
}
