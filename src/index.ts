/**
 * ansible-lint PR action
 *
 * Library entry point. The CLI lives in ./cli.ts.
 */

export * from "./types/index.js";
export * from "./config/index.js";
export * from "./ci/index.js";
export { translateOptions, SUPPORTED_FLAGS } from "./lint/optionTranslator.js";
export { resolveTargets } from "./lint/targetResolver.js";
export { GlobExpansion } from "./lint/globExpansion.js";
export { LintRunner, toLintOutcome, type LintRunnerConfig } from "./lint/lintRunner.js";
export { installOverrides, type OverrideOptions } from "./lint/dependencyOverrides.js";
export { LintAction, type LintActionDeps, type LintActionResult } from "./action/LintAction.js";
export { runCli } from "./action/runCli.js";
export {
  executeCommand,
  type CommandExecutor,
  type ExecuteOptions,
  type ExecuteResult,
} from "./utils/executor.js";
export { logger, log, type Logger, type LogLevel, type LogContext, type LogEntry } from "./utils/logger.js";
