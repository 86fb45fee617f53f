/**
 * Error Types
 *
 * Failures of the action itself. A linter reporting findings is not one of
 * these: it is the `Err` side of a `LintOutcome`.
 */

/**
 * Base class for every error the action raises on purpose.
 * `exitCode` is the process exit code the CLI uses when the error reaches it.
 */
export class ActionError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A required input is missing or malformed. Raised before any subprocess runs.
 */
export class ConfigurationError extends ActionError {
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(problems.join("; "));
    this.problems = problems;
  }
}

/**
 * A value-taking flag was the last token, so it has nothing to consume.
 */
export class MissingOptionValueError extends ConfigurationError {
  readonly flag: string;

  constructor(flag: string) {
    super([`Missing value for flag: '${flag}'`]);
    this.flag = flag;
  }
}

/**
 * An option token outside the supported set.
 */
export class UnsupportedFlagError extends ActionError {
  readonly flag: string;

  constructor(flag: string) {
    super(`Unsupported flag: '${flag}'`);
    this.flag = flag;
  }
}

/**
 * `pip install` or `pip check` failed while applying OVERRIDE packages.
 */
export class DependencyOverrideError extends ActionError {
  readonly step: "install" | "check";
  readonly output: string;
  readonly stepExitCode: number;

  constructor(step: "install" | "check", stepExitCode: number, output: string) {
    super(`pip ${step} failed with exit code ${stepExitCode}`);
    this.step = step;
    this.stepExitCode = stepExitCode;
    this.output = output;
  }
}

/**
 * The report could not be delivered to the pull request.
 * Never decides the process exit code; the lint exit code always wins.
 */
export class PublishError extends ActionError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.status = options.status;
  }
}
