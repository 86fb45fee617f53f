/**
 * Lint Types
 */

import type { Result } from "./result.js";

/**
 * Marks the single run that covers every target at once.
 */
export const AGGREGATE: unique symbol = Symbol("aggregate");

export type LintSubject = string | typeof AGGREGATE;

export interface LintResult {
  /** A single target, or AGGREGATE for the run over all targets */
  target: LintSubject;
  exitCode: number;
  /** Combined stdout and stderr */
  output: string;
}

/**
 * `Ok` when the linter exited 0, `Err` carrying the same shape otherwise.
 */
export type LintOutcome = Result<LintResult, LintResult>;

export interface TranslatedOptions {
  /** Linter arguments, one entry per argv slot */
  args: string[];
  /** The arguments joined with single spaces, for display */
  text: string;
}

export interface ResolvedTargets {
  targets: string[];
  /** Non-blank lines of the original blob, trimmed */
  printable: string;
}
