/**
 * Report Builder
 *
 * Turns attribution runs into the Markdown posted on the pull request:
 * one collapsible section per target that failed on its own.
 */

import { AGGREGATE, type LintResult } from "../types/lint.js";
import { DEFAULT_LINTER_COMMAND } from "../config/actionConfig.js";

// ============================================================================
// Types
// ============================================================================

export interface ReportSection {
  readonly target: string;
  readonly output: string;
}

export interface Report {
  /** Linter invocation shown in the header */
  readonly invocation: string;
  readonly sections: readonly ReportSection[];
  readonly workflow: string;
  readonly action: string;
}

export interface ReportInput {
  /** Translated option string */
  options: string;
  /** Printable target list */
  targets: string;
  /** Attribution runs in target order */
  results: readonly LintResult[];
  workflow: string;
  action: string;
  linterCommand?: string;
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Build an immutable report. Targets that passed individually are left out,
 * even when the aggregate run failed, so a target that only fails together
 * with others does not get a section.
 */
export function buildReport(input: ReportInput): Report {
  const command = input.linterCommand ?? DEFAULT_LINTER_COMMAND;
  const invocation = [command, "-v", input.options, input.targets]
    .filter((part) => part.length > 0)
    .join(" ");

  const sections: ReportSection[] = [];
  for (const result of input.results) {
    if (result.target === AGGREGATE || result.exitCode === 0) {
      continue;
    }
    sections.push(Object.freeze({ target: result.target, output: result.output }));
  }

  return Object.freeze({
    invocation,
    sections: Object.freeze(sections),
    workflow: input.workflow,
    action: input.action,
  });
}

// ============================================================================
// Markdown Generation
// ============================================================================

/**
 * A code fence longer than any backtick run inside `content`, so the output
 * is shown verbatim even when it contains fences of its own.
 */
export function codeFenceFor(content: string): string {
  const longestRun = Math.max(0, ...(content.match(/`+/g) ?? []).map((run) => run.length));
  return "`".repeat(Math.max(3, longestRun + 1));
}

/**
 * Render a single collapsible target section.
 */
export function renderSection(section: ReportSection): string {
  const fence = codeFenceFor(section.output);
  return [
    `<details><summary><code>${section.target}</code></summary>`,
    "",
    fence,
    section.output,
    fence,
    "",
    "</details>",
  ].join("\n");
}

/**
 * Render the full comment body.
 */
export function renderReport(report: Report): string {
  const lines: string[] = [];

  lines.push(`#### \`${report.invocation}\` Failed`);
  lines.push("");

  for (const section of report.sections) {
    lines.push(renderSection(section));
    lines.push("");
  }

  lines.push(`*Workflow: \`${report.workflow}\`, Action: \`${report.action}\`*`);

  return lines.join("\n");
}
