/**
 * Report Builder Tests
 */

import { describe, it, expect } from "vitest";
import {
  buildReport,
  codeFenceFor,
  renderReport,
  renderSection,
  type ReportInput,
} from "../../src/ci/reportBuilder.js";
import { AGGREGATE, type LintResult } from "../../src/types/lint.js";

// ============================================================================
// Test Data
// ============================================================================

function createInput(results: LintResult[], overrides: Partial<ReportInput> = {}): ReportInput {
  return {
    options: "-q",
    targets: "site.yml\nroles/",
    results,
    workflow: "Lint",
    action: "run-lint",
    ...overrides,
  };
}

// ============================================================================
// Construction
// ============================================================================

describe("buildReport", () => {
  it("should keep only targets that failed individually, in order", () => {
    const report = buildReport(
      createInput([
        { target: "site.yml", exitCode: 2, output: "site failed" },
        { target: "roles/", exitCode: 0, output: "" },
        { target: "handlers.yml", exitCode: 8, output: "handlers failed" },
      ])
    );

    expect(report.sections).toEqual([
      { target: "site.yml", output: "site failed" },
      { target: "handlers.yml", output: "handlers failed" },
    ]);
  });

  it("should ignore the aggregate run", () => {
    const report = buildReport(
      createInput([{ target: AGGREGATE, exitCode: 2, output: "everything failed" }])
    );

    expect(report.sections).toEqual([]);
  });

  it("should name the invocation with options and targets", () => {
    const report = buildReport(createInput([]));

    expect(report.invocation).toBe("ansible-lint -v -q site.yml\nroles/");
  });

  it("should skip empty options in the invocation", () => {
    const report = buildReport(createInput([], { options: "", targets: "site.yml" }));

    expect(report.invocation).toBe("ansible-lint -v site.yml");
  });

  it("should use a custom linter command", () => {
    const report = buildReport(
      createInput([], { options: "", targets: "site.yml", linterCommand: "/opt/bin/ansible-lint" })
    );

    expect(report.invocation).toBe("/opt/bin/ansible-lint -v site.yml");
  });

  it("should be immutable", () => {
    const report = buildReport(createInput([{ target: "a.yml", exitCode: 2, output: "x" }]));

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.sections)).toBe(true);
    expect(Object.isFrozen(report.sections[0])).toBe(true);
  });
});

// ============================================================================
// Markdown Generation
// ============================================================================

describe("codeFenceFor", () => {
  it("should use three backticks for plain output", () => {
    expect(codeFenceFor("no fences here")).toBe("```");
  });

  it("should outgrow fences inside the output", () => {
    expect(codeFenceFor("before\n````yaml\nkey: value\n````\nafter")).toBe("`````");
  });
});

describe("renderSection", () => {
  it("should wrap the output in a collapsible block", () => {
    const section = renderSection({ target: "site.yml", output: "line one\nline two" });

    expect(section).toBe(
      [
        "<details><summary><code>site.yml</code></summary>",
        "",
        "```",
        "line one",
        "line two",
        "```",
        "",
        "</details>",
      ].join("\n")
    );
  });
});

describe("renderReport", () => {
  it("should render header, sections and footer", () => {
    const report = buildReport(
      createInput(
        [
          { target: "site.yml", exitCode: 2, output: "name[missing]: All tasks should be named." },
          { target: "roles/", exitCode: 0, output: "" },
        ],
        { targets: "site.yml roles/" }
      )
    );

    expect(renderReport(report)).toBe(
      [
        "#### `ansible-lint -v -q site.yml roles/` Failed",
        "",
        "<details><summary><code>site.yml</code></summary>",
        "",
        "```",
        "name[missing]: All tasks should be named.",
        "```",
        "",
        "</details>",
        "",
        "*Workflow: `Lint`, Action: `run-lint`*",
      ].join("\n")
    );
  });

  it("should still render header and footer when no target failed on its own", () => {
    const report = buildReport(
      createInput([{ target: "site.yml", exitCode: 0, output: "" }], { targets: "site.yml" })
    );

    expect(renderReport(report)).toBe(
      ["#### `ansible-lint -v -q site.yml` Failed", "", "*Workflow: `Lint`, Action: `run-lint`*"].join(
        "\n"
      )
    );
  });

  it("should separate consecutive sections with a blank line", () => {
    const report = buildReport(
      createInput([
        { target: "a.yml", exitCode: 2, output: "a" },
        { target: "b.yml", exitCode: 2, output: "b" },
      ])
    );

    expect(renderReport(report)).toContain("</details>\n\n<details><summary><code>b.yml</code></summary>");
  });
});
