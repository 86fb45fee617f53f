#!/usr/bin/env node

/**
 * ansible-lint PR action CLI
 *
 * Usage:
 *   ansible-lint-pr-action [options]
 *
 * Options (forwarded to ansible-lint):
 *   -q, --quiet               Less output
 *   -c <path>                 Config file
 *   -p                        Parseable output
 *   -r <dir>                  Add a rules directory
 *   -R                        Keep the default rules when -r is used
 *   -t <tags>                 Only check rules with these tags
 *   -x <ids>                  Skip rules with these ids or tags
 *   --exclude <pattern>       Skip matching paths
 *   --no-color                Disable colored output
 *   --parseable-severity      Parseable output with severity
 *
 * Environment:
 *   TARGETS (required), GITHUB_WORKSPACE (required), GITHUB_EVENT_NAME,
 *   GITHUB_EVENT_PATH, GITHUB_TOKEN, INPUT_COMMENT, GITHUB_WORKFLOW,
 *   GITHUB_ACTION, OVERRIDE, ANSIBLE_LINT_COMMAND
 *
 * Exit Codes:
 *   0 - All targets linted cleanly
 *   1 - Configuration, flag or override error
 *   N - ansible-lint's own non-zero exit code
 */

import { runCli } from "./action/runCli.js";
import { logger } from "./utils/logger.js";

logger.info("Running Ansible Lint...");

runCli(process.argv.slice(2), process.env).then(
  (exitCode) => process.exit(exitCode),
  (error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
);
