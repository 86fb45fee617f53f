/**
 * CLI runner: argv and environment in, exit code out.
 */

import { loadActionConfig } from "../config/actionConfig.js";
import { ActionError } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import { LintAction, type LintActionDeps } from "./LintAction.js";

/**
 * Run the action and map its errors to exit codes. Configuration, flag and
 * override errors exit 1 with an `ERROR:` line on stderr; a lint failure
 * exits with the linter's own code.
 */
export async function runCli(
  argv: readonly string[],
  env: Record<string, string | undefined>,
  deps: LintActionDeps = {}
): Promise<number> {
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(`${text}\n`));

  try {
    const config = loadActionConfig(env);
    const result = await new LintAction(config, deps).run(argv);
    return result.exitCode;
  } catch (error) {
    if (error instanceof ActionError) {
      stderr(`ERROR: ${error.message}`);
      return error.exitCode;
    }
    logger.error("Unexpected failure", {
      error: error instanceof Error ? error.message : String(error),
    });
    return 1;
  }
}
