/**
 * Dependency Overrides
 *
 * Installs extra Python packages (for example a pinned ansible-lint) listed in
 * OVERRIDE before linting, then verifies the environment with `pip check`.
 */

import { executeCommand, type CommandExecutor } from "../utils/executor.js";
import { logger } from "../utils/logger.js";
import { DependencyOverrideError } from "../types/errors.js";

export interface OverrideOptions {
  cwd: string;
  executor?: CommandExecutor;
  /** pip executable */
  pip?: string;
}

/**
 * Install the space-separated package specs in `override`. Nothing runs when
 * it is blank.
 *
 * @returns the package specs that were installed
 * @throws DependencyOverrideError when `pip install` or `pip check` exits non-zero
 */
export async function installOverrides(
  override: string,
  options: OverrideOptions
): Promise<string[]> {
  const packages = override.split(/\s+/).filter((spec) => spec.length > 0);
  const executor = options.executor ?? executeCommand;
  const pip = options.pip ?? "pip";

  if (packages.length > 0) {
    logger.info("Installing override dependencies", { packages });

    const install = await executor(pip, ["install", ...packages], { cwd: options.cwd });
    if (install.exitCode !== 0) {
      throw new DependencyOverrideError("install", install.exitCode, install.all);
    }

    const check = await executor(pip, ["check"], { cwd: options.cwd });
    if (check.exitCode !== 0) {
      throw new DependencyOverrideError("check", check.exitCode, check.all);
    }
  }

  logger.info("Completed installing override dependencies...");
  return packages;
}
