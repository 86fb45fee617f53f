/**
 * Glob Expansion
 *
 * Expands glob targets such as `playbooks/*.yml` relative to the workspace.
 * `**` only recurses inside a `withRecursiveGlobs` scope; outside it, `**`
 * matches like a single `*`.
 */

import fg from "fast-glob";

export class GlobExpansion {
  private recursive = false;

  constructor(private readonly cwd: string) {}

  get recursiveEnabled(): boolean {
    return this.recursive;
  }

  /**
   * Run `fn` with recursive `**` matching enabled. The previous setting is
   * restored when `fn` settles, whether it resolves or throws.
   */
  async withRecursiveGlobs<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.recursive;
    this.recursive = true;
    try {
      return await fn();
    } finally {
      this.recursive = previous;
    }
  }

  /**
   * Expand each target in order. Static paths pass through untouched; a
   * pattern that matches nothing is passed through literally so the linter
   * can report it. Matches are sorted.
   */
  async expand(targets: readonly string[]): Promise<string[]> {
    const expanded: string[] = [];

    for (const target of targets) {
      if (!fg.isDynamicPattern(target)) {
        expanded.push(target);
        continue;
      }

      const matches = await fg(target, {
        cwd: this.cwd,
        globstar: this.recursive,
        onlyFiles: false,
        dot: false,
      });

      if (matches.length === 0) {
        expanded.push(target);
      } else {
        expanded.push(...matches.sort());
      }
    }

    return expanded;
  }
}
