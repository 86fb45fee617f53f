/**
 * Target Resolver
 *
 * Splits the TARGETS blob into individual lint targets.
 */

import type { ResolvedTargets } from "../types/lint.js";

/**
 * Split a whitespace/newline-delimited blob into targets.
 *
 * `targets` holds every non-empty entry in order. `printable` keeps the
 * blob's line structure minus blank lines, for messages and the report header.
 *
 * @example
 * ```ts
 * resolveTargets("a.yml\n\nb/\n  \nc.yml");
 * // { targets: ["a.yml", "b/", "c.yml"], printable: "a.yml\nb/\nc.yml" }
 * ```
 */
export function resolveTargets(blob: string): ResolvedTargets {
  const targets = blob.split(/\s+/).filter((entry) => entry.length > 0);

  const printable = blob
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("\n");

  return { targets, printable };
}
