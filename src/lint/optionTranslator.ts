/**
 * Option Translator
 *
 * Turns the action's argument list into the ansible-lint flags it supports.
 * Anything else starting with `-` is rejected before ansible-lint ever runs.
 */

import { MissingOptionValueError, UnsupportedFlagError } from "../types/errors.js";
import type { TranslatedOptions } from "../types/lint.js";

// ============================================================================
// Flag Table
// ============================================================================

type FlagSpec =
  | { kind: "switch"; emit: readonly string[] }
  | { kind: "value"; emit: (value: string) => string[] };

const switchFlag = (...emit: string[]): FlagSpec => ({ kind: "switch", emit });
const valueFlag = (emit: (value: string) => string[]): FlagSpec => ({ kind: "value", emit });

/**
 * Accepted tokens and what each becomes on the ansible-lint command line.
 */
const FLAGS: ReadonlyMap<string, FlagSpec> = new Map([
  ["-q", switchFlag("-q")],
  ["--quiet", switchFlag("-q")],
  ["-c", valueFlag((path) => ["-c", path])],
  ["-p", switchFlag("-p")],
  ["-r", valueFlag((dir) => ["-r", dir])],
  ["-R", switchFlag("-R")],
  ["-t", valueFlag((tags) => ["-t", tags])],
  ["-x", valueFlag((ids) => ["-x", ids])],
  ["--exclude", valueFlag((pattern) => [`--exclude=${pattern}`])],
  ["--no-color", switchFlag("--no-color")],
  ["--parseable-severity", switchFlag("--parseable-severity")],
]);

export const SUPPORTED_FLAGS: readonly string[] = [...FLAGS.keys()];

const END_OF_OPTIONS = "--";

// ============================================================================
// Translation
// ============================================================================

/**
 * Translate raw tokens into ansible-lint arguments.
 *
 * A value-taking flag always consumes the very next token, even one that looks
 * like another flag. Positional tokens are dropped and `--` ends parsing.
 *
 * @throws UnsupportedFlagError for the first unknown `-` token
 * @throws MissingOptionValueError when a value-taking flag is the last token
 *
 * @example
 * ```ts
 * translateOptions(["-q", "--exclude", "roles/vendor", "-x", "yaml"]);
 * // { args: ["-q", "--exclude=roles/vendor", "-x", "yaml"], text: "-q --exclude=roles/vendor -x yaml" }
 * ```
 */
export function translateOptions(tokens: readonly string[]): TranslatedOptions {
  const args: string[] = [];

  for (let index = 0; index < tokens.length; index++) {
    const token = tokens[index];
    if (token === undefined || token === END_OF_OPTIONS) {
      break;
    }

    const spec = FLAGS.get(token);
    if (spec?.kind === "switch") {
      args.push(...spec.emit);
      continue;
    }
    if (spec?.kind === "value") {
      const value = tokens[index + 1];
      if (value === undefined) {
        throw new MissingOptionValueError(token);
      }
      args.push(...spec.emit(value));
      index++;
      continue;
    }

    if (token.startsWith("-")) {
      throw new UnsupportedFlagError(token);
    }
    // positional arguments are not forwarded
  }

  return { args, text: args.join(" ") };
}
