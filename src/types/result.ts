/**
 * Result Type
 *
 * A type-safe way to handle operations that can fail without throwing exceptions.
 * A linter exiting non-zero is an expected outcome here, so runs report it as
 * an `Err` instead of throwing.
 */

// ============================================================================
// Core Types
// ============================================================================

/**
 * Represents a successful result containing a value.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Represents a failed result containing an error.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * A Result type that can be either Ok<T> or Err<E>.
 *
 * @example
 * ```ts
 * const outcome = await runner.runAggregate(targets, options);
 * if (outcome.ok) {
 *   console.log(outcome.value.output);
 * } else {
 *   console.error(`exit code ${outcome.error.exitCode}`);
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a successful Result.
 */
export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/**
 * Create a failed Result.
 */
export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================================================
// Async Utilities
// ============================================================================

/**
 * Wrap an async function that might throw into a Result.
 *
 * @example
 * ```ts
 * const published = await tryCatch(() => publishReport(report, context));
 * ```
 */
export async function tryCatch<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    const value = await fn();
    return ok(value);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}
