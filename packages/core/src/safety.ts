/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, reason, message)`: throw on a broken invariant
 * - `unreachable(value?)`: mark impossible code paths
 * - `debugOnly(fn)`: self-checks that run only with `debug` enabled
 *
 * @example
 * ```typescript
 * invariant(index !== -1, "not-a-member", "value is not a candidate");
 *
 * debugOnly(() => {
 *   invariant(set.isFold(value), "unprovable", "widened set lost the value");
 * });
 * ```
 */

import { config } from "./config.js";
import { debugLog } from "./diagnostics.js";
import { UnionInvariantError, type UnionInvariantReason } from "./errors.js";

/**
 * Runtime invariant check. The violation is logged, then thrown as a
 * {@link UnionInvariantError}.
 */
export function invariant(
  condition: boolean,
  reason: UnionInvariantReason,
  message: string | (() => string),
): asserts condition {
  if (!condition) {
    throw violation(reason, typeof message === "function" ? message() : message);
  }
}

/**
 * Build (and log) the error for a violated invariant without throwing it,
 * for call sites that need a `throw` expression.
 */
export function violation(reason: UnionInvariantReason, message: string): UnionInvariantError {
  debugLog("invariant", `${reason}: ${message}`);
  return new UnionInvariantError(reason, message);
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @throws UnionInvariantError always
 */
export function unreachable(_value?: never): never {
  throw violation("unmatched", "Unreachable code reached");
}

/**
 * Run `fn` only when the `debug` configuration flag is on.
 */
export function debugOnly(fn: () => void): void {
  if (config.has("debug")) {
    fn();
  }
}
