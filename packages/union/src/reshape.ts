/**
 * Result-level helpers: reshape and annotate the error arm of a `Result`
 * without unpacking it by hand.
 */

import { OneOf } from "./one-of.js";
import { Err, Ok, isErr, mapErr, type Result } from "./result.js";
import type { Narrow, ProvenSuperset, TypeSet } from "./type-set.js";
import { guard } from "./type-set.js";
import type { ValueOf, Values, Variant, VariantList } from "./types.js";

// ============================================================================
// Context
// ============================================================================

/**
 * Push `message` onto the error arm. Returns `result` itself.
 */
export function context<T, L extends VariantList>(
  result: Result<T, OneOf<L>>,
  message: string,
): Result<T, OneOf<L>> {
  if (isErr(result)) {
    result.error.context(message);
  }
  return result;
}

/**
 * Push a lazily built message onto the error arm. `build` runs only for an
 * `Err`.
 */
export function withContext<T, L extends VariantList>(
  result: Result<T, OneOf<L>>,
  build: () => string,
): Result<T, OneOf<L>> {
  if (isErr(result)) {
    result.error.withContext(build);
  }
  return result;
}

/**
 * Wrap a bare error in a union over `set` and push `message` onto it.
 */
export function contextError<L extends VariantList>(
  set: TypeSet<L>,
  error: Values<L>,
  message: string,
): OneOf<L> {
  return OneOf.of(set, error, contextError).context(message);
}

// ============================================================================
// Reshaping
// ============================================================================

/** Widen the error arm to a superset. */
export function widenErr<T, L extends VariantList, Other extends VariantList>(
  result: Result<T, OneOf<L>>,
  superset: TypeSet<Other> & ProvenSuperset<Other, L>,
): Result<T, OneOf<Other>> {
  return mapErr(result, (union) => union.widen<Other>(superset));
}

/**
 * Pull one candidate out of the error arm.
 *
 * `Ok` carries the extracted error; `Err` carries everything else, the
 * original success or a union over the remaining candidates.
 *
 * @example
 * ```typescript
 * const r = narrowErr(load(), variant.number);
 * if (isOk(r)) retry(r.value);
 * else return r.error; // Result<Config, OneOf<[Io, Bool]>>
 * ```
 */
export function narrowErr<T, L extends VariantList, D extends L[number]>(
  result: Result<T, OneOf<L>>,
  target: D,
): Result<ValueOf<D>, Result<T, OneOf<Narrow<L, D>>>> {
  if (!isErr(result)) {
    return Err(result);
  }
  const narrowed = result.error.narrow(target);
  return isErr(narrowed) ? Err(Err(narrowed.error)) : Ok(narrowed.value);
}

/**
 * Lift a bare error arm into a union over `set`.
 */
export function liftErr<T, L extends VariantList>(
  result: Result<T, Values<L>>,
  set: TypeSet<L>,
): Result<T, OneOf<L>> {
  return mapErr(result, (error) => OneOf.of(set, error, liftErr));
}

/**
 * Whether `result` failed with a `target` error, without consuming anything.
 */
export function isErrOf<T, L extends VariantList, D extends L[number]>(
  result: Result<T, OneOf<L>>,
  target: D,
): boolean {
  return isErr(result) && result.error.is(target);
}

/**
 * Test an erased error against a candidate, for code that only holds an
 * `unknown` (a `catch` clause, a rejected promise).
 */
export function errorIs<D extends Variant>(
  target: D,
  error: unknown,
): error is ValueOf<D> {
  return guard(target, error);
}
