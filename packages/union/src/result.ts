/**
 * Result Data Type
 *
 * Result represents the outcome of an operation that may fail: `Ok<T>` on
 * success, `Err<E>` on failure. Unions travel in the `Err` arm, and the
 * "failure" of a narrow or subset is an `Err` carrying the remainder union.
 */

// ============================================================================
// Result Type Definition
// ============================================================================

export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Ok variant - represents success
 */
export interface Ok<T> {
  readonly _tag: "Ok";
  readonly value: T;
}

/**
 * Err variant - represents failure
 */
export interface Err<E> {
  readonly _tag: "Err";
  readonly error: E;
}

// ============================================================================
// Constructors
// ============================================================================

export function Ok<T, E = never>(value: T): Result<T, E> {
  return { _tag: "Ok", value };
}

export function Err<E, T = never>(error: E): Result<T, E> {
  return { _tag: "Err", error };
}

// ============================================================================
// Guards
// ============================================================================

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === "Ok";
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === "Err";
}

// ============================================================================
// Combinators
// ============================================================================

export function map<T, E, U>(result: Result<T, E>, f: (value: T) => U): Result<U, E> {
  return result._tag === "Ok" ? Ok(f(result.value)) : result;
}

export function mapErr<T, E, F>(result: Result<T, E>, f: (error: E) => F): Result<T, F> {
  return result._tag === "Err" ? Err(f(result.error)) : result;
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result._tag === "Ok" ? result.value : fallback;
}

/**
 * The success value.
 *
 * @throws the error arm itself when `result` is an `Err`
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result._tag === "Err") {
    throw result.error;
  }
  return result.value;
}

/**
 * The failure value.
 *
 * @throws Error when `result` is an `Ok`
 */
export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (result._tag === "Ok") {
    throw new Error("unwrapErr called on an Ok result");
  }
  return result.error;
}
