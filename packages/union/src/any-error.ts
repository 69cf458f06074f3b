/**
 * A type-erased error slot: one candidate that takes any `Error`.
 *
 * Sets that need a catch-all for errors nobody names up front add
 * `variant.anyError` and build through {@link OneOf.anyError}.
 *
 * @module
 */

import type { Variant } from "./types.js";

/**
 * Wraps an arbitrary error. Displays and debugs as the wrapped error, and
 * its source is the wrapped error's `cause`.
 */
export class AnyError extends Error {
  constructor(readonly inner: Error) {
    super(inner.message);
    this.name = "AnyError";
  }

  /** Wrap `error`, unless it already is an `AnyError`. */
  static from(error: Error): AnyError {
    return error instanceof AnyError ? error : new AnyError(error);
  }
}

export type AnyErrorVariant = Variant<"anyError", AnyError>;
