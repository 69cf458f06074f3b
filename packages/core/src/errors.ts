/** Reason codes for invariant violations inside the union machinery. */
export type UnionInvariantReason =
  | "arity"
  | "duplicate-variant"
  | "not-a-member"
  | "moved"
  | "unmatched"
  | "take-mismatch"
  | "variant-changed"
  | "unprovable";

/**
 * Thrown when an internal invariant of a union is violated.
 *
 * These are programming errors (a value built outside its declared candidate
 * set, a union used after it was consumed). Expected failures such as a
 * narrow that does not match are never thrown; they come back as the
 * remainder union.
 */
export class UnionInvariantError extends Error {
  constructor(
    readonly reason: UnionInvariantReason,
    message: string,
  ) {
    super(message);
    this.name = "UnionInvariantError";
  }
}
