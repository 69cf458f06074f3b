/**
 * Core types for open unions.
 *
 * TypeScript erases types, so every candidate type of a union is described
 * by a {@link Variant}: a literal `tag` that is the type's compile-time
 * identity, an exact runtime identity test, and the capabilities the
 * dispatch layer needs (display, debug, error source). A candidate list is a
 * tuple of variants.
 *
 * @module
 */

/**
 * Describes one candidate type of a union.
 *
 * @typeParam Tag - Literal name identifying the type. Two variants with the
 *   same tag are the same type as far as the set algebra is concerned.
 * @typeParam T - The value type the variant admits.
 */
export interface Variant<Tag extends string = string, T = unknown> {
  readonly tag: Tag;
  /** Exact type-identity test. Must not match values of any other candidate. */
  is(value: unknown): value is T;
  /** User-facing rendering. */
  display(value: T): string;
  /** Developer-facing rendering. */
  debug(value: T): string;
  /** The underlying cause, for error-chain walking; `undefined` when none. */
  source(value: T): unknown;
}

/** Optional capability overrides accepted by the variant factories. */
export interface VariantCapabilities<T> {
  display?: (value: T) => string;
  debug?: (value: T) => string;
  source?: (value: T) => unknown;
}

/** Any ordered candidate list. */
export type VariantList = readonly Variant[];

/** Candidate lists a set may be built from: arity 0 to 9. */
export type BoundedVariantList =
  | readonly []
  | readonly [Variant]
  | readonly [Variant, Variant]
  | readonly [Variant, Variant, Variant]
  | readonly [Variant, Variant, Variant, Variant]
  | readonly [Variant, Variant, Variant, Variant, Variant]
  | readonly [Variant, Variant, Variant, Variant, Variant, Variant]
  | readonly [Variant, Variant, Variant, Variant, Variant, Variant, Variant]
  | readonly [Variant, Variant, Variant, Variant, Variant, Variant, Variant, Variant]
  | readonly [Variant, Variant, Variant, Variant, Variant, Variant, Variant, Variant, Variant];

/** The largest candidate list a set accepts. */
export const MAX_ARITY = 9;

/** The literal tag of a variant. */
export type TagOf<V> = V extends { readonly tag: infer Tag extends string } ? Tag : never;

/** The value type a variant admits. */
export type ValueOf<V> = V extends Variant<string, infer T> ? T : never;

/** Union of every value type in a candidate list. */
export type Values<L extends VariantList> = ValueOf<L[number]>;

/** Tags of a candidate list, in order. */
export type Tags<L extends VariantList> = { [K in keyof L]: TagOf<L[K]> };
