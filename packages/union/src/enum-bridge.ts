/**
 * Enum bridge: closed discriminated unions for exhaustive matching.
 *
 * A union over `[A, B, C]` converts to `E3<A, B, C>`, whose cases are keyed
 * by list position (`"A"`, `"B"`, `"C"`) under `variant`:
 *
 * ```typescript
 * const e = union.toEnum();
 * switch (e.variant) {
 *   case "A": return e.value.message;
 *   case "B": return `code ${e.value}`;
 *   case "C": return e.value ? "yes" : "no";
 * }
 * ```
 *
 * Three flavours exist: owned (`toEnum`, consumes the union), shared
 * (`asEnum`, a frozen view) and exclusive (`asEnumMut`, writes go back into
 * the union).
 *
 * @module
 */

import { invariant, violation } from "@unionerr/core";
import { resolve } from "./fold.js";
import type { TypeSet } from "./type-set.js";
import type { ValueOf, Variant, VariantList } from "./types.js";

export const CASE_KEYS = ["A", "B", "C", "D", "E", "F", "G", "H", "I"] as const;

export type CaseKey = (typeof CASE_KEYS)[number];

/** A case of a closed union. */
export interface Case<K extends string, V> {
  readonly variant: K;
  readonly value: V;
}

/** A case whose value can be replaced in place. */
export interface MutCase<K extends string, V> {
  readonly variant: K;
  value: V;
}

export type E1<A> = Case<"A", A>;
export type E2<A, B> = E1<A> | Case<"B", B>;
export type E3<A, B, C> = E2<A, B> | Case<"C", C>;
export type E4<A, B, C, D> = E3<A, B, C> | Case<"D", D>;
export type E5<A, B, C, D, E> = E4<A, B, C, D> | Case<"E", E>;
export type E6<A, B, C, D, E, F> = E5<A, B, C, D, E> | Case<"F", F>;
export type E7<A, B, C, D, E, F, G> = E6<A, B, C, D, E, F> | Case<"G", G>;
export type E8<A, B, C, D, E, F, G, H> = E7<A, B, C, D, E, F, G> | Case<"H", H>;
export type E9<A, B, C, D, E, F, G, H, I> = E8<A, B, C, D, E, F, G, H> | Case<"I", I>;

type KeyAt<K> = K extends `${infer N extends number}` ? (typeof CASE_KEYS)[N] : never;

/** The owned closed union for a candidate list. */
export type EnumOf<L extends VariantList> = {
  [K in keyof L]: Case<KeyAt<K>, ValueOf<L[K]>>;
}[number];

/** The shared-borrow closed union for a candidate list. */
export type RefEnumOf<L extends VariantList> = {
  [K in keyof L]: Case<KeyAt<K>, Readonly<ValueOf<L[K]>>>;
}[number];

/** The exclusive-borrow closed union for a candidate list. */
export type MutEnumOf<L extends VariantList> = {
  [K in keyof L]: MutCase<KeyAt<K>, ValueOf<L[K]>>;
}[number];

/** Storage a mutable view writes through to. */
export interface PayloadCell {
  value: unknown;
}

function caseKey(index: number): CaseKey {
  const key = CASE_KEYS[index];
  invariant(key !== undefined, "arity", () => `No case key for position ${index}`);
  return key;
}

function matchedEntry<L extends VariantList>(set: TypeSet<L>, value: unknown) {
  const entry = resolve(set, value);
  if (!entry) {
    throw violation("unmatched", `No candidate of ${set.toString()} matches the stored value`);
  }
  return entry;
}

/**
 * Close a case built from a runtime match. The position comes from the
 * identity scan, so the key and the value agree with `R`.
 */
function close<R>(view: unknown): R {
  return view as R;
}

/** Build the owned case for `value`. */
export function toEnum<L extends VariantList>(set: TypeSet<L>, value: unknown): EnumOf<L> {
  const entry = matchedEntry(set, value);
  return close<EnumOf<L>>({ variant: caseKey(entry.index), value });
}

/** Build a frozen shared view of `value`. */
export function asEnum<L extends VariantList>(set: TypeSet<L>, value: unknown): RefEnumOf<L> {
  const entry = matchedEntry(set, value);
  return close<RefEnumOf<L>>(Object.freeze({ variant: caseKey(entry.index), value }));
}

/**
 * Build an exclusive view whose `value` writes through to `cell`. The view's
 * own enumerable properties are `variant` and `value`, like the other
 * flavours; the cell stays in the accessor closure.
 */
export function asEnumMut<L extends VariantList>(set: TypeSet<L>, cell: PayloadCell): MutEnumOf<L> {
  const entry = matchedEntry(set, cell.value);
  const variant = caseKey(entry.index);
  const candidate: Variant = set.variants[entry.index];
  const view = Object.defineProperties(
    {},
    {
      variant: { value: variant, enumerable: true },
      value: {
        enumerable: true,
        get: (): unknown => cell.value,
        set: (next: unknown) => {
          invariant(
            candidate.is(next),
            "variant-changed",
            () => `Case ${variant} only accepts ${candidate.tag} values`,
          );
          cell.value = next;
        },
      },
    },
  );
  return close<MutEnumOf<L>>(Object.seal(view));
}
