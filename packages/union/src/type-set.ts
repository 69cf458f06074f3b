/**
 * TypeSet algebra.
 *
 * The relationships between candidate lists are proved at the type level
 * over variant tags: membership, narrowing with a remainder, and superset
 * with a remainder. A failed proof is `never`, so an operation whose
 * relationship cannot be proved does not type-check.
 *
 * {@link TypeSet} is the runtime mirror of a list: it carries the variant
 * descriptors needed for identity tests and memoises every remainder it
 * computes, so each distinct list is built once.
 *
 * @module
 */

import { invariant, violation } from "@unionerr/core";
import type { BoundedVariantList, TagOf, ValueOf, Values, Variant, VariantList } from "./types.js";
import { MAX_ARITY } from "./types.js";

// ============================================================================
// Type-Level Algebra
// ============================================================================

type NarrowByTag<L, Tag> = L extends readonly [infer H, ...infer R]
  ? [TagOf<H>] extends [Tag]
    ? R
    : [H, ...NarrowByTag<R, Tag>]
  : never;

type SupersetByTags<Big, Small> = Small extends readonly [infer H, ...infer R]
  ? SupersetByTags<NarrowByTag<Big, TagOf<H>>, R>
  : Big;

/**
 * `L` with the slot matching `Target` removed, order preserved. `never` when
 * `Target` is not in `L`.
 *
 * @example
 * ```typescript
 * type R = Narrow<[IoErr, Num, Bool], Num>; // [IoErr, Bool]
 * ```
 */
export type Narrow<L extends VariantList, Target extends Variant> =
  NarrowByTag<L, TagOf<Target>> extends infer R extends VariantList ? R : never;

/**
 * The slots of `Big` left after matching every entry of `Small` to a distinct
 * slot, order preserved. `never` when some entry cannot be matched.
 *
 * @example
 * ```typescript
 * type R = SupersetOf<[U8, U16, U32, U64], [U8, U64]>; // [U16, U32]
 * ```
 */
export type SupersetOf<Big extends VariantList, Small extends VariantList> =
  SupersetByTags<Big, Small> extends infer R extends VariantList ? R : never;

/** `true` when `V` is one of the candidates of `L`. */
export type Contains<L extends VariantList, V extends Variant> =
  [Narrow<L, V>] extends [never] ? false : true;

/** `true` when every candidate of `Small` occurs in `Big`. */
export type IsSuperset<Big extends VariantList, Small extends VariantList> =
  [SupersetOf<Big, Small>] extends [never] ? false : true;

/** `true` when no tag occurs twice in `L`. */
export type IsDistinct<L extends VariantList> = L extends readonly [
  infer H extends Variant,
  ...infer R extends VariantList,
]
  ? Contains<R, H> extends true
    ? false
    : IsDistinct<R>
  : true;

/** Placeholder type that no value satisfies, carrying the failed proof. */
export interface Unprovable<Message extends string> {
  readonly __unprovable: Message;
}

/**
 * Parameter guard: resolves to `unknown` (no constraint) when `Big` is a
 * superset of `Small`, otherwise to an {@link Unprovable} that rejects the
 * argument at compile time.
 */
export type ProvenSuperset<Big extends VariantList, Small extends VariantList> =
  IsSuperset<Big, Small> extends true
    ? unknown
    : Unprovable<"the target set does not contain every candidate of the source set">;

// ============================================================================
// Runtime Mirror
// ============================================================================

/**
 * Re-tag a set with the list the type-level algebra computed for it.
 * Identity at runtime.
 */
function retag<R extends VariantList>(set: TypeSet<VariantList>): TypeSet<R> {
  return set as unknown as TypeSet<R>;
}

/**
 * Narrow an erased value with a variant's identity test.
 */
export function guard<V extends Variant>(variant: V, value: unknown): value is ValueOf<V> {
  return variant.is(value);
}

/**
 * The runtime form of a candidate list.
 *
 * @typeParam L - The ordered tuple of variants.
 */
export class TypeSet<L extends VariantList> {
  private readonly remainders = new Map<string, TypeSet<VariantList>>();

  private constructor(readonly variants: L) {}

  /**
   * Build a set from variants. Rejects more than nine candidates and
   * repeated tags.
   */
  static of<L extends BoundedVariantList>(...variants: L): TypeSet<L> {
    TypeSet.validate(variants);
    return new TypeSet(variants);
  }

  private static validate(variants: VariantList): void {
    invariant(
      variants.length <= MAX_ARITY,
      "arity",
      () => `A type set holds at most ${MAX_ARITY} variants, got ${variants.length}`,
    );
    const seen = new Set<string>();
    for (const v of variants) {
      invariant(!seen.has(v.tag), "duplicate-variant", () => `Variant "${v.tag}" occurs twice`);
      seen.add(v.tag);
    }
  }

  /** Number of candidates. */
  get size(): number {
    return this.variants.length;
  }

  /** Candidate tags in declared order. */
  get tags(): string[] {
    return this.variants.map((v) => v.tag);
  }

  /**
   * Position of the candidate whose identity test matches `value`, scanning
   * in declared order; `-1` when none does.
   */
  indexOf(value: unknown): number {
    for (let i = 0; i < this.variants.length; i++) {
      if (this.variants[i].is(value)) {
        return i;
      }
    }
    return -1;
  }

  /** Membership of an erased value in this set. */
  isFold(value: unknown): value is Values<L> {
    return this.indexOf(value) !== -1;
  }

  /**
   * Identity test against the first candidate, typed by that candidate's
   * value type. `false` for the empty set.
   */
  isFirst(value: unknown): value is ValueOf<L[0]> {
    const first: Variant | undefined = this.variants[0];
    return first !== undefined && first.is(value);
  }

  /** Whether a variant with the same tag is a candidate. */
  has(variant: Variant): boolean {
    return this.variants.some((v) => v.tag === variant.tag);
  }

  /**
   * The remainder after removing `target`. Memoised per target tag.
   */
  without<D extends L[number]>(target: D): TypeSet<Narrow<L, D>> {
    const key = `-${target.tag}`;
    const cached = this.remainders.get(key);
    if (cached) return retag<Narrow<L, D>>(cached);

    const index = this.variants.findIndex((v) => v.tag === target.tag);
    if (index === -1) {
      throw violation("unprovable", `"${target.tag}" is not a candidate of ${this.toString()}`);
    }
    const remainder = new TypeSet<VariantList>(this.variants.filter((_, i) => i !== index));
    this.remainders.set(key, remainder);
    return retag<Narrow<L, D>>(remainder);
  }

  /**
   * The remainder after matching every candidate of `subset` to a distinct
   * slot of this set. Memoised per subset.
   */
  remainderOf<S extends VariantList>(subset: TypeSet<S>): TypeSet<SupersetOf<L, S>> {
    const key = `/${subset.tags.join(",")}`;
    const cached = this.remainders.get(key);
    if (cached) return retag<SupersetOf<L, S>>(cached);

    let remaining: readonly Variant[] = this.variants;
    for (const wanted of subset.variants) {
      const index = remaining.findIndex((v) => v.tag === wanted.tag);
      if (index === -1) {
        throw violation(
          "unprovable",
          `${this.toString()} is not a superset of ${subset.toString()}: "${wanted.tag}" is missing`,
        );
      }
      remaining = remaining.filter((_, i) => i !== index);
    }
    const remainder = new TypeSet<VariantList>(remaining);
    this.remainders.set(key, remainder);
    return retag<SupersetOf<L, S>>(remainder);
  }

  toString(): string {
    return `{${this.tags.join(", ")}}`;
  }
}

/**
 * Build a {@link TypeSet} from variants.
 *
 * @example
 * ```typescript
 * const Errors = typeSet(IoErr, variant.number, variant.boolean);
 * ```
 */
export function typeSet<L extends BoundedVariantList>(...variants: L): TypeSet<L> {
  return TypeSet.of(...variants);
}
