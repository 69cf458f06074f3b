/**
 * Trait-fold dispatch.
 *
 * Finds which candidate an erased value actually is by walking the set in
 * declared order and applying a capability (display, debug, source, or a
 * membership test) to the first candidate whose identity test matches.
 *
 * The walk table is built once per {@link TypeSet} and cached.
 *
 * @module
 */

import { violation } from "@unionerr/core";
import type { TypeSet } from "./type-set.js";
import type { Variant, VariantList } from "./types.js";

/** Capabilities the fold can apply to the matched candidate. */
export interface FoldCapabilities {
  display: string;
  debug: string;
  source: unknown;
}

export type FoldCapability = keyof FoldCapabilities;

/** One row of a dispatch table. */
export interface FoldEntry {
  readonly index: number;
  readonly tag: string;
  matches(value: unknown): boolean;
  apply<C extends FoldCapability>(capability: C, value: unknown): FoldCapabilities[C];
}

const tables = new WeakMap<object, readonly FoldEntry[]>();

function entryFor(variant: Variant, index: number): FoldEntry {
  const handlers: { [C in FoldCapability]: (value: unknown) => FoldCapabilities[C] } = {
    display: (value) => variant.display(value),
    debug: (value) => variant.debug(value),
    source: (value) => variant.source(value),
  };
  return {
    index,
    tag: variant.tag,
    matches: (value) => variant.is(value),
    apply: (capability, value) => handlers[capability](value),
  };
}

/**
 * The ordered dispatch table of a set.
 */
export function foldTable<L extends VariantList>(set: TypeSet<L>): readonly FoldEntry[] {
  let table = tables.get(set);
  if (!table) {
    table = set.variants.map((v, i) => entryFor(v, i));
    tables.set(set, table);
  }
  return table;
}

/**
 * Walk the set in order and return the first entry matching `value`, or
 * `undefined` when the walk reaches the end of the list.
 */
export function resolve<L extends VariantList>(
  set: TypeSet<L>,
  value: unknown,
): FoldEntry | undefined {
  for (const entry of foldTable(set)) {
    if (entry.matches(value)) {
      return entry;
    }
  }
  return undefined;
}

/**
 * Apply a capability to the candidate that `value` is. Falling off the end
 * of the list means the union was built unsoundly, so it throws.
 */
export function dispatch<L extends VariantList, C extends FoldCapability>(
  set: TypeSet<L>,
  value: unknown,
  capability: C,
): FoldCapabilities[C] {
  const entry = resolve(set, value);
  if (!entry) {
    throw violation(
      "unmatched",
      `No candidate of ${set.toString()} matches the stored value (${capability})`,
    );
  }
  return entry.apply(capability, value);
}

export function displayFold<L extends VariantList>(set: TypeSet<L>, value: unknown): string {
  return dispatch(set, value, "display");
}

export function debugFold<L extends VariantList>(set: TypeSet<L>, value: unknown): string {
  return dispatch(set, value, "debug");
}

/** The underlying cause of the stored value, for error-chain walking. */
export function sourceFold<L extends VariantList>(set: TypeSet<L>, value: unknown): unknown {
  return dispatch(set, value, "source");
}

/** Membership test. Never throws: the end of the list answers `false`. */
export function isFold<L extends VariantList>(set: TypeSet<L>, value: unknown): boolean {
  return resolve(set, value) !== undefined;
}
