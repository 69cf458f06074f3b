/**
 * Variant descriptors for common candidate types.
 *
 * Class variants match on exact prototype identity, never `instanceof`: a
 * subclass is a different type, so a value can only ever match one slot of a
 * well-formed set and the scan order never changes the answer.
 *
 * @module
 */

import { inspect } from "node:util";
import { AnyError, type AnyErrorVariant } from "./any-error.js";
import type { Unprovable } from "./type-set.js";
import type { Variant, VariantCapabilities } from "./types.js";

/**
 * Rejects a tag typed as plain `string`. The set algebra compares tags at
 * the type level, so a tag must be a literal for the proofs to hold.
 */
export type LiteralTag<Tag extends string> = string extends Tag
  ? Unprovable<"variant tags must be string literals">
  : unknown;

function displayUnknown(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

function debugUnknown(value: unknown): string {
  return value instanceof Error ? String(value) : inspect(value, { depth: 4 });
}

function sourceUnknown(value: unknown): unknown {
  return value instanceof Error ? value.cause : undefined;
}

/**
 * Create a variant from a predicate. The predicate is the type identity:
 * it must not accept values of any other candidate in the same set.
 *
 * @example
 * ```typescript
 * interface HttpFailure { kind: "http"; status: number }
 * const Http = variantOf("HttpFailure", (v): v is HttpFailure =>
 *   typeof v === "object" && v !== null && "kind" in v && v.kind === "http",
 *   { display: (f) => `HTTP ${f.status}` },
 * );
 * ```
 */
export function variantOf<Tag extends string, T>(
  tag: Tag & LiteralTag<Tag>,
  is: (value: unknown) => value is T,
  caps: VariantCapabilities<T> = {},
): Variant<Tag, T> {
  return {
    tag,
    is,
    display: caps.display ?? displayUnknown,
    debug: caps.debug ?? debugUnknown,
    source: caps.source ?? sourceUnknown,
  };
}

/**
 * Create a variant for instances of exactly `ctor`.
 *
 * Errors display their `message`, debug as `Name: message`, and expose
 * `cause` as their source.
 */
function classVariant<Tag extends string, T extends object>(
  tag: Tag & LiteralTag<Tag>,
  ctor: abstract new (...args: never[]) => T,
  caps: VariantCapabilities<T> = {},
): Variant<Tag, T> {
  const prototype: unknown = ctor.prototype;
  return variantOf<Tag, T>(
    tag,
    (value): value is T =>
      typeof value === "object" && value !== null && Object.getPrototypeOf(value) === prototype,
    caps,
  );
}

const numberVariant: Variant<"number", number> = variantOf(
  "number",
  (v): v is number => typeof v === "number",
);

const stringVariant: Variant<"string", string> = variantOf(
  "string",
  (v): v is string => typeof v === "string",
  { display: (s) => s, debug: (s) => JSON.stringify(s) },
);

const booleanVariant: Variant<"boolean", boolean> = variantOf(
  "boolean",
  (v): v is boolean => typeof v === "boolean",
);

const bigintVariant: Variant<"bigint", bigint> = variantOf(
  "bigint",
  (v): v is bigint => typeof v === "bigint",
  { debug: (n) => `${n}n` },
);

const symbolVariant: Variant<"symbol", symbol> = variantOf(
  "symbol",
  (v): v is symbol => typeof v === "symbol",
  { display: (s) => s.toString(), debug: (s) => s.toString() },
);

const anyErrorVariant: AnyErrorVariant = classVariant("anyError", AnyError, {
  display: (e) => e.inner.message,
  debug: (e) => String(e.inner),
  source: (e) => e.inner.cause,
});

/**
 * Variant factory for classes, with the primitive variants attached.
 *
 * @example
 * ```typescript
 * class IoError extends Error {}
 * const Io = variant("IoError", IoError);
 * const Errors = typeSet(Io, variant.number, variant.boolean);
 * ```
 */
export const variant = Object.assign(classVariant, {
  number: numberVariant,
  string: stringVariant,
  boolean: booleanVariant,
  bigint: bigintVariant,
  symbol: symbolVariant,
  anyError: anyErrorVariant,
  of: variantOf,
});
