/**
 * `OneOf`: an open union.
 *
 * A `OneOf<L>` holds exactly one value whose type is one of the candidates of
 * `L`, without a dedicated enum for that combination. Functions can return
 * a precise set of errors and callers peel off the ones they handle:
 *
 * ```typescript
 * const Errors = typeSet(Io, variant.number, variant.boolean);
 *
 * function load(): Result<Config, OneOf<typeof Errors.variants>> { ... }
 *
 * const r = load();
 * if (isErr(r)) {
 *   const n = r.error.narrow(variant.number);
 *   // n: Result<number, OneOf<[typeof Io, typeof variant.boolean]>>
 * }
 * ```
 *
 * Every transform moves the payload into a new view; the moved-from union
 * can no longer be used. The payload, its context messages and its
 * backtrace are carried, never copied or recaptured.
 *
 * @module
 */

import { inspect } from "node:util";
import { AnyError, type AnyErrorVariant } from "./any-error.js";
import { config, debugLog, debugOnly, invariant, violation } from "@unionerr/core";
import { Backtrace, ContextTrace, type StackEntry } from "./context.js";
import * as bridge from "./enum-bridge.js";
import type { EnumOf, MutEnumOf, PayloadCell, RefEnumOf } from "./enum-bridge.js";
import { debugFold, displayFold, isFold, resolve, sourceFold } from "./fold.js";
import { Err, Ok, type Result } from "./result.js";
import { guard } from "./type-set.js";
import type { Contains, Narrow, ProvenSuperset, SupersetOf, TypeSet, Unprovable } from "./type-set.js";
import type { ValueOf, Values, Variant, VariantList } from "./types.js";

interface Payload extends PayloadCell {
  readonly trace: ContextTrace;
}

/** Resolves to `unknown` for single-candidate lists, otherwise rejects. */
export type SingleCandidate<L extends VariantList> = L extends readonly [Variant]
  ? unknown
  : Unprovable<"only a union with exactly one candidate can be unwrapped">;

/** Resolves to `unknown` when `L` has the `anyError` slot. */
export type AcceptsAnyError<L extends VariantList> = Contains<L, AnyErrorVariant> extends true
  ? unknown
  : Unprovable<"the set has no anyError candidate">;

/** Options for {@link OneOf.display}. */
export interface DisplayOptions {
  /** Append the Context block (default: the `render.displayContext` setting) */
  context?: boolean;
}

export class OneOf<L extends VariantList> {
  private payload: Payload | undefined;

  private constructor(
    readonly set: TypeSet<L>,
    payload: Payload,
  ) {
    this.payload = payload;
  }

  /**
   * Wrap `value` in a union over `set`. Captures the backtrace (when
   * enabled) and starts with no context.
   *
   * `entry` is the function whose caller the backtrace starts at; helpers
   * that build unions on a caller's behalf pass themselves.
   *
   * @throws UnionInvariantError when no candidate's identity test accepts
   *   `value`, e.g. a subclass instance of a class candidate
   */
  static of<L extends VariantList>(
    set: TypeSet<L>,
    value: Values<L>,
    entry: StackEntry = OneOf.of,
  ): OneOf<L> {
    invariant(
      set.isFold(value),
      "not-a-member",
      () => `Value is not exactly one of ${set.toString()}`,
    );
    return new OneOf(set, { value, trace: new ContextTrace(Backtrace.capture(entry)) });
  }

  /**
   * Wrap an arbitrary error into the set's `anyError` slot.
   *
   * @example
   * ```typescript
   * const Errors = typeSet(Io, variant.anyError);
   * const u = OneOf.anyError(Errors, new TypeError("bad header"));
   * u.tag; // "anyError"
   * ```
   */
  static anyError<L extends VariantList>(
    set: TypeSet<L> & AcceptsAnyError<L>,
    error: Error,
  ): OneOf<L> {
    const value = AnyError.from(error);
    invariant(set.isFold(value), "not-a-member", () => `${set.toString()} has no anyError slot`);
    return new OneOf<L>(set, { value, trace: new ContextTrace(Backtrace.capture(OneOf.anyError)) });
  }

  private static carry<R extends VariantList>(set: TypeSet<R>, payload: Payload): OneOf<R> {
    debugOnly(() =>
      invariant(
        set.isFold(payload.value),
        "unprovable",
        () => `Relabelled value is not a member of ${set.toString()}`,
      ),
    );
    debugLog("union", () => `carried payload to ${set.toString()}`);
    return new OneOf(set, payload);
  }

  private get live(): Payload {
    const payload = this.payload;
    if (!payload) {
      throw violation("moved", `Union over ${this.set.toString()} was used after being consumed`);
    }
    return payload;
  }

  private moveOut(): Payload {
    const payload = this.live;
    this.payload = undefined;
    return payload;
  }

  /** Whether a consuming operation already took the payload. */
  get isMoved(): boolean {
    return this.payload === undefined;
  }

  /** The context trace carried by this union. */
  get trace(): ContextTrace {
    return this.live.trace;
  }

  get backtrace(): Backtrace {
    return this.live.trace.backtrace;
  }

  /** Context messages, oldest first. */
  get contextMessages(): readonly string[] {
    return this.live.trace.messages;
  }

  // ==========================================================================
  // Transforms
  // ==========================================================================

  /**
   * Extract `target`, or get back a union over the remaining candidates.
   * Consumes this union either way.
   */
  narrow<D extends L[number]>(target: D): Result<ValueOf<D>, OneOf<Narrow<L, D>>> {
    const payload = this.moveOut();
    const value = payload.value;
    if (guard(target, value)) {
      return Ok(value);
    }
    return Err(OneOf.carry(this.set.without(target), payload));
  }

  /**
   * View this union as one over a superset of its candidates. A relabel:
   * no runtime test, no payload copy.
   */
  widen<Other extends VariantList>(other: TypeSet<Other> & ProvenSuperset<Other, L>): OneOf<Other> {
    return OneOf.carry<Other>(other, this.moveOut());
  }

  /**
   * Split off a subset of candidates: `Ok` with a union over `targets` when
   * the value is one of them, otherwise `Err` with a union over the rest.
   */
  subset<T extends VariantList>(
    targets: TypeSet<T> & ProvenSuperset<L, T>,
  ): Result<OneOf<T>, OneOf<SupersetOf<L, T>>> {
    const payload = this.moveOut();
    if (isFold(targets, payload.value)) {
      return Ok(OneOf.carry<T>(targets, payload));
    }
    return Err(OneOf.carry(this.set.remainderOf<T>(targets), payload));
  }

  /**
   * Unwrap a single-candidate union.
   */
  take(this: OneOf<L> & SingleCandidate<L>): ValueOf<L[0]> {
    const value = this.moveOut().value;
    if (!this.set.isFirst(value)) {
      throw violation("take-mismatch", `Stored value is not a ${this.set.toString()}`);
    }
    return value;
  }

  /**
   * Borrow the value of a single-candidate union.
   */
  inner(this: OneOf<L> & SingleCandidate<L>): ValueOf<L[0]> {
    const value = this.live.value;
    if (!this.set.isFirst(value)) {
      throw violation("take-mismatch", `Stored value is not a ${this.set.toString()}`);
    }
    return value;
  }

  /**
   * Replace the value of a single-candidate union, keeping its context and
   * backtrace.
   */
  map<M extends VariantList>(
    this: OneOf<L> & SingleCandidate<L>,
    target: TypeSet<M>,
    f: (value: ValueOf<L[0]>) => Values<M>,
  ): OneOf<M> {
    const payload = this.moveOut();
    const value = payload.value;
    if (!this.set.isFirst(value)) {
      throw violation("take-mismatch", `Stored value is not a ${this.set.toString()}`);
    }
    const next = f(value);
    invariant(target.isFold(next), "not-a-member", () => `Mapped value is not exactly one of ${target.toString()}`);
    payload.value = next;
    return OneOf.carry(target, payload);
  }

  /** Borrow the stored value as the union of candidate types. */
  peek(): Values<L> {
    const value = this.live.value;
    if (!this.set.isFold(value)) {
      throw violation("unmatched", `No candidate of ${this.set.toString()} matches the stored value`);
    }
    return value;
  }

  /** Tag of the candidate the stored value is. */
  get tag(): string {
    const entry = resolve(this.set, this.live.value);
    if (!entry) {
      throw violation("unmatched", `No candidate of ${this.set.toString()} matches the stored value`);
    }
    return entry.tag;
  }

  /** Identity test against one candidate, without consuming. */
  is<D extends L[number]>(target: D): boolean {
    return guard(target, this.live.value);
  }

  // ==========================================================================
  // Enum bridge
  // ==========================================================================

  /** Consume into the closed union for exhaustive matching. */
  toEnum(): EnumOf<L> {
    return bridge.toEnum(this.set, this.moveOut().value);
  }

  /** A frozen closed-union view of the stored value. */
  asEnum(): RefEnumOf<L> {
    return bridge.asEnum(this.set, this.live.value);
  }

  /** A closed-union view whose `value` writes back into this union. */
  asEnumMut(): MutEnumOf<L> {
    return bridge.asEnumMut(this.set, this.live);
  }

  // ==========================================================================
  // Context
  // ==========================================================================

  /** Append a context message. Returns this union. */
  context(message: string): this {
    this.live.trace.push(message);
    return this;
  }

  /** Append a lazily built context message. Returns this union. */
  withContext(build: () => string): this {
    this.live.trace.pushWith(build);
    return this;
  }

  // ==========================================================================
  // Rendering and error source
  // ==========================================================================

  /**
   * The value's display form, followed by the Context block when context was
   * pushed.
   */
  display(options: DisplayOptions = {}): string {
    const payload = this.live;
    const withContext = options.context ?? config.get("render.displayContext") !== false;
    const head = displayFold(this.set, payload.value);
    return withContext ? head + payload.trace.renderContext() : head;
  }

  /**
   * The value's debug form, followed by the Context block and, when
   * captured, the Backtrace block.
   */
  debug(): string {
    const payload = this.live;
    return (
      debugFold(this.set, payload.value) +
      payload.trace.renderContext() +
      payload.trace.renderBacktrace()
    );
  }

  toString(): string {
    return this.display();
  }

  [inspect.custom](): string {
    return this.debug();
  }

  /** The stored value's underlying cause, if any. */
  source(): unknown {
    return sourceFold(this.set, this.live.value);
  }

  /**
   * Successive causes starting from {@link source}, following `Error.cause`.
   */
  chain(): unknown[] {
    const causes: unknown[] = [];
    const seen = new Set<unknown>();
    let current = this.source();
    while (current !== undefined && current !== null && !seen.has(current)) {
      causes.push(current);
      seen.add(current);
      current = current instanceof Error ? current.cause : undefined;
    }
    return causes;
  }
}

/**
 * Wrap `value` in a union over `set`.
 *
 * @example
 * ```typescript
 * const u = oneOf(Errors, new IoError("boom"));
 * ```
 */
export function oneOf<L extends VariantList>(set: TypeSet<L>, value: Values<L>): OneOf<L> {
  return OneOf.of(set, value, oneOf);
}
