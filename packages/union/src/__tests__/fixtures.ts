/**
 * Shared candidate types for the union tests.
 */

import { typeSet, variant } from "../index.js";

export class IoError extends Error {
  readonly kind = "io";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "IoError";
  }
}

export class ParseError extends Error {
  readonly kind = "parse";

  constructor(
    message: string,
    readonly line: number,
  ) {
    super(message);
    this.name = "ParseError";
  }
}

/** Same shape as IoError, different runtime identity. */
export class RetryableIoError extends IoError {}

export const Io = variant("io", IoError);
export const Parse = variant("parse", ParseError);

export const Errors = typeSet(Io, variant.number, variant.boolean);

// Compile-time assertions
export type Equals<A, B> = [A] extends [B] ? ([B] extends [A] ? true : false) : false;
export type Assert<T extends true> = T;
