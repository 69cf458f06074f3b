/**
 * @unionerr/union: open unions of error (or any) types.
 *
 * @example
 * ```typescript
 * import { typeSet, variant, oneOf, isErr } from "@unionerr/union";
 *
 * class IoError extends Error {
 *   readonly kind = "io";
 * }
 * const Io = variant("io", IoError);
 * const Errors = typeSet(Io, variant.number, variant.boolean);
 *
 * const e = oneOf(Errors, 404).context("While fetching the index");
 * const n = e.narrow(variant.number); // Ok(404)
 * ```
 *
 * @packageDocumentation
 */

// Core types
export type {
  BoundedVariantList,
  TagOf,
  Tags,
  ValueOf,
  Values,
  Variant,
  VariantCapabilities,
  VariantList,
} from "./types.js";
export { MAX_ARITY } from "./types.js";

// Variants
export type { LiteralTag } from "./variants.js";
export { variant, variantOf } from "./variants.js";
export type { AnyErrorVariant } from "./any-error.js";
export { AnyError } from "./any-error.js";

// Set algebra
export type {
  Contains,
  IsDistinct,
  IsSuperset,
  Narrow,
  ProvenSuperset,
  SupersetOf,
  Unprovable,
} from "./type-set.js";
export { TypeSet, guard, typeSet } from "./type-set.js";

// Dispatch
export type { FoldCapabilities, FoldCapability, FoldEntry } from "./fold.js";
export {
  debugFold,
  dispatch,
  displayFold,
  foldTable,
  isFold,
  resolve,
  sourceFold,
} from "./fold.js";

// Context
export type { BacktraceStatus, StackEntry } from "./context.js";
export { Backtrace, ContextTrace } from "./context.js";

// Union value
export type { AcceptsAnyError, DisplayOptions, SingleCandidate } from "./one-of.js";
export { OneOf, oneOf } from "./one-of.js";

// Enum bridge
export type {
  Case,
  CaseKey,
  E1,
  E2,
  E3,
  E4,
  E5,
  E6,
  E7,
  E8,
  E9,
  EnumOf,
  MutCase,
  MutEnumOf,
  PayloadCell,
  RefEnumOf,
} from "./enum-bridge.js";
export { CASE_KEYS } from "./enum-bridge.js";

// Result channel
export type { Err as ErrResult, Ok as OkResult, Result } from "./result.js";
export { Err, Ok, isErr, isOk, map, mapErr, unwrap, unwrapErr, unwrapOr } from "./result.js";

// Result-level helpers
export {
  context,
  contextError,
  errorIs,
  isErrOf,
  liftErr,
  narrowErr,
  widenErr,
  withContext,
} from "./reshape.js";

// Reporting
export type { ReportOptions } from "./report.js";
export { renderReport, report } from "./report.js";

// Errors and configuration
export { UnionInvariantError, config, defineConfig } from "@unionerr/core";
export type { UnionInvariantReason, UnionerrConfig } from "@unionerr/core";
