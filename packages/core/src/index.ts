/**
 * Core module exports for @unionerr/core
 *
 * This package provides:
 * - Configuration (defaults, config files, UNIONERR_* environment variables)
 * - Runtime safety primitives (invariant, unreachable, debugOnly)
 * - Debug logging
 */

// Configuration System
export {
  config,
  defineConfig,
  loadConfigFromEnv,
  type UnionerrConfig,
  type RenderConfig,
} from "./config.js";

// Runtime Safety Primitives
export { invariant, violation, unreachable, debugOnly } from "./safety.js";

// Errors
export { UnionInvariantError, type UnionInvariantReason } from "./errors.js";

// Debug Logging
export { debugLog, formatLogLine, setLogWriter, type LogWriter } from "./diagnostics.js";
