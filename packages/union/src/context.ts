/**
 * Context trace: diagnostic messages and a one-time backtrace attached to a
 * union.
 *
 * Messages are kept in push order, root cause first. The backtrace is taken
 * once when the union is first built and travels unchanged through every
 * narrow, widen and subset; recapturing would point at the wrong origin.
 *
 * @module
 */

import { config } from "@unionerr/core";

export type BacktraceStatus = "captured" | "disabled";

/** A function whose caller is where a captured backtrace starts. */
export type StackEntry = (...args: never[]) => unknown;

const MAX_FRAMES = 100;

/**
 * A snapshot of the call stack. Capture is best-effort and controlled by the
 * `backtrace` configuration flag; a disabled backtrace renders as nothing.
 */
export class Backtrace {
  private constructor(
    readonly status: BacktraceStatus,
    readonly frames: readonly string[],
  ) {}

  /**
   * Capture the current stack if `backtrace` is enabled. Frames start at the
   * caller of `entry`, so pass the public function that led here.
   */
  static capture(entry: StackEntry = Backtrace.capture): Backtrace {
    if (!config.has("backtrace")) {
      return Backtrace.disabled();
    }
    const holder: { stack?: string } = {};
    const limit = Error.stackTraceLimit;
    Error.stackTraceLimit = MAX_FRAMES;
    try {
      Error.captureStackTrace(holder, entry);
    } finally {
      Error.stackTraceLimit = limit;
    }
    const frames = (holder.stack ?? "")
      .split("\n")
      .slice(1)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    return new Backtrace("captured", frames);
  }

  static disabled(): Backtrace {
    return new Backtrace("disabled", []);
  }

  get isCaptured(): boolean {
    return this.status === "captured";
  }

  toString(): string {
    return this.frames.join("\n");
  }
}

/**
 * Ordered diagnostic messages plus the backtrace of the union's origin.
 */
export class ContextTrace {
  private readonly entries: string[] = [];

  constructor(readonly backtrace: Backtrace = Backtrace.capture()) {}

  /**
   * Append a message. A no-op when the `context` flag is off.
   */
  push(message: string): void {
    if (!config.has("context")) return;
    this.entries.push(message);
  }

  /**
   * Append a lazily built message. `build` only runs when context is
   * recorded.
   */
  pushWith(build: () => string): void {
    if (!config.has("context")) return;
    this.entries.push(build());
  }

  /** Messages, oldest first. */
  get messages(): readonly string[] {
    return this.entries;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /**
   * The Context block, or `""` when no message was pushed.
   *
   * ```text
   *
   *
   * Context:
   * 	- From func2
   * 	- From func3
   * ```
   */
  renderContext(): string {
    if (this.isEmpty) return "";
    return `\n\nContext:${this.entries.map((m) => `\n\t- ${m}`).join("")}`;
  }

  /** The Backtrace block, or `""` when none was captured. */
  renderBacktrace(): string {
    if (!this.backtrace.isCaptured) return "";
    return `\n\nBacktrace:\n${this.backtrace.toString()}`;
  }
}
