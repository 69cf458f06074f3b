/**
 * Reporting
 *
 * Renders a union for a terminal: a header naming the matched candidate and
 * the set, the debug rendering, then one line per cause.
 *
 * @example Output:
 * ```
 * error[io] in {io, number, boolean}
 * IoError: disk gone
 *
 * Context:
 * 	- While reading the manifest
 * caused by: permission denied
 * ```
 */

import type { OneOf } from "./one-of.js";
import type { VariantList } from "./types.js";

export interface ReportOptions {
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
  /** Whether to list the cause chain (default: true) */
  causes?: boolean;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Render a union as a report. Does not consume it.
 */
export function renderReport<L extends VariantList>(
  union: OneOf<L>,
  options: ReportOptions = {},
): string {
  const lines = [`error[${union.tag}] in ${union.set.toString()}`, union.debug()];
  if (options.causes !== false) {
    for (const cause of union.chain()) {
      lines.push(`caused by: ${describeCause(cause)}`);
    }
  }
  return lines.join("\n");
}

/**
 * Print a union report (stderr by default).
 */
export function report<L extends VariantList>(union: OneOf<L>, options: ReportOptions = {}): void {
  const writer = options.writer ?? ((line: string) => console.error(line));
  writer(renderReport(union, options));
}
