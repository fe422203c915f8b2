/**
 * Configuration schema for a levelsort run.
 */

import type { OrderedOption } from "./factor.js";
import type { MethodId } from "./method.js";

/**
 * Supported output formats.
 */
export type OutputFormat = "terminal-compact" | "json";

/**
 * Named summary functions selectable from the CLI and MCP surfaces.
 * Unary summaries apply to `reorder`; paired ones to `reorder2`.
 */
export type UnarySummaryName = "median" | "mean" | "min" | "max" | "sum" | "count";
export type PairedSummaryName = "last2" | "first2";
export type SummaryName = UnarySummaryName | PairedSummaryName;

/**
 * What to reorder and how: everything a run needs besides I/O.
 */
export interface ReorderRequest {
  /** Which reordering method to apply. */
  readonly method: MethodId;
  /** Column holding the factor labels. */
  readonly column: string;
  /**
   * Declared level set, in order. Labels outside it become missing; levels
   * no observation uses are kept. Undefined means the distinct labels.
   */
  readonly levels?: readonly string[] | undefined;
  /** Column summarised by `reorder` and `reorder2`. */
  readonly x?: string | undefined;
  /** Second column summarised by `reorder2`. */
  readonly y?: string | undefined;
  /** Summary to apply per level. Undefined means the method's default. */
  readonly summary?: SummaryName | undefined;
  /** Drop missing values before summarising. */
  readonly naRm: boolean;
  /** Sort direction. Undefined means the method's default. */
  readonly desc?: boolean | undefined;
  readonly ordered: OrderedOption;
}

/**
 * Configuration for a single CLI run.
 */
export interface ReorderConfig extends ReorderRequest {
  /** Path to the JSON dataset. */
  readonly inputPath: string;
  readonly outputFormat: OutputFormat;
  /** Optional output file path. If omitted, output goes to stdout. */
  readonly outputPath?: string | undefined;
  /** Limit the reported levels to the first N. Undefined means no limit. */
  readonly topN?: number | undefined;
}
