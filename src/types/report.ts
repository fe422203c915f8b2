/**
 * Report types produced by a reorder run.
 *
 * A report describes the level set after reordering and how it relates to
 * the level set before, so consumers can see which levels moved without
 * re-deriving the permutation.
 */

import type { Level } from "./factor.js";
import type { MethodId } from "./method.js";
import type { SummaryName } from "./config.js";

/**
 * One level of the reordered factor.
 */
export interface LevelEntry {
  readonly level: Level;
  /** 1-based position after reordering. */
  readonly rank: number;
  /** 1-based position before reordering, or null if the level is new. */
  readonly previousRank: number | null;
  /** Observations pointing at this level. */
  readonly count: number;
}

export type ReorderWarningKind = "unused-level" | "dropped-label";

/**
 * A non-fatal condition noticed while reordering.
 */
export interface ReorderWarning {
  readonly kind: ReorderWarningKind;
  readonly level: Level;
  readonly message: string;
}

export interface ReorderReport {
  readonly method: MethodId;
  readonly column: string;
  /** Summary used, for the methods that summarise. */
  readonly summary: SummaryName | null;
  /** Sort direction, for the methods that take one. */
  readonly desc: boolean | null;
  readonly ordered: boolean;
  /** Total observations, missing included. */
  readonly observations: number;
  /** Observations without a level after reordering. */
  readonly missing: number;
  readonly levels: readonly LevelEntry[];
  /** Set when `levels` was truncated: the number of levels before truncation. */
  readonly levelTotalCount?: number;
  readonly warnings: readonly ReorderWarning[];
}
