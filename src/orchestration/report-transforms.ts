/**
 * Pure transformations on ReorderReport.
 *
 * These functions post-process a report without mutating the original.
 * They are used by both the CLI runner and the MCP server handler.
 *
 * Dependencies: Types layer only.
 */

import type { ReorderReport } from "../types/report.js";

/**
 * Returns a new report whose levels are truncated to the first `n`.
 * When truncation occurs, sets levelTotalCount so consumers know the full count.
 */
export function limitLevels(report: ReorderReport, n: number): ReorderReport {
  if (report.levels.length <= n) {
    return report;
  }
  return {
    ...report,
    levels: report.levels.slice(0, n),
    levelTotalCount: report.levels.length,
  };
}
