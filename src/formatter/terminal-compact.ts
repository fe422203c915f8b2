/**
 * Terminal-compact formatter: renders a ReorderReport as a short header and
 * an aligned level table for quick review in terminals.
 *
 * Depends only on the Types layer.
 */

import type { ReorderReport } from "../types/report.js";
import { describeOrdering } from "./method-helpers.js";

export function formatTerminalCompact(report: ReorderReport): string {
  const lines: string[] = [];

  lines.push(`levelsort: ${report.column}`);
  lines.push(`Method: ${describeOrdering(report)}`);
  lines.push(`Observations: ${report.observations} (${report.missing} missing)`);
  lines.push("");

  if (report.levels.length === 0) {
    lines.push("No levels.");
    return lines.join("\n");
  }

  const rows = report.levels.map((entry) => ({
    rank: String(entry.rank),
    level: entry.level,
    count: String(entry.count),
    was: entry.previousRank === null ? "-" : String(entry.previousRank),
  }));

  const widest = (cell: (row: typeof rows[number]) => string, min: number): number =>
    rows.reduce((width, row) => Math.max(width, cell(row).length), min);
  const rankWidth = widest((r) => r.rank, 4);
  const levelWidth = widest((r) => r.level, 5);
  const countWidth = widest((r) => r.count, 5);

  lines.push(["Rank".padEnd(rankWidth), "Level".padEnd(levelWidth), "Count".padEnd(countWidth), "Was"].join("  "));
  lines.push(["-".repeat(rankWidth), "-".repeat(levelWidth), "-".repeat(countWidth), "---"].join("  "));

  for (const row of rows) {
    lines.push([
      row.rank.padEnd(rankWidth),
      row.level.padEnd(levelWidth),
      row.count.padEnd(countWidth),
      row.was,
    ].join("  "));
  }

  lines.push("");
  if (report.levelTotalCount !== undefined) {
    lines.push(`Showing ${report.levels.length} of ${report.levelTotalCount} levels`);
  }
  const moved = report.levels.filter((entry) => entry.previousRank !== entry.rank);
  lines.push(`Moved: ${moved.length} of ${report.levels.length} levels`);

  if (report.warnings.length > 0) {
    lines.push("");
    lines.push("Warnings:");
    for (const warning of report.warnings) {
      lines.push(`  ${warning.message}`);
    }
  }

  return lines.join("\n");
}
