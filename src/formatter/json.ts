/**
 * JSON formatter: serializes a ReorderReport to a JSON string.
 *
 * The output adds the method's human-readable name so consumers can
 * interpret the report without consulting the method registry.
 */

import type { ReorderReport } from "../types/report.js";
import { methodName } from "./method-helpers.js";

/**
 * Formats a ReorderReport as a pretty-printed JSON string.
 * Key order is fixed, so identical reports give identical output.
 */
export function formatJson(report: ReorderReport): string {
  const enriched = {
    method: report.method,
    methodName: methodName(report.method),
    column: report.column,
    summary: report.summary,
    desc: report.desc,
    ordered: report.ordered,
    observations: report.observations,
    missing: report.missing,
    levels: report.levels,
    ...(report.levelTotalCount !== undefined
      ? { levelTotalCount: report.levelTotalCount }
      : {}),
    warnings: report.warnings,
  };
  return JSON.stringify(enriched, null, 2);
}
