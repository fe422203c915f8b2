/**
 * Shared helpers for resolving method metadata from the METHODS registry.
 */

import type { MethodId } from "../types/method.js";
import type { ReorderReport } from "../types/report.js";
import { METHODS } from "../types/method.js";

/**
 * Returns the human-readable method name, falling back to the raw id if
 * not found in the registry.
 */
export function methodName(method: MethodId): string {
  const descriptor = METHODS.get(method);
  return descriptor !== undefined ? descriptor.name : method;
}

/**
 * One-line description of how the report was ordered, e.g.
 * "By Summary (median, descending)".
 */
export function describeOrdering(report: ReorderReport): string {
  const details: string[] = [];
  if (report.summary !== null) {
    details.push(report.summary);
  }
  if (report.desc !== null) {
    details.push(report.desc ? "descending" : "ascending");
  }
  if (report.ordered) {
    details.push("ordered");
  }
  const name = methodName(report.method);
  return details.length > 0 ? `${name} (${details.join(", ")})` : name;
}
