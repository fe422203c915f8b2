/**
 * Formatter interface for transforming ReorderReports into output strings.
 *
 * Each output format (JSON, terminal-compact) is implemented as a function
 * conforming to this type. Formatters depend only on the Types layer.
 */

import type { ReorderReport } from "../types/report.js";

/**
 * A Formatter takes a ReorderReport and produces a formatted string
 * suitable for output to stdout or a file.
 */
export type Formatter = (report: ReorderReport) => string;
