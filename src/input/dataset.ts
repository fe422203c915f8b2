/**
 * JSON dataset loading.
 *
 * A dataset is a JSON array of row objects whose cells are strings, numbers,
 * booleans or null. Parsing failures are operational errors and are
 * returned, not thrown.
 *
 * Dependencies: Types layer, zod.
 */

import { z } from "zod";
import type { Comparable } from "../types/factor.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";

export const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const rowSchema = z.record(z.string(), cellSchema);
const datasetSchema = z.array(rowSchema);

export type Cell = z.infer<typeof cellSchema>;
export type Row = z.infer<typeof rowSchema>;

export interface Dataset {
  readonly rows: readonly Row[];
  /** Column names in order of first appearance. */
  readonly columns: readonly string[];
}

export interface DatasetError {
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Build a dataset from already-validated rows. `declared` columns are
 * listed first and exist even when no row carries them.
 */
export function createDataset(
  rows: readonly Row[],
  declared: readonly string[] = [],
): Dataset {
  const columns = new Set<string>(declared);
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }
  return { rows, columns: [...columns] };
}

/**
 * Parse and validate dataset JSON text.
 */
export function parseDataset(text: string): Result<Dataset, DatasetError> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    return err({ message: `Dataset is not valid JSON: ${message}`, cause });
  }

  const parsed = datasetSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0
      ? ` at ${issue.path.join(".")}`
      : "";
    const detail = issue !== undefined ? issue.message : "invalid structure";
    return err({
      message: `Dataset must be an array of rows with string, number, boolean or null cells${where}: ${detail}`,
      cause: parsed.error,
    });
  }

  return ok(createDataset(parsed.data));
}

/**
 * The cells of one column. Rows without the column give null.
 */
export function columnValues(
  dataset: Dataset,
  name: string,
): Result<Cell[], DatasetError> {
  if (!dataset.columns.includes(name)) {
    const available = dataset.columns.length > 0 ? dataset.columns.join(", ") : "(none)";
    return err({
      message: `Unknown column "${name}". Available columns: ${available}`,
    });
  }
  // Own properties only: a row without `toString` must not read Object.prototype's.
  return ok(dataset.rows.map((row) => (Object.hasOwn(row, name) ? (row[name] ?? null) : null)));
}

/**
 * Factor labels for a column. A column whose present cells are all numbers
 * stays numeric (levels sort numerically); anything else becomes strings.
 */
export function toLabels(
  cells: readonly Cell[],
): (string | null)[] | (number | null)[] {
  const numeric: (number | null)[] = [];
  for (const cell of cells) {
    if (cell !== null && typeof cell !== "number") {
      return cells.map((value) => (value === null ? null : String(value)));
    }
    numeric.push(cell);
  }
  return numeric;
}

/**
 * Numeric values for an auxiliary column. Booleans count as 1 and 0.
 */
export function toNumeric(
  name: string,
  cells: readonly Cell[],
): Result<(number | null)[], DatasetError> {
  const values: (number | null)[] = [];
  for (const [i, cell] of cells.entries()) {
    if (typeof cell === "string") {
      return err({
        message: `Column "${name}" must be numeric, found "${cell}" in row ${i + 1}`,
      });
    }
    values.push(typeof cell === "boolean" ? Number(cell) : cell);
  }
  return ok(values);
}

/**
 * Comparable values for an auxiliary column. Booleans count as 1 and 0.
 */
export function toComparable(cells: readonly Cell[]): Comparable[] {
  return cells.map((cell) => (typeof cell === "boolean" ? Number(cell) : cell));
}
