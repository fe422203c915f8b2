/**
 * Summary functions used as per-level sort keys.
 *
 * Each function reduces one group to a single scalar. Options that other
 * APIs would forward as loose extra arguments (such as dropping missing
 * values) are typed per function, so an option a summary does not accept
 * is rejected by the compiler.
 */

import type { Comparable, Missing, SortKey } from "../types/factor.js";
import type { PairedSummaryName, SummaryName, UnarySummaryName } from "../types/config.js";
import { ArgumentError } from "../factor/errors.js";
import { isMissingKey, stableOrder } from "../factor/tabulate.js";

/** A numeric observation; null, undefined and NaN are missing. */
export type NumericValue = number | Missing;

/** A summary returns one scalar per group; undefined counts as missing. */
export type SummaryFn<X> = (values: readonly X[]) => SortKey | undefined;

export type PairedSummaryFn<X, Y> = (
  x: readonly X[],
  y: readonly Y[],
) => SortKey | undefined;

/** A sort key as accepted on input; undefined counts as missing. */
export type KeyValue = SortKey | undefined;

export interface NaRmOptions {
  /** Drop missing values before summarising. */
  readonly naRm?: boolean;
}

/**
 * The present values of a group, or null when a missing value is present
 * and `naRm` is off (the summary is then missing too).
 */
function presentValues(
  values: readonly NumericValue[],
  options: NaRmOptions,
): number[] | null {
  const present: number[] = [];
  for (const value of values) {
    if (value === null || value === undefined || Number.isNaN(value)) {
      if (options.naRm !== true) {
        return null;
      }
      continue;
    }
    present.push(value);
  }
  return present;
}

/** Fold without spreading the group into call arguments. */
function extreme(values: readonly number[], pick: (a: number, b: number) => boolean): number | null {
  let best: number | null = null;
  for (const value of values) {
    if (best === null || pick(value, best)) {
      best = value;
    }
  }
  return best;
}

export function median(
  values: readonly NumericValue[],
  options: NaRmOptions = {},
): number | null {
  const present = presentValues(values, options);
  if (present === null || present.length === 0) {
    return null;
  }
  const sorted = present.sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? null;
  if (sorted.length % 2 === 1 || upper === null) {
    return upper;
  }
  const lower = sorted[mid - 1] ?? upper;
  return (lower + upper) / 2;
}

export function mean(
  values: readonly NumericValue[],
  options: NaRmOptions = {},
): number | null {
  const present = presentValues(values, options);
  if (present === null || present.length === 0) {
    return null;
  }
  return present.reduce((acc, v) => acc + v, 0) / present.length;
}

export function min(
  values: readonly NumericValue[],
  options: NaRmOptions = {},
): number | null {
  const present = presentValues(values, options);
  if (present === null) {
    return null;
  }
  return extreme(present, (a, b) => a < b);
}

export function max(
  values: readonly NumericValue[],
  options: NaRmOptions = {},
): number | null {
  const present = presentValues(values, options);
  if (present === null) {
    return null;
  }
  return extreme(present, (a, b) => a > b);
}

export function sum(
  values: readonly NumericValue[],
  options: NaRmOptions = {},
): number | null {
  const present = presentValues(values, options);
  if (present === null) {
    return null;
  }
  return present.reduce((acc, v) => acc + v, 0);
}

/** Number of observations in the group, missing ones included. */
export function count(values: readonly unknown[]): number {
  return values.length;
}

/**
 * Stable ascending order of `x` with missing values placed first or last.
 */
function orderBy(x: readonly Comparable[], missing: "first" | "last"): number[] {
  const keys: SortKey[] = x.map((v) => v ?? null);
  const order = stableOrder(keys);
  if (missing === "last") {
    return order;
  }
  return [
    ...order.filter((i) => isMissingKey(keys[i])),
    ...order.filter((i) => !isMissingKey(keys[i])),
  ];
}

function checkPaired(x: readonly Comparable[], y: readonly unknown[]): void {
  if (x.length !== y.length) {
    throw new ArgumentError(
      `length mismatch: \`x\` has ${x.length} values but \`y\` has ${y.length}`,
    );
  }
  const kinds = new Set<string>();
  for (const value of x) {
    if (!isMissingKey(value)) kinds.add(typeof value);
  }
  if (kinds.size > 1) {
    throw new ArgumentError("`x` must be all numbers or all strings");
  }
}

/**
 * The `y` value at the largest `x`. Missing `x` values sort first, so they
 * are only chosen when every `x` is missing. Among ties for the largest `x`,
 * the one that appears last wins. Empty groups give null.
 */
export function last2<Y>(x: readonly Comparable[], y: readonly Y[]): Y | null {
  checkPaired(x, y);
  const order = orderBy(x, "first");
  const position = order[order.length - 1];
  return position === undefined ? null : (y[position] ?? null);
}

/**
 * The `y` value at the smallest `x`. Missing `x` values sort last. Among
 * ties for the smallest `x`, the one that appears first wins. Empty groups
 * give null.
 */
export function first2<Y>(x: readonly Comparable[], y: readonly Y[]): Y | null {
  checkPaired(x, y);
  const position = orderBy(x, "last")[0];
  return position === undefined ? null : (y[position] ?? null);
}

/**
 * Keep only the pairs where neither value is missing.
 */
export function completePairs<X extends Comparable, Y extends SortKey | undefined>(
  x: readonly X[],
  y: readonly Y[],
): [X[], Y[]] {
  checkPaired(x, y);
  const keptX: X[] = [];
  const keptY: Y[] = [];
  x.forEach((xv, i) => {
    const yv = y[i];
    if (yv !== undefined && !isMissingKey(xv ?? null) && !isMissingKey(yv)) {
      keptX.push(xv);
      keptY.push(yv);
    }
  });
  return [keptX, keptY];
}

/**
 * Named unary summary, selectable from the CLI and MCP surfaces.
 */
export interface SummaryDescriptor {
  readonly name: UnarySummaryName;
  readonly description: string;
  readonly fn: (values: readonly NumericValue[], options: NaRmOptions) => SortKey;
}

export interface PairedSummaryDescriptor {
  readonly name: PairedSummaryName;
  readonly description: string;
  readonly fn: (
    x: readonly Comparable[],
    y: readonly KeyValue[],
    options: NaRmOptions,
  ) => SortKey;
}

export const SUMMARIES: ReadonlyMap<UnarySummaryName, SummaryDescriptor> = new Map([
  ["median", { name: "median", description: "Middle value", fn: median }],
  ["mean", { name: "mean", description: "Arithmetic mean", fn: mean }],
  ["min", { name: "min", description: "Smallest value", fn: min }],
  ["max", { name: "max", description: "Largest value", fn: max }],
  ["sum", { name: "sum", description: "Total of the values", fn: sum }],
  [
    "count",
    {
      name: "count",
      description: "Number of observations",
      fn: count,
    },
  ],
]);

function pairsFor(
  x: readonly Comparable[],
  y: readonly KeyValue[],
  options: NaRmOptions,
): readonly [readonly Comparable[], readonly KeyValue[]] {
  return options.naRm === true ? completePairs(x, y) : [x, y];
}

function last2Summary(
  x: readonly Comparable[],
  y: readonly KeyValue[],
  options: NaRmOptions,
): SortKey {
  const [px, py] = pairsFor(x, y, options);
  return last2(px, py) ?? null;
}

function first2Summary(
  x: readonly Comparable[],
  y: readonly KeyValue[],
  options: NaRmOptions,
): SortKey {
  const [px, py] = pairsFor(x, y, options);
  return first2(px, py) ?? null;
}

export const PAIRED_SUMMARIES: ReadonlyMap<PairedSummaryName, PairedSummaryDescriptor> =
  new Map([
    ["last2", { name: "last2", description: "y at the largest x", fn: last2Summary }],
    ["first2", { name: "first2", description: "y at the smallest x", fn: first2Summary }],
  ]);

const UNARY_NAMES: ReadonlySet<string> = new Set(SUMMARIES.keys());
const PAIRED_NAMES: ReadonlySet<string> = new Set(PAIRED_SUMMARIES.keys());

export function isUnarySummaryName(name: string): name is UnarySummaryName {
  return UNARY_NAMES.has(name);
}

export function isPairedSummaryName(name: string): name is PairedSummaryName {
  return PAIRED_NAMES.has(name);
}

export function isSummaryName(name: string): name is SummaryName {
  return isUnarySummaryName(name) || isPairedSummaryName(name);
}
