/**
 * Reorder levels by a summary of one or two auxiliary vectors.
 *
 * `fctReorder` suits 1-d displays where the factor is mapped to position;
 * `fctReorder2` suits 2-d displays where the factor is mapped to a
 * non-position aesthetic, so that legend order matches the order of the
 * line endpoints.
 *
 * Levels without observations, and levels whose summary is missing, go
 * after every level with a summary value, in their original order. Ties
 * keep the original level order.
 */

import type { Comparable, Factor, FactorInput, OrderedOption, SortKey } from "../types/factor.js";
import { ArgumentError } from "../factor/errors.js";
import { ensureFactor, reorderLevels } from "../factor/factor.js";
import { groupSummary, splitByLevel, stableOrder } from "../factor/tabulate.js";
import {
  last2,
  median,
  type KeyValue,
  type NumericValue,
  type PairedSummaryFn,
  type SummaryFn,
} from "./summary.js";

export interface ReorderOptions<X> {
  /** Summary per level. Defaults to `median`, which needs numeric `x`. */
  readonly fun?: SummaryFn<X>;
  /** Sort descending. Defaults to false. */
  readonly desc?: boolean;
  readonly ordered?: OrderedOption;
}

export interface Reorder2Options<X, Y> {
  /** Summary per level. Defaults to `last2`. */
  readonly fun?: PairedSummaryFn<X, Y>;
  /** Sort descending. Defaults to true. */
  readonly desc?: boolean;
  readonly ordered?: OrderedOption;
}

function checkLength(f: Factor, name: string, values: readonly unknown[]): void {
  if (values.length !== f.codes.length) {
    throw new ArgumentError(
      `length mismatch: \`f\` has ${f.codes.length} observations but \`${name}\` has ${values.length}`,
    );
  }
}

/**
 * Validates a summary result. The signature already limits summaries to a
 * scalar; this catches untyped callers returning arrays or objects.
 */
function toSortKey(value: unknown): SortKey {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number" || typeof value === "string") {
    return value;
  }
  if (typeof value === "object") {
    throw new ArgumentError("summary function must return a single value per group");
  }
  throw new ArgumentError(
    `summary function must return a number, a string or a missing value, got ${typeof value}`,
  );
}

function numericVector(name: string, values: readonly unknown[]): NumericValue[] {
  return values.map((value) => {
    if (value === null || value === undefined || typeof value === "number") {
      return value;
    }
    throw new ArgumentError(
      `\`${name}\` must be numeric when no summary function is given`,
    );
  });
}

function comparableVector(name: string, values: readonly unknown[]): Comparable[] {
  return values.map((value) => {
    if (
      value === null ||
      value === undefined ||
      typeof value === "number" ||
      typeof value === "string"
    ) {
      return value;
    }
    throw new ArgumentError(
      `\`${name}\` must hold numbers or strings when no summary function is given`,
    );
  });
}

/**
 * Like `groupSummary`, for two aligned vectors.
 */
function pairedSummary<X, Y>(
  f: Factor,
  x: readonly X[],
  y: readonly Y[],
  fn: (xs: readonly X[], ys: readonly Y[]) => SortKey,
): SortKey[] {
  const yGroups = splitByLevel(f, y);
  return splitByLevel(f, x).map((xs, level) =>
    xs.length === 0 ? null : fn(xs, yGroups[level] ?? []),
  );
}

/**
 * Reorder the levels of `f` by `fun` applied to the `x` values of each
 * level, ascending unless `desc` is set.
 */
export function fctReorder(
  f: FactorInput,
  x: readonly NumericValue[],
  options?: ReorderOptions<NumericValue>,
): Factor;
export function fctReorder<X>(
  f: FactorInput,
  x: readonly X[],
  options: ReorderOptions<X> & { readonly fun: SummaryFn<X> },
): Factor;
export function fctReorder<X>(
  f: FactorInput,
  x: readonly X[],
  options: ReorderOptions<X> = {},
): Factor {
  const factor = ensureFactor(f);
  checkLength(factor, "x", x);

  const fun = options.fun;
  let summary: SortKey[];
  if (fun !== undefined) {
    summary = groupSummary(factor, x, (group) => toSortKey(fun(group)));
  } else {
    summary = groupSummary(factor, numericVector("x", x), (group) => median(group));
  }

  const order = stableOrder(summary, { desc: options.desc ?? false });
  return reorderLevels(factor, order, options.ordered ?? "inherit");
}

/**
 * Reorder the levels of `f` by `fun` applied to the aligned `x` and `y`
 * values of each level, descending unless `desc` is false.
 */
export function fctReorder2(
  f: FactorInput,
  x: readonly Comparable[],
  y: readonly KeyValue[],
  options?: Reorder2Options<Comparable, KeyValue>,
): Factor;
export function fctReorder2<X, Y>(
  f: FactorInput,
  x: readonly X[],
  y: readonly Y[],
  options: Reorder2Options<X, Y> & { readonly fun: PairedSummaryFn<X, Y> },
): Factor;
export function fctReorder2<X, Y>(
  f: FactorInput,
  x: readonly X[],
  y: readonly Y[],
  options: Reorder2Options<X, Y> = {},
): Factor {
  const factor = ensureFactor(f);
  checkLength(factor, "x", x);
  checkLength(factor, "y", y);

  const fun = options.fun;
  let summary: SortKey[];
  if (fun !== undefined) {
    summary = pairedSummary(factor, x, y, (xs, ys) => toSortKey(fun(xs, ys)));
  } else {
    summary = pairedSummary(
      factor,
      comparableVector("x", x),
      comparableVector("y", y),
      (xs, ys) => last2(xs, ys) ?? null,
    );
  }

  const order = stableOrder(summary, { desc: options.desc ?? true });
  return reorderLevels(factor, order, options.ordered ?? "inherit");
}
