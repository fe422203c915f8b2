/**
 * Tabulation, grouping and ordering primitives shared by the reorder
 * functions.
 */

import type { Factor, SortKey } from "../types/factor.js";
import { ArgumentError } from "./errors.js";
import { compareLabels } from "./factor.js";

/**
 * Observation count per level, in level order. Missing observations are
 * not counted; unused levels count 0.
 */
export function countByLevel(f: Factor): number[] {
  const counts = f.levels.map(() => 0);
  for (const code of f.codes) {
    if (code !== null) {
      counts[code] = (counts[code] ?? 0) + 1;
    }
  }
  return counts;
}

/**
 * Split `values` by the level of the aligned observation, in level order.
 * Values of missing observations are left out.
 */
export function splitByLevel<T>(f: Factor, values: readonly T[]): T[][] {
  const groups = f.levels.map((): T[] => []);
  values.forEach((value, position) => {
    const code = f.codes[position];
    if (code !== null && code !== undefined) {
      groups[code]?.push(value);
    }
  });
  return groups;
}

/**
 * Apply `fn` to the values of every level that has at least one
 * observation. Levels without observations get null and `fn` is not called
 * for them.
 */
export function groupSummary<T, R>(
  f: Factor,
  values: readonly T[],
  fn: (group: readonly T[]) => R,
): (R | null)[] {
  return splitByLevel(f, values).map((group) =>
    group.length === 0 ? null : fn(group),
  );
}

export interface StableOrderOptions {
  readonly desc?: boolean;
}

function compareNumbers(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** null, undefined and NaN carry no ordering information. */
export function isMissingKey(key: SortKey | undefined): boolean {
  return key === null || key === undefined || (typeof key === "number" && Number.isNaN(key));
}

/**
 * Stable permutation that sorts `keys`.
 *
 * Missing keys (null, undefined, NaN) always come last in their input order,
 * whatever the direction. Equal keys keep their input order. Keys must be
 * all numbers or all strings.
 */
export function stableOrder(
  keys: readonly SortKey[],
  options: StableOrderOptions = {},
): number[] {
  const sign = options.desc === true ? -1 : 1;

  let sawString = false;
  let sawNumber = false;
  for (const key of keys) {
    if (isMissingKey(key)) continue;
    if (typeof key === "string") sawString = true;
    else sawNumber = true;
  }
  if (sawString && sawNumber) {
    throw new ArgumentError("summary values must be all numbers or all strings");
  }

  const positions = keys.map((_, i) => i);
  return positions.sort((i, j) => {
    const a = keys[i];
    const b = keys[j];
    const aMissing = isMissingKey(a);
    const bMissing = isMissingKey(b);
    if (aMissing || bMissing) {
      if (aMissing && bMissing) return 0;
      return aMissing ? 1 : -1;
    }
    if (typeof a === "number" && typeof b === "number") {
      return sign * compareNumbers(a, b);
    }
    if (typeof a === "string" && typeof b === "string") {
      return sign * compareLabels(a, b);
    }
    return 0;
  });
}
