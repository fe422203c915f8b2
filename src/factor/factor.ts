/**
 * Factor construction and the two level-permutation primitives every
 * reorder builds on.
 *
 * Dependencies: Types layer only.
 */

import type { Factor, FactorInput, Level, OrderedOption } from "../types/factor.js";
import { ArgumentError } from "./errors.js";

/**
 * Code-unit comparison of two labels. Locale-independent so level order is
 * the same on every machine.
 */
export function compareLabels(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Structural check for a Factor. Accepts any object with the three fields;
 * `createFactor` is what guarantees the invariants.
 */
export function isFactor(value: unknown): value is Factor {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return (
    "levels" in value &&
    Array.isArray(value.levels) &&
    "codes" in value &&
    Array.isArray(value.codes) &&
    "ordered" in value &&
    typeof value.ordered === "boolean"
  );
}

/**
 * Build a factor from a level list and per-observation codes.
 * Throws ArgumentError on duplicate levels or codes outside the level range.
 */
export function createFactor(
  levels: readonly Level[],
  codes: readonly (number | null)[],
  ordered = false,
): Factor {
  const seen = new Set<Level>();
  for (const level of levels) {
    if (seen.has(level)) {
      throw new ArgumentError(`duplicate level "${level}"`);
    }
    seen.add(level);
  }

  for (let i = 0; i < codes.length; i++) {
    const code = codes[i];
    if (code === null || code === undefined) {
      continue;
    }
    if (!Number.isInteger(code) || code < 0 || code >= levels.length) {
      throw new ArgumentError(
        `observation ${i + 1} has code ${code}, expected an integer in [0, ${levels.length})`,
      );
    }
  }

  return Object.freeze({
    levels: Object.freeze([...levels]),
    codes: Object.freeze(codes.map((code) => code ?? null)),
    ordered,
  });
}

/**
 * Coerce an input into a factor.
 *
 * Factors pass through unchanged. String sequences become a factor whose
 * levels are the distinct labels in code-unit order; number sequences one
 * whose levels are the distinct non-NaN values (infinities included) in
 * numeric order, labelled with `String(n)`. null, undefined and NaN are
 * missing observations.
 */
export function ensureFactor(input: FactorInput): Factor {
  if (isFactor(input)) {
    return input;
  }

  const raw: unknown = input;
  if (!Array.isArray(raw)) {
    throw new ArgumentError("`f` must be a factor or a sequence of labels");
  }

  const values: readonly (string | number | null | undefined)[] = input;
  let sawString = false;
  let sawNumber = false;
  for (const value of values) {
    if (value === null || value === undefined) {
      continue;
    }
    if (typeof value === "string") {
      sawString = true;
    } else if (typeof value === "number") {
      sawNumber = true;
    } else {
      throw new ArgumentError(
        `\`f\` must contain strings or numbers, got ${typeof value}`,
      );
    }
  }
  if (sawString && sawNumber) {
    throw new ArgumentError("`f` must not mix string and number labels");
  }

  const observed = values.map(toLabel);
  const levels = sawNumber ? numericLevels(values) : stringLevels(observed);
  const index = new Map(levels.map((level, i) => [level, i]));
  const codes = observed.map((label) =>
    label === null ? null : (index.get(label) ?? null),
  );

  return createFactor(levels, codes, false);
}

function toLabel(value: string | number | null | undefined): Level | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isNaN(value) ? null : String(value);
  }
  return value;
}

function stringLevels(observed: readonly (Level | null)[]): Level[] {
  const distinct = new Set<Level>();
  for (const label of observed) {
    if (label !== null) {
      distinct.add(label);
    }
  }
  return [...distinct].sort(compareLabels);
}

function numericLevels(values: readonly (string | number | null | undefined)[]): Level[] {
  const distinct = new Set<number>();
  for (const value of values) {
    if (typeof value === "number" && !Number.isNaN(value)) {
      distinct.add(value);
    }
  }
  const named = [...distinct].sort((a, b) => a - b).map(String);
  // 0 and -0 share the label "0".
  return [...new Set(named)];
}

/** The label of observation `i`, or null when it is missing. */
export function labelAt(f: Factor, i: number): Level | null {
  const code = f.codes[i];
  if (code === null || code === undefined) {
    return null;
  }
  return f.levels[code] ?? null;
}

/** The label of every observation, in order. */
export function labels(f: Factor): (Level | null)[] {
  return f.codes.map((_, i) => labelAt(f, i));
}

export function resolveOrdered(f: Factor, ordered: OrderedOption): boolean {
  return ordered === "inherit" ? f.ordered : ordered;
}

/**
 * Rebuild `f` against an explicit level list. Observations whose label is
 * not in `newLevels` become missing.
 */
export function refactor(
  f: Factor,
  newLevels: readonly Level[],
  ordered: OrderedOption = "inherit",
): Factor {
  const index = new Map<Level, number>();
  for (const level of newLevels) {
    if (index.has(level)) {
      throw new ArgumentError(`duplicate level "${level}"`);
    }
    index.set(level, index.size);
  }

  const codes = labels(f).map((label) =>
    label === null ? null : (index.get(label) ?? null),
  );
  return createFactor(newLevels, codes, resolveOrdered(f, ordered));
}

/**
 * Permute the levels of `f`. `order[k]` is the current index of the level
 * that moves to position `k`; it must name every level exactly once.
 */
export function reorderLevels(
  f: Factor,
  order: readonly number[],
  ordered: OrderedOption = "inherit",
): Factor {
  if (order.length !== f.levels.length) {
    throw new ArgumentError(
      `\`order\` must contain one index for each of the ${f.levels.length} levels, got ${order.length}`,
    );
  }

  const seen = new Set<number>();
  const newLevels: Level[] = [];
  for (const index of order) {
    const level = f.levels[index];
    if (!Number.isInteger(index) || level === undefined || seen.has(index)) {
      throw new ArgumentError(
        "`order` must contain each level index exactly once",
      );
    }
    seen.add(index);
    newLevels.push(level);
  }

  return refactor(f, newLevels, ordered);
}
