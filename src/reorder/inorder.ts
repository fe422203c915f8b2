/**
 * Reorder levels by first appearance, by frequency, or by the numeric value
 * of their labels.
 */

import type { Factor, FactorInput, OrderedOption } from "../types/factor.js";
import { ArgumentError } from "../factor/errors.js";
import { ensureFactor, refactor, reorderLevels } from "../factor/factor.js";
import { countByLevel, stableOrder } from "../factor/tabulate.js";

export interface LevelOrderOptions {
  /** Defaults to "inherit": keep the input's flag. */
  readonly ordered?: OrderedOption;
}

/**
 * Levels in the order their first non-missing observation appears. Levels
 * that no observation uses follow in their original order.
 */
export function fctInorder(f: FactorInput, options: LevelOrderOptions = {}): Factor {
  const factor = ensureFactor(f);

  const seen = new Set<number>();
  const order: number[] = [];
  for (const code of factor.codes) {
    if (code !== null && !seen.has(code)) {
      seen.add(code);
      order.push(code);
    }
  }
  factor.levels.forEach((_, index) => {
    if (!seen.has(index)) {
      order.push(index);
    }
  });

  return reorderLevels(factor, order, options.ordered ?? "inherit");
}

/**
 * Levels by descending number of observations. Equal counts keep the
 * original level order; unused levels come last.
 */
export function fctInfreq(f: FactorInput, options: LevelOrderOptions = {}): Factor {
  const factor = ensureFactor(f);
  const order = stableOrder(countByLevel(factor), { desc: true });
  return reorderLevels(factor, order, options.ordered ?? "inherit");
}

/**
 * Numeric value of a label, or NaN when it is not a number. Surrounding
 * whitespace is ignored; a blank label is not numeric.
 */
export function parseNumericLabel(label: string): number {
  const trimmed = label.trim();
  return trimmed === "" ? Number.NaN : Number(trimmed);
}

/**
 * Levels by ascending numeric value of their labels. Labels that are not
 * numbers follow in their original order. Throws when no label is numeric.
 */
export function fctInseq(f: FactorInput, options: LevelOrderOptions = {}): Factor {
  const factor = ensureFactor(f);

  const values = factor.levels.map(parseNumericLabel);
  if (values.every((value) => Number.isNaN(value))) {
    throw new ArgumentError(
      "no level is numeric: at least one level must be coercible to a number",
    );
  }

  const newLevels = stableOrder(values).flatMap((index) => {
    const level = factor.levels[index];
    return level === undefined ? [] : [level];
  });
  return refactor(factor, newLevels, options.ordered ?? "inherit");
}
