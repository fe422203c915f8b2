/**
 * Factor data model.
 *
 * A factor is a sequence of observations, each pointing at one label of an
 * ordered level set. Reordering changes the position of labels in `levels`;
 * the label each observation resolves to never changes.
 */

/** A level label. Numeric inputs are labelled with `String(n)`. */
export type Level = string;

export interface Factor {
  /** Unique labels; position is the level's rank. */
  readonly levels: readonly Level[];
  /** 0-based index into `levels` per observation, or null when missing. */
  readonly codes: readonly (number | null)[];
  /** Whether levels carry a total order for comparisons. */
  readonly ordered: boolean;
}

/** Missing values accepted on input. Both normalize to null. */
export type Missing = null | undefined;

/**
 * Anything `ensureFactor` accepts: an existing factor, a sequence of string
 * labels, or a sequence of numbers.
 */
export type FactorInput =
  | Factor
  | readonly (string | Missing)[]
  | readonly (number | Missing)[];

/**
 * Whether the result of a reorder is an ordered factor.
 * "inherit" keeps the flag of the input.
 */
export type OrderedOption = boolean | "inherit";

/**
 * The single scalar a summary function returns for one group.
 * null (and NaN) mean the group has no usable summary.
 */
export type SortKey = number | string | null;

/** Values that can be compared when ordering observations inside a group. */
export type Comparable = number | string | Missing;
