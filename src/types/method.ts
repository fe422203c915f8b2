/**
 * Reordering methods that levelsort supports.
 * Each method maps to one entry point of the reorder layer.
 */

import type { SummaryName } from "./config.js";

export type MethodId =
  | "reorder"
  | "reorder2"
  | "inorder"
  | "infreq"
  | "inseq";

export interface MethodDescriptor {
  readonly id: MethodId;
  readonly name: string;
  readonly description: string;
  /** Whether the method summarises an `x` column. */
  readonly needsX: boolean;
  /** Whether the method summarises a `y` column alongside `x`. */
  readonly needsY: boolean;
  /** Summary used when none is configured; null if the method takes none. */
  readonly defaultSummary: SummaryName | null;
  /** Default sort direction; null if the method has no direction option. */
  readonly defaultDesc: boolean | null;
}

export const METHODS: ReadonlyMap<MethodId, MethodDescriptor> = new Map([
  [
    "reorder",
    {
      id: "reorder",
      name: "By Summary",
      description: "Sort levels by a summary of another column",
      needsX: true,
      needsY: false,
      defaultSummary: "median",
      defaultDesc: false,
    },
  ],
  [
    "reorder2",
    {
      id: "reorder2",
      name: "By Paired Summary",
      description:
        "Sort levels by a summary of two columns (default: y at the largest x)",
      needsX: true,
      needsY: true,
      defaultSummary: "last2",
      defaultDesc: true,
    },
  ],
  [
    "inorder",
    {
      id: "inorder",
      name: "First Appearance",
      description: "Order levels by their first appearance in the data",
      needsX: false,
      needsY: false,
      defaultSummary: null,
      defaultDesc: null,
    },
  ],
  [
    "infreq",
    {
      id: "infreq",
      name: "Frequency",
      description: "Order levels by number of observations, most frequent first",
      needsX: false,
      needsY: false,
      defaultSummary: null,
      defaultDesc: null,
    },
  ],
  [
    "inseq",
    {
      id: "inseq",
      name: "Numeric Value",
      description: "Order levels by the numeric value of their labels",
      needsX: false,
      needsY: false,
      defaultSummary: null,
      defaultDesc: null,
    },
  ],
]);

const METHOD_IDS: ReadonlySet<string> = new Set(METHODS.keys());

export function isMethodId(value: string): value is MethodId {
  return METHOD_IDS.has(value);
}
