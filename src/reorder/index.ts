export {
  type NumericValue,
  type KeyValue,
  type SummaryFn,
  type PairedSummaryFn,
  type NaRmOptions,
  type SummaryDescriptor,
  type PairedSummaryDescriptor,
  median,
  mean,
  min,
  max,
  sum,
  count,
  last2,
  first2,
  completePairs,
  SUMMARIES,
  PAIRED_SUMMARIES,
  isUnarySummaryName,
  isPairedSummaryName,
  isSummaryName,
} from "./summary.js";
export {
  type ReorderOptions,
  type Reorder2Options,
  fctReorder,
  fctReorder2,
} from "./reorder.js";
export {
  type LevelOrderOptions,
  fctInorder,
  fctInfreq,
  fctInseq,
  parseNumericLabel,
} from "./inorder.js";
