export { type Result, ok, err, attempt } from "./result.js";
export {
  type Level,
  type Factor,
  type Missing,
  type FactorInput,
  type OrderedOption,
  type SortKey,
  type Comparable,
} from "./factor.js";
export {
  type MethodId,
  type MethodDescriptor,
  METHODS,
  isMethodId,
} from "./method.js";
export {
  type OutputFormat,
  type UnarySummaryName,
  type PairedSummaryName,
  type SummaryName,
  type ReorderRequest,
  type ReorderConfig,
} from "./config.js";
export {
  type LevelEntry,
  type ReorderWarningKind,
  type ReorderWarning,
  type ReorderReport,
} from "./report.js";
