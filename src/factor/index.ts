export { ArgumentError, isArgumentError } from "./errors.js";
export {
  compareLabels,
  isFactor,
  createFactor,
  ensureFactor,
  labelAt,
  labels,
  resolveOrdered,
  refactor,
  reorderLevels,
} from "./factor.js";
export {
  type StableOrderOptions,
  countByLevel,
  groupSummary,
  isMissingKey,
  splitByLevel,
  stableOrder,
} from "./tabulate.js";
