/**
 * Library entry point: factor primitives, level reordering, dataset
 * loading, orchestration and report formatting.
 */

export * from "./types/index.js";
export * from "./factor/index.js";
export * from "./reorder/index.js";
export * from "./input/index.js";
export * from "./orchestration/index.js";
export * from "./formatter/index.js";
export { VERSION } from "./version.js";
