/**
 * Orchestrator: applies a configured reorder method to one dataset column.
 *
 * The orchestrator resolves the factor column and any auxiliary columns the
 * method needs, picks the summary function, runs the reorder and assembles
 * a ReorderReport. Argument errors raised by the reorder layer become error
 * results here; anything else propagates.
 *
 * Dependencies flow downward only: Orchestration → Reorder, Factor, Input, Types.
 */

import type { ReorderRequest, SummaryName } from "../types/config.js";
import type { Factor } from "../types/factor.js";
import type { MethodDescriptor } from "../types/method.js";
import type { LevelEntry, ReorderReport, ReorderWarning } from "../types/report.js";
import type { Result } from "../types/result.js";
import type { Cell, Dataset } from "../input/dataset.js";
import { METHODS } from "../types/method.js";
import { ok, err, attempt } from "../types/result.js";
import { columnValues, toComparable, toLabels, toNumeric } from "../input/dataset.js";
import { isArgumentError } from "../factor/errors.js";
import { ensureFactor, labels, refactor } from "../factor/factor.js";
import { countByLevel } from "../factor/tabulate.js";
import { fctReorder, fctReorder2 } from "../reorder/reorder.js";
import { fctInfreq, fctInorder, fctInseq } from "../reorder/inorder.js";
import {
  PAIRED_SUMMARIES,
  SUMMARIES,
  isPairedSummaryName,
  isUnarySummaryName,
} from "../reorder/summary.js";

/**
 * Error produced when a reorder run cannot complete.
 */
export interface ReorderError {
  readonly message: string;
}

/**
 * A validated run: the resolved options and the reorder to apply.
 */
interface ReorderPlan {
  readonly summary: SummaryName | null;
  readonly desc: boolean | null;
  readonly apply: (f: Factor) => Factor;
}

function auxiliaryColumn(
  dataset: Dataset,
  request: ReorderRequest,
  axis: "x" | "y",
): Result<Cell[], ReorderError> {
  const name = request[axis];
  if (name === undefined) {
    const article = axis === "x" ? "an" : "a";
    return err({ message: `Method "${request.method}" needs ${article} ${axis} column` });
  }
  return columnValues(dataset, name);
}

/**
 * Reject options the method does not use, so a misspelt invocation fails
 * instead of silently ignoring what the caller asked for.
 */
function checkUnused(
  request: ReorderRequest,
  descriptor: MethodDescriptor,
): ReorderError | undefined {
  const unused: string[] = [];
  if (!descriptor.needsX && request.x !== undefined) unused.push("an x column");
  if (!descriptor.needsY && request.y !== undefined) unused.push("a y column");
  if (descriptor.defaultSummary === null && request.summary !== undefined) {
    unused.push("a summary");
  }
  if (descriptor.defaultDesc === null && request.desc !== undefined) {
    unused.push("a sort direction");
  }
  if (request.naRm && descriptor.defaultSummary === null) unused.push("naRm");
  if (unused.length === 0) {
    return undefined;
  }
  return { message: `Method "${request.method}" does not take ${unused.join(", ")}` };
}

function planReorder(
  dataset: Dataset,
  request: ReorderRequest,
  descriptor: MethodDescriptor,
): Result<ReorderPlan, ReorderError> {
  const unused = checkUnused(request, descriptor);
  if (unused !== undefined) {
    return err(unused);
  }

  const ordered = request.ordered;
  const options = { naRm: request.naRm };
  const summaryName = request.summary ?? descriptor.defaultSummary;
  const desc = request.desc ?? descriptor.defaultDesc;

  switch (request.method) {
    case "reorder": {
      const xCells = auxiliaryColumn(dataset, request, "x");
      if (!xCells.ok) return xCells;
      const xs = toNumeric(request.x ?? "x", xCells.value);
      if (!xs.ok) return xs;
      if (summaryName === null || !isUnarySummaryName(summaryName)) {
        return err({ message: `Summary "${summaryName}" does not apply to method "reorder"` });
      }
      const summary = SUMMARIES.get(summaryName);
      if (summary === undefined) {
        return err({ message: `Unknown summary "${summaryName}"` });
      }
      return ok({
        summary: summaryName,
        desc,
        apply: (f) =>
          fctReorder(f, xs.value, {
            fun: (values) => summary.fn(values, options),
            desc: desc ?? false,
            ordered,
          }),
      });
    }
    case "reorder2": {
      const xCells = auxiliaryColumn(dataset, request, "x");
      if (!xCells.ok) return xCells;
      const yCells = auxiliaryColumn(dataset, request, "y");
      if (!yCells.ok) return yCells;
      if (summaryName === null || !isPairedSummaryName(summaryName)) {
        return err({ message: `Summary "${summaryName}" does not apply to method "reorder2"` });
      }
      const summary = PAIRED_SUMMARIES.get(summaryName);
      if (summary === undefined) {
        return err({ message: `Unknown summary "${summaryName}"` });
      }
      const xs = toComparable(xCells.value);
      const ys = toComparable(yCells.value);
      return ok({
        summary: summaryName,
        desc,
        apply: (f) =>
          fctReorder2(f, xs, ys, {
            fun: (xGroup, yGroup) => summary.fn(xGroup, yGroup, options),
            desc: desc ?? true,
            ordered,
          }),
      });
    }
    case "inorder":
      return ok({ summary: null, desc: null, apply: (f) => fctInorder(f, { ordered }) });
    case "infreq":
      return ok({ summary: null, desc: null, apply: (f) => fctInfreq(f, { ordered }) });
    case "inseq":
      return ok({ summary: null, desc: null, apply: (f) => fctInseq(f, { ordered }) });
  }
}

function levelEntries(before: Factor, after: Factor): LevelEntry[] {
  const previous = new Map(before.levels.map((level, i) => [level, i + 1]));
  const counts = countByLevel(after);
  return after.levels.map((level, i) => ({
    level,
    rank: i + 1,
    previousRank: previous.get(level) ?? null,
    count: counts[i] ?? 0,
  }));
}

function collectWarnings(
  observed: Factor,
  after: Factor,
  entries: readonly LevelEntry[],
): ReorderWarning[] {
  const warnings: ReorderWarning[] = [];
  for (const entry of entries) {
    if (entry.count === 0) {
      warnings.push({
        kind: "unused-level",
        level: entry.level,
        message: `Level "${entry.level}" has no observations`,
      });
    }
  }

  const afterLabels = labels(after);
  const dropped = new Set<string>();
  labels(observed).forEach((label, i) => {
    if (label !== null && afterLabels[i] === null) {
      dropped.add(label);
    }
  });
  for (const level of dropped) {
    warnings.push({
      kind: "dropped-label",
      level,
      message: `Observations labelled "${level}" became missing`,
    });
  }
  return warnings;
}

/**
 * Run one reorder over `dataset` as described by `request`.
 *
 * Behavior:
 * - Unknown columns, missing auxiliary columns, options the method does not
 *   take, and summaries of the wrong arity are returned as errors.
 * - Argument errors from the reorder itself (e.g. no numeric level for
 *   `inseq`) are returned as errors with the same message.
 * - Declared levels that no observation uses, and labels outside the
 *   declared levels, are reported as warnings.
 */
export function applyReorder(
  dataset: Dataset,
  request: ReorderRequest,
): Result<ReorderReport, ReorderError> {
  const descriptor = METHODS.get(request.method);
  if (descriptor === undefined) {
    return err({ message: `Unknown method "${request.method}"` });
  }

  const cells = columnValues(dataset, request.column);
  if (!cells.ok) {
    return cells;
  }

  const plan = planReorder(dataset, request, descriptor);
  if (!plan.ok) {
    return plan;
  }

  const declared = request.levels;
  const run = attempt(
    () => {
      const observed = ensureFactor(toLabels(cells.value));
      const before = declared !== undefined ? refactor(observed, declared) : observed;
      return { observed, before, after: plan.value.apply(before) };
    },
    isArgumentError,
    (cause): ReorderError => ({ message: cause.message }),
  );
  if (!run.ok) {
    return run;
  }

  const { observed, before, after } = run.value;
  const entries = levelEntries(before, after);
  return ok({
    method: request.method,
    column: request.column,
    summary: plan.value.summary,
    desc: plan.value.desc,
    ordered: after.ordered,
    observations: after.codes.length,
    missing: after.codes.filter((code) => code === null).length,
    levels: entries,
    warnings: collectWarnings(observed, after, entries),
  });
}
