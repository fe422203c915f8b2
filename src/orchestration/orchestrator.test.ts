import { describe, it, expect } from "vitest";
import { applyReorder } from "./orchestrator.js";
import { createDataset } from "../input/dataset.js";
import type { ReorderRequest } from "../types/config.js";

const dataset = createDataset([
  { group: "a", value: 5, time: 1, weight: 10 },
  { group: "b", value: 1, time: 1, weight: 5 },
  { group: "c", value: 3, time: 1, weight: 20 },
  { group: "a", value: 7, time: 2, weight: 30 },
  { group: "b", value: 2, time: 2, weight: 50 },
  { group: "c", value: 4, time: 2, weight: 20 },
]);

function createRequest(overrides: Partial<ReorderRequest> = {}): ReorderRequest {
  return {
    method: "inorder",
    column: "group",
    naRm: false,
    ordered: "inherit",
    ...overrides,
  };
}

function levelsOf(request: ReorderRequest, data = dataset): string[] {
  const result = applyReorder(data, request);
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value.levels.map((entry) => entry.level);
}

describe("applyReorder", () => {
  describe("reorder", () => {
    it("builds a report ordered by the median of x", () => {
      const result = applyReorder(dataset, createRequest({ method: "reorder", x: "value" }));
      expect(result).toEqual({
        ok: true,
        value: {
          method: "reorder",
          column: "group",
          summary: "median",
          desc: false,
          ordered: false,
          observations: 6,
          missing: 0,
          levels: [
            { level: "b", rank: 1, previousRank: 2, count: 2 },
            { level: "c", rank: 2, previousRank: 3, count: 2 },
            { level: "a", rank: 3, previousRank: 1, count: 2 },
          ],
          warnings: [],
        },
      });
    });

    it("uses the named summary and direction", () => {
      const request = createRequest({ method: "reorder", x: "value", summary: "max", desc: true });
      expect(levelsOf(request)).toEqual(["a", "c", "b"]);
    });

    it("passes naRm to the summary", () => {
      const data = createDataset([
        { g: "a", v: null },
        { g: "a", v: 1 },
        { g: "b", v: 5 },
      ]);
      const request = createRequest({ method: "reorder", column: "g", x: "v" });
      expect(levelsOf(request, data)).toEqual(["b", "a"]);
      expect(levelsOf({ ...request, naRm: true }, data)).toEqual(["a", "b"]);
    });

    it("requires an x column", () => {
      const result = applyReorder(dataset, createRequest({ method: "reorder" }));
      expect(result).toEqual({
        ok: false,
        error: { message: 'Method "reorder" needs an x column' },
      });
    });

    it("requires a numeric x column", () => {
      const result = applyReorder(dataset, createRequest({ method: "reorder", x: "group" }));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('Column "group" must be numeric, found "a" in row 1');
    });

    it("rejects a paired summary", () => {
      const request = createRequest({ method: "reorder", x: "value", summary: "last2" });
      const result = applyReorder(dataset, request);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('Summary "last2" does not apply to method "reorder"');
    });
  });

  describe("reorder2", () => {
    it("orders by y at the largest x, descending by default", () => {
      const result = applyReorder(
        dataset,
        createRequest({ method: "reorder2", x: "time", y: "weight" }),
      );
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.levels.map((e) => e.level)).toEqual(["b", "a", "c"]);
      expect(result.value.summary).toBe("last2");
      expect(result.value.desc).toBe(true);
    });

    it("supports first2", () => {
      const request = createRequest({
        method: "reorder2",
        x: "time",
        y: "weight",
        summary: "first2",
        desc: false,
      });
      // first2: a = 10, b = 5, c = 20
      expect(levelsOf(request)).toEqual(["b", "a", "c"]);
    });

    it("requires a y column", () => {
      const result = applyReorder(dataset, createRequest({ method: "reorder2", x: "time" }));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('Method "reorder2" needs a y column');
    });

    it("rejects a unary summary", () => {
      const request = createRequest({
        method: "reorder2",
        x: "time",
        y: "weight",
        summary: "median",
      });
      const result = applyReorder(dataset, request);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('Summary "median" does not apply to method "reorder2"');
    });
  });

  describe("inorder / infreq / inseq", () => {
    it("orders by first appearance", () => {
      const data = createDataset([{ g: "z" }, { g: "x" }, { g: "z" }, { g: "y" }]);
      expect(levelsOf(createRequest({ column: "g" }), data)).toEqual(["z", "x", "y"]);
    });

    it("orders by frequency and counts missing cells", () => {
      const data = createDataset([{ g: "x" }, { g: null }, {}, { g: "y" }, { g: "y" }]);
      const result = applyReorder(data, createRequest({ method: "infreq", column: "g" }));
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.levels).toEqual([
        { level: "y", rank: 1, previousRank: 2, count: 2 },
        { level: "x", rank: 2, previousRank: 1, count: 1 },
      ]);
      expect(result.value.observations).toBe(5);
      expect(result.value.missing).toBe(2);
      expect(result.value.summary).toBeNull();
      expect(result.value.desc).toBeNull();
    });

    it("counts rows without a column named toString as missing", () => {
      const data = createDataset([{ toString: "a" }, { other: 1 }]);
      const result = applyReorder(data, createRequest({ method: "infreq", column: "toString" }));
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.missing).toBe(1);
      expect(result.value.levels).toEqual([
        { level: "a", rank: 1, previousRank: 1, count: 1 },
      ]);
    });

    it("orders numeric labels by value", () => {
      const data = createDataset([{ size: "10" }, { size: "9" }, { size: "100" }]);
      const result = applyReorder(data, createRequest({ method: "inseq", column: "size" }));
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.levels).toEqual([
        { level: "9", rank: 1, previousRank: 3, count: 1 },
        { level: "10", rank: 2, previousRank: 1, count: 1 },
        { level: "100", rank: 3, previousRank: 2, count: 1 },
      ]);
    });

    it("returns the argument error when no label is numeric", () => {
      const result = applyReorder(dataset, createRequest({ method: "inseq" }));
      expect(result).toEqual({
        ok: false,
        error: { message: "no level is numeric: at least one level must be coercible to a number" },
      });
    });

    it("rejects options the method does not take", () => {
      const result = applyReorder(
        dataset,
        createRequest({ method: "infreq", x: "value", summary: "mean" }),
      );
      expect(result).toEqual({
        ok: false,
        error: { message: 'Method "infreq" does not take an x column, a summary' },
      });
    });

    it("rejects a sort direction", () => {
      const result = applyReorder(dataset, createRequest({ desc: true }));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('Method "inorder" does not take a sort direction');
    });

    it("sets the ordered flag", () => {
      const result = applyReorder(dataset, createRequest({ ordered: true }));
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.ordered).toBe(true);
    });
  });

  describe("declared levels", () => {
    it("keeps declared levels without observations and warns about them", () => {
      const result = applyReorder(dataset, createRequest({ levels: ["c", "b", "a", "d"] }));
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.levels).toEqual([
        { level: "a", rank: 1, previousRank: 3, count: 2 },
        { level: "b", rank: 2, previousRank: 2, count: 2 },
        { level: "c", rank: 3, previousRank: 1, count: 2 },
        { level: "d", rank: 4, previousRank: 4, count: 0 },
      ]);
      expect(result.value.warnings).toEqual([
        { kind: "unused-level", level: "d", message: 'Level "d" has no observations' },
      ]);
    });

    it("warns about labels outside the declared levels", () => {
      const result = applyReorder(
        dataset,
        createRequest({ method: "infreq", levels: ["a", "b"] }),
      );
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.levels.map((e) => e.level)).toEqual(["a", "b"]);
      expect(result.value.missing).toBe(2);
      expect(result.value.warnings).toEqual([
        {
          kind: "dropped-label",
          level: "c",
          message: 'Observations labelled "c" became missing',
        },
      ]);
    });

    it("reports duplicate declared levels as an error", () => {
      const result = applyReorder(dataset, createRequest({ levels: ["a", "a"] }));
      expect(result).toEqual({ ok: false, error: { message: 'duplicate level "a"' } });
    });
  });

  it("reports an unknown column", () => {
    const result = applyReorder(dataset, createRequest({ column: "nope" }));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      'Unknown column "nope". Available columns: group, value, time, weight',
    );
  });
});
