import { describe, it, expect } from "vitest";
import {
  createFactor,
  ensureFactor,
  isFactor,
  labelAt,
  labels,
  refactor,
  reorderLevels,
} from "./factor.js";
import { ArgumentError } from "./errors.js";

describe("createFactor", () => {
  it("stores levels, codes and the ordered flag", () => {
    const f = createFactor(["a", "b"], [1, null, 0], true);
    expect(f.levels).toEqual(["a", "b"]);
    expect(f.codes).toEqual([1, null, 0]);
    expect(f.ordered).toBe(true);
  });

  it("defaults to an unordered factor", () => {
    expect(createFactor(["a"], [0]).ordered).toBe(false);
  });

  it("rejects duplicate levels", () => {
    expect(() => createFactor(["a", "a"], [])).toThrow(ArgumentError);
  });

  it("rejects codes outside the level range", () => {
    expect(() => createFactor(["a"], [1])).toThrow(
      "observation 1 has code 1, expected an integer in [0, 1)",
    );
    expect(() => createFactor(["a"], [-1])).toThrow(ArgumentError);
    expect(() => createFactor(["a", "b"], [0.5])).toThrow(ArgumentError);
  });

  it("does not share arrays with the caller", () => {
    const levels = ["a", "b"];
    const f = createFactor(levels, [0]);
    levels.push("c");
    expect(f.levels).toEqual(["a", "b"]);
  });
});

describe("ensureFactor", () => {
  it("returns an existing factor unchanged", () => {
    const f = createFactor(["z", "a"], [0, 1]);
    expect(ensureFactor(f)).toBe(f);
  });

  it("builds levels from distinct strings in code-unit order", () => {
    const f = ensureFactor(["b", "b", "a", "c", "B"]);
    expect(f.levels).toEqual(["B", "a", "b", "c"]);
    expect(f.codes).toEqual([2, 2, 1, 3, 0]);
    expect(f.ordered).toBe(false);
  });

  it("treats null and undefined as missing observations", () => {
    const f = ensureFactor(["x", null, undefined, "y"]);
    expect(f.levels).toEqual(["x", "y"]);
    expect(f.codes).toEqual([0, null, null, 1]);
  });

  it("sorts numeric labels numerically", () => {
    const f = ensureFactor([10, 2, 1, 2, Number.NaN]);
    expect(f.levels).toEqual(["1", "2", "10"]);
    expect(f.codes).toEqual([2, 1, 0, 1, null]);
  });

  it("keeps infinities as numeric levels", () => {
    const f = ensureFactor([Infinity, 1, -Infinity, Number.NaN]);
    expect(f.levels).toEqual(["-Infinity", "1", "Infinity"]);
    expect(f.codes).toEqual([2, 1, 0, null]);
  });

  it("merges 0 and -0 into one level", () => {
    const f = ensureFactor([0, -0]);
    expect(f.levels).toEqual(["0"]);
    expect(f.codes).toEqual([0, 0]);
  });

  it("accepts an empty sequence", () => {
    const f = ensureFactor([]);
    expect(f.levels).toEqual([]);
    expect(f.codes).toEqual([]);
  });

  it("rejects mixed strings and numbers", () => {
    expect(() => ensureFactor(JSON.parse('["a", 1]'))).toThrow(
      "`f` must not mix string and number labels",
    );
  });

  it("rejects unsupported element types from untyped callers", () => {
    expect(() => ensureFactor(JSON.parse("[true, false]"))).toThrow(
      "`f` must contain strings or numbers, got boolean",
    );
  });

  it("rejects non-sequence input from untyped callers", () => {
    expect(() => ensureFactor(JSON.parse('"abc"'))).toThrow(ArgumentError);
  });
});

describe("isFactor", () => {
  it("recognises factors and rejects arrays and plain values", () => {
    expect(isFactor(createFactor(["a"], [0]))).toBe(true);
    expect(isFactor(["a"])).toBe(false);
    expect(isFactor(null)).toBe(false);
    expect(isFactor({ levels: [], codes: [] })).toBe(false);
  });
});

describe("labelAt / labels", () => {
  const f = createFactor(["lo", "hi"], [1, null, 0]);

  it("resolves each observation to its label", () => {
    expect(labelAt(f, 0)).toBe("hi");
    expect(labelAt(f, 1)).toBeNull();
    expect(labels(f)).toEqual(["hi", null, "lo"]);
  });

  it("returns null past the end", () => {
    expect(labelAt(f, 3)).toBeNull();
  });
});

describe("reorderLevels", () => {
  const f = createFactor(["a", "b", "c"], [0, 1, 2, null, 2]);

  it("moves levels without changing observation labels", () => {
    const result = reorderLevels(f, [2, 0, 1]);
    expect(result.levels).toEqual(["c", "a", "b"]);
    expect(result.codes).toEqual([1, 2, 0, null, 0]);
    expect(labels(result)).toEqual(labels(f));
  });

  it("inherits the ordered flag by default and can override it", () => {
    expect(reorderLevels(f, [0, 1, 2]).ordered).toBe(false);
    expect(reorderLevels(f, [0, 1, 2], true).ordered).toBe(true);
  });

  it("rejects an order of the wrong length", () => {
    expect(() => reorderLevels(f, [0, 1])).toThrow(
      "`order` must contain one index for each of the 3 levels, got 2",
    );
  });

  it("rejects repeated or out-of-range indices", () => {
    expect(() => reorderLevels(f, [0, 0, 1])).toThrow(
      "`order` must contain each level index exactly once",
    );
    expect(() => reorderLevels(f, [0, 1, 3])).toThrow(ArgumentError);
  });
});

describe("refactor", () => {
  const f = createFactor(["a", "b", "c"], [0, 1, 2], true);

  it("drops observations whose label is not in the new level list", () => {
    const result = refactor(f, ["c", "a"]);
    expect(result.levels).toEqual(["c", "a"]);
    expect(labels(result)).toEqual(["a", null, "c"]);
    expect(result.ordered).toBe(true);
  });

  it("accepts levels that no observation uses", () => {
    const result = refactor(f, ["a", "b", "c", "d"], false);
    expect(result.levels).toEqual(["a", "b", "c", "d"]);
    expect(result.codes).toEqual([0, 1, 2]);
    expect(result.ordered).toBe(false);
  });

  it("rejects duplicate new levels", () => {
    expect(() => refactor(f, ["a", "a"])).toThrow('duplicate level "a"');
  });
});
