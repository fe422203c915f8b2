/**
 * Tests for the Formatter interface and JSON formatter.
 */

import { describe, it, expect } from "vitest";
import type { ReorderReport } from "../types/report.js";
import type { Formatter } from "./formatter.js";
import { formatJson } from "./json.js";
import { describeOrdering, methodName } from "./method-helpers.js";

function makeReport(overrides?: Partial<ReorderReport>): ReorderReport {
  return {
    method: "reorder",
    column: "group",
    summary: "median",
    desc: false,
    ordered: false,
    observations: 3,
    missing: 1,
    levels: [
      { level: "b", rank: 1, previousRank: 2, count: 1 },
      { level: "a", rank: 2, previousRank: 1, count: 1 },
    ],
    warnings: [],
    ...overrides,
  };
}

describe("Formatter interface", () => {
  it("formatJson satisfies the Formatter type", () => {
    const formatter: Formatter = formatJson;
    expect(typeof formatter).toBe("function");
  });
});

describe("formatJson", () => {
  it("serializes the report with the method name", () => {
    const parsed: unknown = JSON.parse(formatJson(makeReport()));
    expect(parsed).toEqual({
      method: "reorder",
      methodName: "By Summary",
      column: "group",
      summary: "median",
      desc: false,
      ordered: false,
      observations: 3,
      missing: 1,
      levels: [
        { level: "b", rank: 1, previousRank: 2, count: 1 },
        { level: "a", rank: 2, previousRank: 1, count: 1 },
      ],
      warnings: [],
    });
  });

  it("includes levelTotalCount only when levels were truncated", () => {
    expect(formatJson(makeReport())).not.toContain("levelTotalCount");
    const parsed: unknown = JSON.parse(formatJson(makeReport({ levelTotalCount: 5 })));
    expect(parsed).toMatchObject({ levelTotalCount: 5 });
  });

  it("is deterministic", () => {
    expect(formatJson(makeReport())).toBe(formatJson(makeReport()));
  });
});

describe("method helpers", () => {
  it("resolves method names", () => {
    expect(methodName("infreq")).toBe("Frequency");
  });

  it("describes summary, direction and the ordered flag", () => {
    expect(describeOrdering(makeReport())).toBe("By Summary (median, ascending)");
    expect(describeOrdering(makeReport({ method: "reorder2", summary: "last2", desc: true, ordered: true }))).toBe(
      "By Paired Summary (last2, descending, ordered)",
    );
    expect(describeOrdering(makeReport({ method: "inorder", summary: null, desc: null }))).toBe(
      "First Appearance",
    );
  });
});
