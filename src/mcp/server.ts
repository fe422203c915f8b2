/**
 * MCP server for levelsort.
 *
 * Exposes level reordering to agents via the Model Context Protocol
 * (stdio transport). The server registers a "reorder_levels" tool that
 * runs the orchestration pipeline over inline values and returns the
 * report as structured JSON text.
 *
 * Dependencies: Types, Input, Orchestration, Formatter (same level as CLI).
 */

import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { OrderedOption } from "../types/factor.js";
import type { ReorderRequest } from "../types/config.js";
import { METHODS, isMethodId } from "../types/method.js";
import { PAIRED_SUMMARIES, SUMMARIES, isSummaryName } from "../reorder/summary.js";
import { cellSchema, createDataset, type Cell, type Row } from "../input/dataset.js";
import { applyReorder } from "../orchestration/orchestrator.js";
import { formatJson } from "../formatter/json.js";
import { VERSION } from "../version.js";

/**
 * The shape returned by the reorder tool handler.
 */
export interface ReorderToolResult {
  readonly content: { type: "text"; text: string }[];
  readonly isError?: boolean;
}

/**
 * Arguments accepted by the reorder tool.
 */
export interface ReorderArgs {
  readonly values: readonly Cell[];
  readonly method: string;
  readonly x?: readonly Cell[] | undefined;
  readonly y?: readonly Cell[] | undefined;
  readonly levels?: readonly string[] | undefined;
  readonly summary?: string | undefined;
  readonly naRm?: boolean | undefined;
  readonly desc?: boolean | undefined;
  readonly ordered?: OrderedOption | undefined;
}

function errorResult(message: string): ReorderToolResult {
  return { content: [{ type: "text", text: message }], isError: true };
}

function checkLength(
  name: string,
  column: readonly Cell[] | undefined,
  expected: number,
): string | null {
  if (column === undefined || column.length === expected) {
    return null;
  }
  return `length mismatch: \`values\` has ${expected} entries but \`${name}\` has ${column.length}`;
}

/**
 * Core logic for the reorder tool call, extracted for testability.
 *
 * Lays the value arrays out as dataset rows ("value", "x", "y" columns),
 * runs the orchestration pipeline, and returns the report as JSON text.
 */
export function handleReorderCall(args: ReorderArgs): ReorderToolResult {
  if (!isMethodId(args.method)) {
    return errorResult(
      `Unknown method "${args.method}". Valid methods: ${[...METHODS.keys()].join(", ")}`,
    );
  }
  const { summary } = args;
  if (summary !== undefined && !isSummaryName(summary)) {
    return errorResult(`Unknown summary "${summary}"`);
  }

  const mismatch = checkLength("x", args.x, args.values.length)
    ?? checkLength("y", args.y, args.values.length);
  if (mismatch !== null) {
    return errorResult(mismatch);
  }

  const { x, y } = args;
  const rows: Row[] = args.values.map((value, i) => ({
    value,
    ...(x !== undefined ? { x: x[i] ?? null } : {}),
    ...(y !== undefined ? { y: y[i] ?? null } : {}),
  }));
  const columns = ["value"];
  if (x !== undefined) columns.push("x");
  if (y !== undefined) columns.push("y");

  const request: ReorderRequest = {
    method: args.method,
    column: "value",
    levels: args.levels,
    x: x !== undefined ? "x" : undefined,
    y: y !== undefined ? "y" : undefined,
    summary,
    naRm: args.naRm ?? false,
    desc: args.desc,
    ordered: args.ordered ?? "inherit",
  };

  const result = applyReorder(createDataset(rows, columns), request);
  if (!result.ok) {
    return errorResult(result.error.message);
  }

  return {
    content: [{ type: "text", text: formatJson(result.value) }],
  };
}

/**
 * Create a configured McpServer instance with the "reorder_levels" tool
 * registered.
 *
 * The caller is responsible for connecting the server to a transport
 * (e.g., StdioServerTransport) and starting it.
 */
export function createMcpServer(): McpServer {
  const server = new McpServer({
    name: "levelsort",
    version: VERSION,
  });

  const methodIds = [...METHODS.keys()];
  const summaryNames = [...SUMMARIES.keys(), ...PAIRED_SUMMARIES.keys()];

  server.registerTool(
    "reorder_levels",
    {
      title: "Reorder Factor Levels",
      description:
        "Reorder the levels of a categorical variable by first appearance, " +
        "frequency, numeric label value, or a per-level summary of other values. " +
        "Returns a JSON report listing the new level order with counts.",
      inputSchema: {
        values: z
          .array(cellSchema)
          .describe("Category label of each observation; null marks a missing label"),
        method: z
          .string()
          .describe(`Reorder method. Valid values: ${methodIds.join(", ")}`),
        x: z
          .array(cellSchema)
          .optional()
          .describe("Values summarised per level (reorder, reorder2); same length as values"),
        y: z
          .array(cellSchema)
          .optional()
          .describe("Second values summarised per level (reorder2); same length as values"),
        levels: z
          .array(z.string())
          .optional()
          .describe("Declared level set; labels outside it become missing"),
        summary: z
          .string()
          .optional()
          .describe(`Summary per level. Valid values: ${summaryNames.join(", ")}`),
        naRm: z.boolean().optional().describe("Drop missing values before summarising"),
        desc: z.boolean().optional().describe("Sort in descending order"),
        ordered: z
          .union([z.boolean(), z.literal("inherit")])
          .optional()
          .describe("Mark the result as ordered; inherit keeps the input's flag"),
      },
    },
    (args) => {
      const result = handleReorderCall(args);
      return {
        content: result.content,
        isError: result.isError ?? false,
      };
    },
  );

  return server;
}
