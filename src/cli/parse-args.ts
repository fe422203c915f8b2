/**
 * CLI argument parser.
 *
 * Translates a process.argv-style string array into a ReorderConfig
 * or a structured error. Uses only Node.js built-ins; no external
 * argument-parsing libraries.
 *
 * Dependencies: Types layer and the summary registry.
 */

import type { OrderedOption } from "../types/factor.js";
import type { MethodId } from "../types/method.js";
import type { OutputFormat, ReorderConfig, SummaryName } from "../types/config.js";
import { METHODS, isMethodId } from "../types/method.js";
import { PAIRED_SUMMARIES, SUMMARIES, isSummaryName } from "../reorder/summary.js";
import { VERSION } from "../version.js";

/**
 * Non-config results from parsing: help request, version request, or error.
 */
export interface ParseError {
  readonly kind: "error" | "help" | "version" | "mcp" | "list-methods";
  readonly message: string;
}

export type ParseResult =
  | { readonly ok: true; readonly value: ReorderConfig }
  | { readonly ok: false; readonly error: ParseError };

const FORMATS: ReadonlyMap<string, OutputFormat> = new Map([
  ["terminal-compact", "terminal-compact"],
  ["json", "json"],
]);

const ORDERED_VALUES: ReadonlyMap<string, OrderedOption> = new Map<string, OrderedOption>([
  ["true", true],
  ["false", false],
  ["inherit", "inherit"],
]);

/** Flags that take no value. */
const SWITCHES: ReadonlySet<string> = new Set([
  "--na-rm",
  "--desc",
  "--asc",
  "--help",
  "--version",
  "--mcp",
  "--list-methods",
]);

/** Flags followed by a value. */
const VALUE_FLAGS: ReadonlySet<string> = new Set([
  "--method",
  "--column",
  "--levels",
  "--x",
  "--y",
  "--summary",
  "--ordered",
  "--format",
  "--output",
  "--top",
]);

/**
 * Maps short flag aliases to their long equivalents.
 */
const SHORT_TO_LONG: ReadonlyMap<string, string> = new Map([
  ["-m", "--method"],
  ["-c", "--column"],
  ["-l", "--levels"],
  ["-s", "--summary"],
  ["-f", "--format"],
  ["-o", "--output"],
  ["-n", "--top"],
  ["-h", "--help"],
  ["-V", "--version"],
]);

function fail(message: string): ParseResult {
  return { ok: false, error: { kind: "error", message } };
}

/**
 * Parse a CLI argument array into a ReorderConfig.
 *
 * Expected usage:
 *   levelsort --method <method> --column <name> [options] <data.json>
 */
export function parseArgs(argv: readonly string[]): ParseResult {
  // Expand short flags to their long equivalents before parsing.
  const expandedArgv = argv.map((arg) => SHORT_TO_LONG.get(arg) ?? arg);

  // --help, --version, --mcp and --list-methods short-circuit.
  if (expandedArgv.includes("--help")) {
    return { ok: false, error: { kind: "help", message: helpText() } };
  }
  if (expandedArgv.includes("--version")) {
    return { ok: false, error: { kind: "version", message: `levelsort ${VERSION}` } };
  }
  if (expandedArgv.includes("--mcp")) {
    return { ok: false, error: { kind: "mcp", message: "Starting MCP server" } };
  }
  if (expandedArgv.includes("--list-methods")) {
    return { ok: false, error: { kind: "list-methods", message: listMethodsText() } };
  }

  const values = new Map<string, string>();
  const switches = new Set<string>();
  let desc: boolean | undefined;
  let inputPath: string | undefined;

  let i = 0;
  while (i < expandedArgv.length) {
    const arg = expandedArgv[i] ?? "";
    const originalArg = argv[i] ?? arg;

    if (VALUE_FLAGS.has(arg)) {
      const value = expandedArgv[i + 1];
      if (value === undefined) {
        return fail(`${originalArg} requires a value`);
      }
      values.set(arg, value);
      i += 2;
      continue;
    }

    if (SWITCHES.has(arg)) {
      // The later of --desc / --asc wins.
      if (arg === "--desc") desc = true;
      if (arg === "--asc") desc = false;
      switches.add(arg);
      i += 1;
      continue;
    }

    if (arg.startsWith("-")) {
      return fail(`Unknown flag "${originalArg}"`);
    }

    // Positional argument: input path (first positional wins).
    if (inputPath === undefined) {
      inputPath = arg;
    }
    i += 1;
  }

  if (inputPath === undefined) {
    return fail("Missing input path. Usage: levelsort [options] <data.json>");
  }

  const methodValue = values.get("--method");
  if (methodValue === undefined) {
    return fail(`Missing --method. Valid methods: ${[...METHODS.keys()].join(", ")}`);
  }
  if (!isMethodId(methodValue)) {
    return fail(
      `Unknown method "${methodValue}". Valid methods: ${[...METHODS.keys()].join(", ")}`,
    );
  }
  const method: MethodId = methodValue;

  const column = values.get("--column");
  if (column === undefined) {
    return fail("Missing --column");
  }

  let summary: SummaryName | undefined;
  const summaryValue = values.get("--summary");
  if (summaryValue !== undefined) {
    if (!isSummaryName(summaryValue)) {
      const names = [...SUMMARIES.keys(), ...PAIRED_SUMMARIES.keys()];
      return fail(`Unknown summary "${summaryValue}". Valid summaries: ${names.join(", ")}`);
    }
    summary = summaryValue;
  }

  let ordered: OrderedOption = "inherit";
  const orderedValue = values.get("--ordered");
  if (orderedValue !== undefined) {
    const parsed = ORDERED_VALUES.get(orderedValue);
    if (parsed === undefined) {
      return fail(`--ordered must be true, false or inherit, got "${orderedValue}"`);
    }
    ordered = parsed;
  }

  let levels: string[] | undefined;
  const levelsValue = values.get("--levels");
  if (levelsValue !== undefined) {
    levels = levelsValue.split(",").map((level) => level.trim());
    if (levels.some((level) => level === "")) {
      return fail("--levels requires a comma-separated list of non-empty labels");
    }
  }

  let topN: number | undefined;
  const topValue = values.get("--top");
  if (topValue !== undefined) {
    const parsed = Number(topValue);
    if (!Number.isInteger(parsed) || parsed < 1) {
      return fail(`--top requires a positive integer, got "${topValue}"`);
    }
    topN = parsed;
  }

  const outputPath = values.get("--output");
  let format: OutputFormat = "terminal-compact";
  const formatValue = values.get("--format");
  if (formatValue !== undefined) {
    const parsed = FORMATS.get(formatValue);
    if (parsed === undefined) {
      return fail(
        `Unknown format "${formatValue}". Valid formats: ${[...FORMATS.keys()].join(", ")}`,
      );
    }
    format = parsed;
  } else if (outputPath !== undefined && outputPath.toLowerCase().endsWith(".json")) {
    // Infer the format from the output file extension when --format is omitted.
    format = "json";
  }

  const config: ReorderConfig = {
    inputPath,
    method,
    column,
    levels,
    x: values.get("--x"),
    y: values.get("--y"),
    summary,
    naRm: switches.has("--na-rm"),
    desc,
    ordered,
    outputFormat: format,
    outputPath,
    topN,
  };

  return { ok: true, value: config };
}

function listMethodsText(): string {
  return [
    "Available reorder methods:",
    "",
    ...[...METHODS.values()].map(
      (m) => `  ${m.id.padEnd(10)} ${m.description}`,
    ),
  ].join("\n");
}

function helpText(): string {
  return [
    "Usage: levelsort --method <method> --column <name> [options] <data.json>",
    "",
    "Reorder the levels of a categorical column in a JSON array of rows.",
    "",
    "Options:",
    "  -m, --method <method>     Reorder method (see Methods below)",
    "  -c, --column <name>       Column holding the category labels",
    "  -l, --levels <a,b,...>    Declared level set; other labels become missing",
    "      --x <name>            Column to summarise (reorder, reorder2)",
    "      --y <name>            Second column to summarise (reorder2)",
    "  -s, --summary <name>      Summary per level: median, mean, min, max, sum, count",
    "                            (reorder) or last2, first2 (reorder2)",
    "      --na-rm               Drop missing values before summarising",
    "      --desc, --asc         Sort direction (reorder, reorder2)",
    "      --ordered <value>     Mark the result ordered: true, false or inherit",
    "  -f, --format <format>     Output format (terminal-compact, json)",
    "  -o, --output <path>       Write output to file instead of stdout",
    "                            (format is inferred from a .json extension if --format is omitted)",
    "  -n, --top <N>             Only report the first N levels",
    "      --mcp                 Start as MCP server (stdio transport)",
    "      --list-methods        List available reorder methods",
    "  -h, --help                Show this help message",
    "  -V, --version             Show version number",
    "",
    "Methods:",
    ...[...METHODS.values()].map(
      (m) => `  ${m.id.padEnd(10)} ${m.description}`,
    ),
  ].join("\n");
}
