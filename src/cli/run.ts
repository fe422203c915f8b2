/**
 * CLI runner: the top-level entry point that wires everything together.
 *
 * Responsibilities:
 *   1. Parse arguments into a ReorderConfig
 *   2. Read and validate the dataset
 *   3. Call the orchestrator and format the report
 *   4. Write output to stdout or a file
 *
 * Dependencies: All layers (Types, Input, Orchestration, Formatter).
 */

import type { OutputFormat } from "../types/config.js";
import type { ReorderReport } from "../types/report.js";
import type { Formatter } from "../formatter/formatter.js";
import { parseDataset } from "../input/dataset.js";
import { applyReorder } from "../orchestration/orchestrator.js";
import { limitLevels } from "../orchestration/report-transforms.js";
import { formatJson } from "../formatter/json.js";
import { formatTerminalCompact } from "../formatter/terminal-compact.js";
import { parseArgs } from "./parse-args.js";

/**
 * Injectable dependencies for testability.
 * Production code provides real I/O; tests provide mocks.
 */
export interface CliDeps {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly readFn: (path: string) => Promise<string>;
  readonly writeFn?: (path: string, content: string) => Promise<void>;
  readonly startMcpServer?: () => Promise<void>;
}

function selectFormatter(format: OutputFormat): Formatter {
  switch (format) {
    case "json":
      return formatJson;
    case "terminal-compact":
      return formatTerminalCompact;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Run the CLI with the given argument array and dependencies.
 * Returns a process exit code (0 = success, 1 = error).
 */
export async function run(
  argv: readonly string[],
  deps: CliDeps,
): Promise<number> {
  const parseResult = parseArgs(argv);

  if (!parseResult.ok) {
    const { kind, message } = parseResult.error;
    if (kind === "help" || kind === "version" || kind === "list-methods") {
      deps.stdout(message);
      return 0;
    }
    if (kind === "mcp") {
      if (deps.startMcpServer === undefined) {
        deps.stderr("MCP server is not available");
        return 1;
      }
      await deps.startMcpServer();
      return 0;
    }
    // Parsing error.
    deps.stderr(message);
    return 1;
  }

  const config = parseResult.value;

  let text: string;
  try {
    text = await deps.readFn(config.inputPath);
  } catch (cause: unknown) {
    deps.stderr(`Failed to read dataset "${config.inputPath}": ${describeCause(cause)}`);
    return 1;
  }

  const datasetResult = parseDataset(text);
  if (!datasetResult.ok) {
    deps.stderr(datasetResult.error.message);
    return 1;
  }

  const reorderResult = applyReorder(datasetResult.value, config);
  if (!reorderResult.ok) {
    deps.stderr(reorderResult.error.message);
    return 1;
  }

  const rawReport: ReorderReport = reorderResult.value;
  const report: ReorderReport = config.topN !== undefined
    ? limitLevels(rawReport, config.topN)
    : rawReport;
  const output = selectFormatter(config.outputFormat)(report);

  if (config.outputPath !== undefined && deps.writeFn !== undefined) {
    try {
      await deps.writeFn(config.outputPath, output);
    } catch (cause: unknown) {
      deps.stderr(`Failed to write report: ${describeCause(cause)}`);
      return 1;
    }
    deps.stdout(`Report written to ${config.outputPath}`);
  } else {
    deps.stdout(output);
  }

  return 0;
}
