#!/usr/bin/env node

/**
 * levelsort CLI entry point.
 *
 * This file is the bin target. It wires together real dependencies
 * (process I/O, filesystem, MCP transport) and delegates to the runner.
 */

import node_process from "node:process";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createMcpServer } from "../mcp/server.js";
import { readTextFile, writeTextFile } from "./io.js";
import { run } from "./run.js";
import type { CliDeps } from "./run.js";

const deps: CliDeps = {
  stdout: (text: string) => node_process.stdout.write(text + "\n"),
  stderr: (text: string) => node_process.stderr.write(text + "\n"),
  readFn: readTextFile,
  writeFn: writeTextFile,
  startMcpServer: async () => {
    const server = createMcpServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);
  },
};

// Strip the first two entries (node binary, script path).
const argv = node_process.argv.slice(2);

run(argv, deps).then(
  (code) => {
    node_process.exitCode = code;
  },
  (cause: unknown) => {
    node_process.stderr.write(`levelsort: ${cause instanceof Error ? cause.message : String(cause)}\n`);
    node_process.exitCode = 1;
  },
);
