/**
 * Tests for the CLI filesystem helpers, against a temporary directory.
 */

import { afterEach, beforeEach, describe, it, expect } from "vitest";
import * as node_fs from "node:fs/promises";
import * as node_os from "node:os";
import * as node_path from "node:path";
import { readTextFile, writeTextFile } from "./io.js";

describe("io", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await node_fs.mkdtemp(node_path.join(node_os.tmpdir(), "levelsort-io-"));
  });

  afterEach(async () => {
    await node_fs.rm(dir, { recursive: true, force: true });
  });

  it("creates missing parent directories when writing", async () => {
    const path = node_path.join(dir, "nested", "deeper", "report.json");

    await writeTextFile(path, "{}");

    expect(await readTextFile(path)).toBe("{}");
  });

  it("overwrites an existing file", async () => {
    const path = node_path.join(dir, "report.txt");
    await writeTextFile(path, "first");

    await writeTextFile(path, "second");

    expect(await readTextFile(path)).toBe("second");
  });

  it("rejects when the file does not exist", async () => {
    await expect(readTextFile(node_path.join(dir, "absent.json"))).rejects.toThrow(/ENOENT/);
  });
});
