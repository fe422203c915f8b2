/**
 * Centralized version constant for levelsort.
 *
 * Reads the version from package.json so there is a single source of
 * truth. All modules that need the version string import it from here
 * instead of hardcoding it.
 */

import { createRequire } from "node:module";
import { z } from "zod";

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require("../package.json"));

export const VERSION: string = pkg.version;
