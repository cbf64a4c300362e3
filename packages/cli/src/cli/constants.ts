/**
 * CLI constants
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const packageJson = require("../../package.json") as { version: string };

export const VERSION = packageJson.version;

export const PROGRAM_NAME = "icmpgen";

/**
 * Exit codes
 */
export const EXIT_OK = 0;
export const EXIT_GENERATION_FAILED = 1;
export const EXIT_USAGE = 2;
export const EXIT_CONFIG = 3;
