/**
 * CLI - Public API
 */

export { VERSION } from "./constants.js";
export { helpText } from "./help.js";
export { parseArgs } from "./parser.js";
export { type CliEnvironment, runCli } from "./dispatcher.js";
