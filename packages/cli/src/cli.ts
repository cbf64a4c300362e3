/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export {
  type CliEnvironment,
  VERSION,
  helpText,
  parseArgs,
  runCli,
} from "./cli/index.js";
