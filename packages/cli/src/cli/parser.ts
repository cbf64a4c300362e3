/**
 * CLI argument parser
 */

import { isFirewallFamily } from "@icmpgen/backend";
import { type Result, ok, error } from "@icmpgen/frontend";
import type { CliCommand, CliOptions, ParsedArgs } from "../types.js";

const COMMANDS: readonly CliCommand[] = ["generate", "help", "version"];

const isCommand = (value: string): value is CliCommand =>
  COMMANDS.some((command) => command === value);

/**
 * Value following the option at `index`, unless it is missing or another flag
 */
const optionValue = (args: string[], index: number): string | undefined => {
  const value = args[index + 1];
  return value === undefined || value === "" || value.startsWith("-")
    ? undefined
    : value;
};

/**
 * Parse CLI arguments. `generate` is implied when no command is given.
 */
export const parseArgs = (args: string[]): Result<ParsedArgs, string> => {
  const options: CliOptions = {};
  let command: CliCommand | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Command
    if (!arg.startsWith("-")) {
      if (command) {
        return error(`Unexpected argument '${arg}'`);
      }
      if (!isCommand(arg)) {
        return error(`Unknown command '${arg}'`);
      }
      command = arg;
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return ok({ command: "help", options: {} });
      case "-v":
      case "--version":
        return ok({ command: "version", options: {} });
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config": {
        const value = optionValue(args, i++);
        if (value === undefined) return error(`${arg} requires a value`);
        options.config = value;
        break;
      }
      case "-t":
      case "--tool": {
        const value = optionValue(args, i++);
        if (value === undefined) return error(`${arg} requires a value`);
        options.tool = value;
        break;
      }
      case "--chain": {
        const value = optionValue(args, i++);
        if (value === undefined) return error(`${arg} requires a value`);
        options.chain = value;
        break;
      }
      case "-o":
      case "--out": {
        const value = optionValue(args, i++);
        if (value === undefined) return error(`${arg} requires a value`);
        options.out = value;
        break;
      }
      case "-f":
      case "--family": {
        const value = optionValue(args, i++);
        if (value === undefined || !isFirewallFamily(value)) {
          return error(`${arg} must be ipv4 or ipv6`);
        }
        options.family = value;
        break;
      }
      default:
        return error(`Unknown option '${arg}'`);
    }
  }

  if (options.verbose && options.quiet) {
    return error("--verbose and --quiet cannot be used together");
  }

  return ok({ command: command ?? "generate", options });
};
