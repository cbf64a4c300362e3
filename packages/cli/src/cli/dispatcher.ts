/**
 * CLI command dispatcher
 */

import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { createIptablesOracle, type Oracle } from "@icmpgen/backend";
import { formatDiagnostic } from "@icmpgen/frontend";
import {
  createLogger,
  resolveLogMode,
  type GeneratorLogger,
  type LogMode,
} from "@icmpgen/logger";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import type { IcmpgenConfig, ResolvedConfig } from "../types.js";
import {
  EXIT_CONFIG,
  EXIT_GENERATION_FAILED,
  EXIT_OK,
  EXIT_USAGE,
  PROGRAM_NAME,
  VERSION,
} from "./constants.js";
import { helpText } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Process-level collaborators, replaceable in tests
 */
export type CliEnvironment = {
  readonly cwd: string;
  /** Recorded in the "generated by" header line */
  readonly programName: string;
  readonly writeOutput: (text: string) => void;
  readonly writeError: (text: string) => void;
  readonly createOracle: (config: ResolvedConfig) => Oracle;
  readonly createLogger: (mode: LogMode) => GeneratorLogger;
};

const defaultEnvironment = (): CliEnvironment => ({
  cwd: process.cwd(),
  programName: process.argv[1] ?? PROGRAM_NAME,
  writeOutput: (text) => {
    process.stdout.write(text);
  },
  writeError: (text) => {
    process.stderr.write(text);
  },
  createOracle: (config) => createIptablesOracle(config),
  createLogger: (mode) => createLogger(PROGRAM_NAME, mode),
});

/**
 * Main CLI entry point
 */
export const runCli = (
  args: string[],
  overrides: Partial<CliEnvironment> = {}
): number => {
  const env: CliEnvironment = { ...defaultEnvironment(), ...overrides };

  const parsed = parseArgs(args);
  if (!parsed.ok) {
    env.writeError(`Error: ${parsed.error}\n`);
    env.writeError(`Run '${PROGRAM_NAME} --help' for usage information\n`);
    return EXIT_USAGE;
  }

  const { command, options } = parsed.value;

  if (command === "version") {
    env.writeOutput(`${PROGRAM_NAME} v${VERSION}\n`);
    return EXIT_OK;
  }

  if (command === "help") {
    env.writeOutput(helpText());
    return EXIT_OK;
  }

  // Load config; without one, family defaults apply
  const configPath = options.config
    ? resolve(env.cwd, options.config)
    : findConfig(env.cwd);

  let fileConfig: IcmpgenConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      env.writeError(`Error: ${configResult.error}\n`);
      return EXIT_CONFIG;
    }
    fileConfig = configResult.value;
  }

  const config = resolveConfig(fileConfig, options);
  const logger = env.createLogger(resolveLogMode(config));
  if (configPath) {
    logger.debug(`Using config ${configPath}`);
  }

  const result = generateCommand(config, {
    oracle: env.createOracle(config),
    logger,
    programName: env.programName,
  });

  if (!result.ok) {
    env.writeError(`${formatDiagnostic(result.error)}\n`);
    return EXIT_GENERATION_FAILED;
  }

  if (!config.out) {
    env.writeOutput(result.value);
    return EXIT_OK;
  }

  const outputPath = resolve(env.cwd, config.out);
  try {
    writeFileSync(outputPath, result.value, "utf-8");
  } catch (e) {
    env.writeError(
      `Error: Failed to write ${outputPath}: ${e instanceof Error ? e.message : String(e)}\n`
    );
    return EXIT_GENERATION_FAILED;
  }
  logger.info(`Wrote ${outputPath}`);
  return EXIT_OK;
};
