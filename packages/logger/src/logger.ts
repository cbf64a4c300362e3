import { format } from "node:util";
import { Logger, type ILogObj } from "tslog";

/**
 * Structured log fields attached by the generator stages.
 */
export interface GeneratorLogObj extends ILogObj {
  stage?: string;
  name?: string;
  [key: string]: unknown;
}

export type GeneratorLogger = Logger<GeneratorLogObj>;

/**
 * Log verbosity mode. `silent` hides the logger and keeps only fatal records,
 * which a hidden logger never prints.
 */
export type LogMode = "silent" | "error" | "info" | "debug";

const MIN_LEVELS: Record<LogMode, number> = {
  silent: 6,
  error: 5,
  info: 3,
  debug: 2,
};

const writeStderr = (text: string): void => {
  process.stderr.write(text);
};

/**
 * Pick the log mode for the --verbose / --quiet flags
 */
export const resolveLogMode = (flags: {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
}): LogMode => {
  if (flags.quiet) {
    return "error";
  }
  return flags.verbose ? "debug" : "info";
};

/**
 * Create a pretty logger. Stdout carries generated output, so every
 * record goes through `write` (stderr unless a test supplies a sink).
 */
export const createLogger = (
  name: string,
  mode: LogMode = "info",
  write: (text: string) => void = writeStderr
): GeneratorLogger =>
  new Logger<GeneratorLogObj>({
    name,
    type: mode === "silent" ? "hidden" : "pretty",
    minLevel: MIN_LEVELS[mode],
    hideLogPositionForProduction: true,
    stylePrettyLogs: write === writeStderr && process.stderr.isTTY === true,
    overwrite: {
      transportFormatted: (
        logMetaMarkup: string,
        logArgs: unknown[],
        logErrors: string[]
      ) => {
        const errors =
          (logErrors.length > 0 && logArgs.length > 0 ? "\n" : "") +
          logErrors.join("\n");
        write(`${logMetaMarkup}${format(...logArgs)}${errors}\n`);
      },
    },
  });
