/**
 * icmpgen logger - leveled logging to stderr
 */

export {
  type GeneratorLogObj,
  type GeneratorLogger,
  type LogMode,
  createLogger,
  resolveLogMode,
} from "./logger.js";
