/**
 * icmpgen emitter - ICMP table builder and Python module emitter
 */

export * from "./types.js";
export {
  buildOutputTable,
  compareCodeRows,
  compareTypeRows,
  mergeRows,
} from "./table.js";
export {
  DEFAULT_EMITTER_OPTIONS,
  emitRow,
  emitTableModule,
  quoteName,
} from "./emitter.js";
