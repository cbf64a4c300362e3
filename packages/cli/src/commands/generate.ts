/**
 * icmpgen generate command - probe the firewall tool and emit the table
 */

import type { Oracle, OracleResult } from "@icmpgen/backend";
import { buildOutputTable, emitTableModule } from "@icmpgen/emitter";
import {
  type Diagnostic,
  type ResolvedTables,
  type Result,
  ok,
  error,
  oracleDiagnostic,
  parseHelpText,
  readHelpText,
  resolveDeclarations,
} from "@icmpgen/frontend";
import type { GeneratorLogger } from "@icmpgen/logger";
import type { ResolvedConfig } from "../types.js";

export type GenerateContext = {
  readonly oracle: Oracle;
  readonly logger: GeneratorLogger;
  /** Recorded in the "generated by" header line */
  readonly programName: string;
};

/**
 * Run the whole pipeline and return the module text.
 *
 * Once probing starts the scratch chain is flushed again at the end, whether
 * resolution succeeded, failed or threw.
 */
export const generateCommand = (
  config: ResolvedConfig,
  context: GenerateContext
): Result<string, Diagnostic> => {
  const { oracle, logger } = context;

  logger.info(`Getting supported ICMP types and codes from ${config.tool}`);
  const helpResult = readHelpText(oracle, config.helpMarker);
  if (!helpResult.ok) {
    return helpResult;
  }

  const parseResult = parseHelpText(helpResult.value);
  if (!parseResult.ok) {
    return parseResult;
  }

  const declarations = parseResult.value;
  logger.info(`Probing ${declarations.length} ICMP types on chain ${config.chain}`);
  if (declarations.length === 0) {
    logger.warn("The help text lists no ICMP types");
  }

  let resolveResult: Result<ResolvedTables, Diagnostic>;
  let cleanup: OracleResult | undefined;
  try {
    resolveResult = resolveDeclarations(declarations, oracle, {
      listingMarker: config.listingMarker,
      logger,
    });
  } finally {
    if (declarations.length > 0) {
      cleanup = oracle.flushChain();
    }
  }

  if (cleanup !== undefined && !cleanup.ok) {
    if (!resolveResult.ok) {
      logger.warn(`Could not flush chain ${config.chain}: ${cleanup.error}`);
      return resolveResult;
    }
    return error(
      oracleDiagnostic(`Flushing chain ${config.chain} failed`, cleanup)
    );
  }

  if (!resolveResult.ok) {
    return resolveResult;
  }

  logger.info("Generating Python output");
  const table = buildOutputTable(resolveResult.value);
  return ok(
    emitTableModule(table, {
      moduleName: config.moduleName,
      programName: context.programName,
      typeTable: config.typeTable,
      codeTable: config.codeTable,
    })
  );
};
