/**
 * Type/code resolver - turns help-text names into numbers by probing the oracle
 */

import type { Oracle } from "@icmpgen/backend";
import type { GeneratorLogger } from "@icmpgen/logger";
import type { TypeDeclaration } from "./help-text.js";
import { scanCodeListing, scanTypeListing } from "./listing.js";
import {
  type Diagnostic,
  createDiagnostic,
  oracleDiagnostic,
} from "./types/diagnostic.js";
import { type Result, ok, error, mapError } from "./types/result.js";

export type TypeEntry = {
  readonly name: string;
  readonly numericType: number;
  /** Alternate name declared in parentheses */
  readonly alias?: string;
  /** Set on the entry recorded for an alias: the canonical name */
  readonly aliasOf?: string;
};

export type CodeEntry = {
  readonly name: string;
  readonly numericType: number;
  readonly numericCode: number;
};

export type ResolvedTables = {
  readonly types: readonly TypeEntry[];
  readonly codes: readonly CodeEntry[];
};

export type ResolveOptions = {
  /** Text preceding the type number in the listing, e.g. "icmptype " */
  readonly listingMarker: string;
  readonly logger: GeneratorLogger;
};

/**
 * Install a single rule matching `filter` and read the chain back
 */
export const probe = (
  oracle: Oracle,
  filter: string
): Result<string, Diagnostic> => {
  const appended = oracle.appendProbe(filter);
  if (!appended.ok) {
    return error(oracleDiagnostic(`Probe "${filter}" failed`, appended));
  }

  const listed = oracle.listChain();
  if (!listed.ok) {
    return error(
      oracleDiagnostic(`Listing for probe "${filter}" failed`, listed)
    );
  }

  return ok(listed.stdout);
};

const inProbe =
  (filter: string) =>
  (diagnostic: Diagnostic): Diagnostic => ({
    ...diagnostic,
    message: `Probe "${filter}": ${diagnostic.message}`,
  });

const resolveType = (
  declaration: TypeDeclaration,
  oracle: Oracle,
  options: ResolveOptions
): Result<readonly TypeEntry[], Diagnostic> => {
  const { name, alias } = declaration;

  const listing = probe(oracle, name);
  if (!listing.ok) {
    return listing;
  }
  options.logger.debug(`Listing for ${name}:\n${listing.value}`);

  const scanned = mapError(
    scanTypeListing(listing.value, options.listingMarker),
    inProbe(name)
  );
  if (!scanned.ok) {
    return scanned;
  }

  const numericType = scanned.value;
  if (alias === undefined) {
    options.logger.info(`Found type ${name} = ${numericType}`);
    return ok([{ name, numericType }]);
  }

  options.logger.info(
    `Found type ${name} (alias ${alias}) = ${numericType}`
  );
  return ok([
    { name, numericType, alias },
    { name: alias, numericType, aliasOf: name },
  ]);
};

const resolveCode = (
  codeName: string,
  enclosing: TypeEntry,
  oracle: Oracle,
  options: ResolveOptions
): Result<CodeEntry, Diagnostic> => {
  const listing = probe(oracle, codeName);
  if (!listing.ok) {
    return listing;
  }
  options.logger.debug(`Listing for ${codeName}:\n${listing.value}`);

  const scanned = mapError(
    scanCodeListing(listing.value, options.listingMarker),
    inProbe(codeName)
  );
  if (!scanned.ok) {
    return scanned;
  }

  const { numericType, numericCode } = scanned.value;
  if (numericType !== enclosing.numericType) {
    return error(
      createDiagnostic(
        "TypeCodeMismatchError",
        `Code ${codeName} resolved to type ${numericType}, expected ${enclosing.numericType} (${enclosing.name})`
      )
    );
  }

  options.logger.info(
    `Found code ${codeName} = (${numericType}, ${numericCode}) under ${enclosing.name}`
  );
  return ok({ name: codeName, numericType, numericCode });
};

/**
 * Resolve every declared type, alias and code name.
 *
 * Stops at the first failure; nothing is returned for a partial run.
 */
export const resolveDeclarations = (
  declarations: readonly TypeDeclaration[],
  oracle: Oracle,
  options: ResolveOptions
): Result<ResolvedTables, Diagnostic> => {
  const types: TypeEntry[] = [];
  const codes: CodeEntry[] = [];

  for (const declaration of declarations) {
    const typeResult = resolveType(declaration, oracle, options);
    if (!typeResult.ok) {
      return typeResult;
    }
    types.push(...typeResult.value);

    const [canonical] = typeResult.value;
    if (!canonical) continue;

    for (const codeName of declaration.codes) {
      const codeResult = resolveCode(codeName, canonical, oracle, options);
      if (!codeResult.ok) {
        return codeResult;
      }
      codes.push(codeResult.value);
    }
  }

  return ok({ types, codes });
};
