/**
 * Scanners for `iptables -nL` rule listings.
 *
 * A probe rule lists as `... icmptype 8` for a type, or
 * `... icmptype 3 code 1` for a type+code.
 */

import { type Diagnostic, createDiagnostic } from "./types/diagnostic.js";
import { type Result, ok, error } from "./types/result.js";

const CODE_MARKER = "code ";
const INTEGER_PATTERN = /^\d+$/;
/** ICMP and ICMPv6 types and codes are single octets */
const MAX_FIELD_VALUE = 255;

export type TypeCodePair = {
  readonly numericType: number;
  readonly numericCode: number;
};

const parseField = (text: string): number | undefined => {
  const field = text.trim();
  if (!INTEGER_PATTERN.test(field)) {
    return undefined;
  }
  const value = Number.parseInt(field, 10);
  return value <= MAX_FIELD_VALUE ? value : undefined;
};

/**
 * Index of the first delimiter at or after `from`, or the end of the text
 */
const fieldEnd = (
  listing: string,
  from: number,
  delimiters: readonly string[]
): number =>
  delimiters.reduce((end, delimiter) => {
    const found = listing.indexOf(delimiter, from);
    return found !== -1 && found < end ? found : end;
  }, listing.length);

const formatError = (message: string, listing: string): Diagnostic =>
  createDiagnostic(
    "ProbeFormatError",
    message,
    undefined,
    `Rule listing was:\n${listing.trimEnd()}`
  );

/**
 * Read the numeric type following the marker, up to the end of its line
 */
export const scanTypeListing = (
  listing: string,
  marker: string
): Result<number, Diagnostic> => {
  const start = listing.indexOf(marker);
  if (start === -1) {
    return error(
      formatError(`Rule listing has no "${marker.trim()}" match`, listing)
    );
  }

  const from = start + marker.length;
  const numericType = parseField(
    listing.slice(from, fieldEnd(listing, from, ["\n"]))
  );
  if (numericType === undefined) {
    return error(
      formatError(
        `Value after "${marker.trim()}" is not an ICMP type number`,
        listing
      )
    );
  }

  return ok(numericType);
};

/**
 * Read the numeric type following the marker, then the numeric code
 * following the next "code " after it
 */
export const scanCodeListing = (
  listing: string,
  marker: string
): Result<TypeCodePair, Diagnostic> => {
  const start = listing.indexOf(marker);
  if (start === -1) {
    return error(
      formatError(`Rule listing has no "${marker.trim()}" match`, listing)
    );
  }

  const from = start + marker.length;
  const typeEnd = fieldEnd(listing, from, [" ", "\n"]);
  const numericType = parseField(listing.slice(from, typeEnd));
  if (numericType === undefined) {
    return error(
      formatError(
        `Value after "${marker.trim()}" is not an ICMP type number`,
        listing
      )
    );
  }

  const codeStart = listing.indexOf(CODE_MARKER, typeEnd);
  if (codeStart === -1) {
    return error(
      formatError(`Rule listing has no "${CODE_MARKER.trim()}" match`, listing)
    );
  }

  const codeFrom = codeStart + CODE_MARKER.length;
  const numericCode = parseField(
    listing.slice(codeFrom, fieldEnd(listing, codeFrom, ["\n"]))
  );
  if (numericCode === undefined) {
    return error(
      formatError(
        `Value after "${CODE_MARKER.trim()}" is not an ICMP code number`,
        listing
      )
    );
  }

  return ok({ numericType, numericCode });
};
