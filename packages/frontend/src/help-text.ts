/**
 * Help-text parser
 *
 * `iptables -p icmp -h` ends with a section like:
 *
 *   Valid ICMP Types:
 *   any
 *   echo-reply (pong)
 *   destination-unreachable
 *      network-unreachable
 *
 * Unindented lines declare a type, optionally followed by a parenthesized
 * alias. Indented lines name a code of the type declared above them.
 */

import type { Oracle } from "@icmpgen/backend";
import {
  type Diagnostic,
  createDiagnostic,
  oracleDiagnostic,
} from "./types/diagnostic.js";
import { type Result, ok, error } from "./types/result.js";

const ALIAS_PATTERN = /^([\w-]+) \((.*)\)$/;
const INDENT_PATTERN = /^\s/;

export type ParsedLine =
  | {
      readonly kind: "type";
      readonly name: string;
      readonly alias?: string;
      readonly line: number;
    }
  | {
      readonly kind: "code";
      readonly name: string;
      readonly line: number;
    };

export type TypeDeclaration = {
  readonly name: string;
  readonly alias?: string;
  readonly codes: readonly string[];
};

/**
 * Cut the help text down to the lines after the marker line
 */
export const sliceHelpText = (
  help: string,
  marker: string
): Result<string, Diagnostic> => {
  const start = help.indexOf(marker);
  if (start === -1) {
    return error(
      createDiagnostic(
        "HelpFormatError",
        `Help text has no "${marker}" section`,
        undefined,
        "The installed firewall tool prints an unsupported help format"
      )
    );
  }

  const rest = help.slice(start + marker.length);
  const newline = rest.indexOf("\n");
  return ok(newline === -1 ? "" : rest.slice(newline + 1));
};

/**
 * Classify one help line; blank lines yield undefined
 */
export const parseHelpLine = (
  text: string,
  line: number
): ParsedLine | undefined => {
  const content = text.trimEnd();
  if (content === "") {
    return undefined;
  }

  if (INDENT_PATTERN.test(content)) {
    return { kind: "code", name: content.trim(), line };
  }

  const match = ALIAS_PATTERN.exec(content);
  const name = match?.[1];
  const alias = match?.[2];
  if (name !== undefined && alias !== undefined) {
    return { kind: "type", name, alias, line };
  }

  return { kind: "type", name: content, line };
};

/**
 * Group help lines into type declarations, in input order
 */
export const parseHelpText = (
  text: string
): Result<readonly TypeDeclaration[], Diagnostic> => {
  const declarations: { name: string; alias?: string; codes: string[] }[] = [];

  for (const [index, raw] of text.split("\n").entries()) {
    const parsed = parseHelpLine(raw, index + 1);
    if (!parsed) continue;

    if (parsed.kind === "type") {
      declarations.push(
        parsed.alias !== undefined
          ? { name: parsed.name, alias: parsed.alias, codes: [] }
          : { name: parsed.name, codes: [] }
      );
      continue;
    }

    const current = declarations.at(-1);
    if (!current) {
      return error(
        createDiagnostic(
          "OrphanCodeError",
          `Code name "${parsed.name}" appears before any ICMP type`,
          parsed.line
        )
      );
    }
    current.codes.push(parsed.name);
  }

  return ok(declarations);
};

/**
 * Render a declaration the way the help text spells it
 */
export const formatHelpDeclaration = (name: string, alias?: string): string =>
  alias === undefined ? name : `${name} (${alias})`;

/**
 * Query the oracle for its help text and slice out the ICMP types section
 */
export const readHelpText = (
  oracle: Oracle,
  marker: string
): Result<string, Diagnostic> => {
  const result = oracle.queryHelp();
  if (!result.ok) {
    return error(oracleDiagnostic("Help query failed", result));
  }
  return sliceHelpText(result.stdout, marker);
};
