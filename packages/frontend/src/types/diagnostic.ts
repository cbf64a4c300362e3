/**
 * Diagnostic types for the generation pipeline
 */

import type { OracleResult } from "@icmpgen/backend";

export type DiagnosticCode =
  | "OracleExecutionError" // Tool missing, not executable, or non-zero exit
  | "HelpFormatError" // Help text lacks the ICMP types section
  | "OrphanCodeError" // Indented code line before any type line
  | "ProbeFormatError" // Rule listing lacks the expected match text
  | "TypeCodeMismatchError"; // Code probe disagrees with its enclosing type

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly message: string;
  /** 1-based line within the sliced help text */
  readonly line?: number;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  message: string,
  line?: number,
  hint?: string
): Diagnostic => ({
  code,
  message,
  ...(line !== undefined ? { line } : {}),
  ...(hint !== undefined ? { hint } : {}),
});

/**
 * Wrap a failed tool invocation; captured stderr becomes the hint
 */
export const oracleDiagnostic = (
  context: string,
  result: Extract<OracleResult, { readonly ok: false }>
): Diagnostic => {
  const stderr = result.stderr?.trim();
  return createDiagnostic(
    "OracleExecutionError",
    `${context}: ${result.error}`,
    undefined,
    stderr ? stderr : undefined
  );
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  parts.push(`error ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.line !== undefined) {
    parts.push(`(help text line ${diagnostic.line})`);
  }

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
