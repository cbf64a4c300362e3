/**
 * Python module emitter for the ICMP tables
 */

import type {
  EmitterOptions,
  OutputTable,
  TableRow,
} from "./types.js";

export const DEFAULT_EMITTER_OPTIONS: EmitterOptions = {
  moduleName: "icmp.py",
  programName: "icmpgen",
  typeTable: "ICMP_TYPE",
  codeTable: "ICMP_TYPE_CODE",
};

/**
 * Quote a name as a Python string literal
 */
export const quoteName = (name: string): string =>
  `"${name.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;

/**
 * Emit the assignment statement for one row
 */
export const emitRow = (row: TableRow, options: EmitterOptions): string =>
  row.kind === "type"
    ? `${options.typeTable}[${quoteName(row.name)}] = ${row.numericType}`
    : `${options.codeTable}[${quoteName(row.name)}] = (${row.numericType}, ${row.numericCode},)`;

/**
 * Emit the complete module text, one statement per line
 */
export const emitTableModule = (
  table: OutputTable,
  options: Partial<EmitterOptions> = {}
): string => {
  const resolved: EmitterOptions = { ...DEFAULT_EMITTER_OPTIONS, ...options };

  const lines = [
    `# ${resolved.moduleName}`,
    `# generated by ${resolved.programName}`,
    `${resolved.typeTable} = {}`,
    `${resolved.codeTable} = {}`,
    ...table.order.map((row) => emitRow(row, resolved)),
  ];

  return `${lines.join("\n")}\n`;
};
