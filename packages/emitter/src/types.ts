/**
 * Type definitions for table building and emission
 */

export type TypeRow = {
  readonly kind: "type";
  readonly numericType: number;
  readonly name: string;
};

export type CodeRow = {
  readonly kind: "code";
  readonly numericType: number;
  readonly numericCode: number;
  readonly name: string;
};

export type TableRow = TypeRow | CodeRow;

/**
 * Both mappings, each sorted by full tuple, plus the merged emission order
 */
export type OutputTable = {
  readonly types: readonly TypeRow[];
  readonly codes: readonly CodeRow[];
  readonly order: readonly TableRow[];
};

export type EmitterOptions = {
  /** File name written in the header comment */
  readonly moduleName: string;
  /** Invocation recorded in the "generated by" line */
  readonly programName: string;
  /** Name of the name → type mapping */
  readonly typeTable: string;
  /** Name of the name → (type, code) mapping */
  readonly codeTable: string;
};
