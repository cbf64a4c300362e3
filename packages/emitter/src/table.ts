/**
 * Table builder - sorts resolved entries and merges them into emission order
 */

import type { ResolvedTables } from "@icmpgen/frontend";
import type { CodeRow, OutputTable, TableRow, TypeRow } from "./types.js";

const compareNames = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

export const compareTypeRows = (a: TypeRow, b: TypeRow): number =>
  a.numericType - b.numericType || compareNames(a.name, b.name);

export const compareCodeRows = (a: CodeRow, b: CodeRow): number =>
  a.numericType - b.numericType ||
  a.numericCode - b.numericCode ||
  compareNames(a.name, b.name);

/**
 * Interleave sorted rows: a type goes first while its number is <= the next
 * code's type number; whatever is left of either list is appended.
 */
export const mergeRows = (
  types: readonly TypeRow[],
  codes: readonly CodeRow[]
): readonly TableRow[] => {
  const order: TableRow[] = [];
  let t = 0;
  let c = 0;

  while (t < types.length && c < codes.length) {
    const type = types[t];
    const code = codes[c];
    if (!type || !code) break;

    if (type.numericType <= code.numericType) {
      order.push(type);
      t++;
    } else {
      order.push(code);
      c++;
    }
  }

  return [...order, ...types.slice(t), ...codes.slice(c)];
};

/**
 * Build the output table. A name resolved twice keeps its last value.
 */
export const buildOutputTable = (resolved: ResolvedTables): OutputTable => {
  const typesByName = new Map<string, TypeRow>();
  for (const entry of resolved.types) {
    typesByName.set(entry.name, {
      kind: "type",
      numericType: entry.numericType,
      name: entry.name,
    });
  }

  const codesByName = new Map<string, CodeRow>();
  for (const entry of resolved.codes) {
    codesByName.set(entry.name, {
      kind: "code",
      numericType: entry.numericType,
      numericCode: entry.numericCode,
      name: entry.name,
    });
  }

  const types = [...typesByName.values()].sort(compareTypeRows);
  const codes = [...codesByName.values()].sort(compareCodeRows);

  return { types, codes, order: mergeRows(types, codes) };
};
