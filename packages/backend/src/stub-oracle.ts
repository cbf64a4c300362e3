/**
 * In-process oracle answering from canned text
 */

import type { Oracle, OracleResult } from "./types.js";

export type StubOracleCall =
  | { readonly kind: "help" }
  | { readonly kind: "probe"; readonly filter: string }
  | { readonly kind: "list" }
  | { readonly kind: "flush" };

export type StubOracle = Oracle & {
  readonly calls: readonly StubOracleCall[];
};

/**
 * Rule listing in the shape `iptables -nL` prints for a single ICMP rule
 */
export const formatStubListing = (
  chain: string,
  match: string
): string =>
  [
    `Chain ${chain} (policy ACCEPT)`,
    "target     prot opt source               destination         ",
    `           icmp --  0.0.0.0/0            0.0.0.0/0            ${match}`,
    "",
  ].join("\n");

const EMPTY_LISTING = [
  "Chain FORWARD (policy ACCEPT)",
  "target     prot opt source               destination         ",
  "",
].join("\n");

/**
 * Create a stub oracle.
 *
 * `listings` maps a probe filter to the text `listChain` returns after that
 * probe; filters missing from the map list an empty chain. A filter listed in
 * `failures` makes `appendProbe` fail the way a rejected rule would.
 */
export const createStubOracle = (
  help: string,
  listings: Readonly<Record<string, string>>,
  failures: readonly string[] = []
): StubOracle => {
  const calls: StubOracleCall[] = [];
  let current: string | undefined;

  const succeed = (stdout: string): OracleResult => ({ ok: true, stdout });

  return {
    calls,

    queryHelp: () => {
      calls.push({ kind: "help" });
      return succeed(help);
    },

    appendProbe: (filter) => {
      calls.push({ kind: "probe", filter });
      if (failures.includes(filter)) {
        current = undefined;
        return {
          ok: false,
          error: "iptables -A FORWARD failed with code 2",
          stderr: `iptables v1.8.9 (legacy): Invalid ICMP type \`${filter}'`,
        };
      }
      current = filter;
      return succeed("");
    },

    listChain: () => {
      calls.push({ kind: "list" });
      const listing =
        current !== undefined ? listings[current] : undefined;
      return succeed(listing ?? EMPTY_LISTING);
    },

    flushChain: () => {
      calls.push({ kind: "flush" });
      current = undefined;
      return succeed("");
    },
  };
};
