/**
 * Type definitions for the firewall oracle
 */

/**
 * Address family the table is generated for
 */
export type FirewallFamily = "ipv4" | "ipv6";

/**
 * How a firewall tool spells ICMP matching for one family
 */
export type FamilyProfile = {
  readonly tool: string;
  readonly protocol: string;
  readonly typeOption: string;
  readonly helpMarker: string;
  readonly listingMarker: string;
};

/**
 * Settings for a subprocess-backed oracle
 */
export type OracleOptions = {
  readonly tool: string;
  readonly chain: string;
  readonly protocol: string;
  readonly typeOption: string;
};

/**
 * Raw outcome of one subprocess run
 */
export type CommandOutput = {
  readonly error?: Error;
  readonly status: number | null;
  readonly stdout: string;
  readonly stderr: string;
};

/**
 * Runs a command to completion and captures its output
 */
export type CommandRunner = (
  command: string,
  args: readonly string[]
) => CommandOutput;

/**
 * Oracle execution result
 */
export type OracleResult =
  | {
      readonly ok: true;
      readonly stdout: string;
    }
  | {
      readonly ok: false;
      readonly error: string;
      readonly stdout?: string;
      readonly stderr?: string;
    };

/**
 * The firewall tool, used only as a source of canonical numeric answers.
 *
 * `appendProbe` and `flushChain` rewrite the scratch chain; callers must own
 * that chain exclusively.
 */
export type Oracle = {
  /** Help text for the ICMP match (no firewall side effects) */
  readonly queryHelp: () => OracleResult;
  /** Flush the chain, then append one rule matching `filter` */
  readonly appendProbe: (filter: string) => OracleResult;
  /** Numeric listing of the chain */
  readonly listChain: () => OracleResult;
  readonly flushChain: () => OracleResult;
};
