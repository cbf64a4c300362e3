/**
 * Type definitions for CLI
 */

import type { FirewallFamily } from "@icmpgen/backend";

/**
 * icmpgen configuration file (icmpgen.json)
 */
export type IcmpgenConfig = {
  readonly family?: FirewallFamily;
  readonly tool?: string;
  readonly chain?: string;
  readonly moduleName?: string;
  readonly typeTable?: string;
  readonly codeTable?: string;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  family?: FirewallFamily;
  tool?: string;
  chain?: string;
  out?: string;
};

export type CliCommand = "generate" | "help" | "version";

export type ParsedArgs = {
  readonly command: CliCommand;
  readonly options: CliOptions;
};

/**
 * Combined configuration (from file + CLI args + family defaults)
 */
export type ResolvedConfig = {
  readonly family: FirewallFamily;
  readonly tool: string;
  readonly chain: string;
  readonly protocol: string;
  readonly typeOption: string;
  readonly helpMarker: string;
  readonly listingMarker: string;
  readonly moduleName: string;
  readonly typeTable: string;
  readonly codeTable: string;
  /** Output file; stdout when undefined */
  readonly out: string | undefined;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
