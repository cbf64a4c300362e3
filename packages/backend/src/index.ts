/**
 * icmpgen backend - firewall tool oracle
 */

export type {
  CommandOutput,
  CommandRunner,
  FamilyProfile,
  FirewallFamily,
  Oracle,
  OracleOptions,
  OracleResult,
} from "./types.js";

export {
  DEFAULT_CHAIN,
  FIREWALL_FAMILIES,
  isFirewallFamily,
} from "./families.js";
export { createIptablesOracle, execute, runCommand } from "./iptables.js";
export {
  type StubOracle,
  type StubOracleCall,
  createStubOracle,
  formatStubListing,
} from "./stub-oracle.js";
