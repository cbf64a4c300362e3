/**
 * ICMP match spellings per address family
 */

import type { FamilyProfile, FirewallFamily } from "./types.js";

export const FIREWALL_FAMILIES: Readonly<Record<FirewallFamily, FamilyProfile>> =
  {
    ipv4: {
      tool: "iptables",
      protocol: "icmp",
      typeOption: "--icmp-type",
      helpMarker: "Valid ICMP Types:",
      listingMarker: "icmptype ",
    },
    ipv6: {
      tool: "ip6tables",
      protocol: "icmpv6",
      typeOption: "--icmpv6-type",
      helpMarker: "Valid ICMPv6 Types:",
      listingMarker: "ipv6-icmptype ",
    },
  };

export const DEFAULT_CHAIN = "FORWARD";

export const isFirewallFamily = (value: string): value is FirewallFamily =>
  value === "ipv4" || value === "ipv6";
