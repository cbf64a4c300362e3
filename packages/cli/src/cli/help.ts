/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

export const helpText = (): string => `
icmpgen - ICMP name table generator v${VERSION}

Asks the installed firewall tool which ICMP type and code names it knows,
resolves each to its numbers and prints them as a Python module.

WARNING: probing flushes the scratch chain repeatedly. Run as root, against a
chain you own.

USAGE:
  icmpgen [generate] [options]

COMMANDS:
  generate                  Probe the firewall tool and emit the table (default)
  help                      Show help
  version                   Show version

OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Log every probe listing
  -q, --quiet               Log errors only
  -c, --config <file>       Config file path (default: icmpgen.json)
  -f, --family <family>     ipv4 (iptables) or ipv6 (ip6tables)
  -t, --tool <path>         Firewall tool executable
  --chain <name>            Scratch chain (default: FORWARD)
  -o, --out <file>          Write the module to a file instead of stdout

EXAMPLES:
  icmpgen > icmp.py
  icmpgen --family ipv6 --chain ICMPGEN -o icmp6.py
`;
