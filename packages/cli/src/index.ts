#!/usr/bin/env -S node --import tsx
/**
 * icmpgen CLI - ICMP name table generator
 */

import { runCli } from "./cli.js";

// Run CLI with arguments (skip node and script name)
const args = process.argv.slice(2);

try {
  process.exitCode = runCli(args);
} catch (error) {
  console.error("Fatal error:", error);
  process.exitCode = 1;
}
