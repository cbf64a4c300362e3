/**
 * iptables / ip6tables CLI wrapper used as the ICMP oracle
 */

import { spawnSync } from "node:child_process";
import type {
  CommandRunner,
  Oracle,
  OracleOptions,
  OracleResult,
} from "./types.js";

/**
 * Run a command synchronously; no timeout, the caller blocks until exit
 */
export const runCommand: CommandRunner = (command, args) => {
  const result = spawnSync(command, [...args], {
    encoding: "utf-8",
  });

  return {
    error: result.error,
    status: result.status,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
  };
};

/**
 * Execute one tool invocation and fold its outcome into an OracleResult
 */
export const execute = (
  tool: string,
  args: readonly string[],
  runner: CommandRunner = runCommand
): OracleResult => {
  const result = runner(tool, args);
  const commandLine = [tool, ...args].join(" ");

  if (result.error) {
    return {
      ok: false,
      error: `Failed to execute ${tool}: ${result.error.message}`,
    };
  }

  if (result.status !== 0) {
    return {
      ok: false,
      error: `${commandLine} failed with code ${result.status ?? "null"}`,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }

  return {
    ok: true,
    stdout: result.stdout,
  };
};

/**
 * Create an oracle that drives the real firewall tool
 */
export const createIptablesOracle = (
  options: OracleOptions,
  runner: CommandRunner = runCommand
): Oracle => {
  const { tool, chain, protocol, typeOption } = options;

  const flushChain = (): OracleResult =>
    execute(tool, ["-F", chain], runner);

  return {
    queryHelp: () => execute(tool, ["-p", protocol, "-h"], runner),

    appendProbe: (filter) => {
      const flushResult = flushChain();
      if (!flushResult.ok) {
        return flushResult;
      }
      return execute(
        tool,
        ["-A", chain, "-p", protocol, typeOption, filter],
        runner
      );
    },

    listChain: () => execute(tool, ["-nL", chain], runner),

    flushChain,
  };
};
