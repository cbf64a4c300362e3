/**
 * Tests for CLI dispatch
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createStubOracle, formatStubListing } from "@icmpgen/backend";
import { createLogger } from "@icmpgen/logger";
import type { ResolvedConfig } from "../types.js";
import { type CliEnvironment, runCli } from "./dispatcher.js";
import { VERSION } from "./constants.js";

const HELP =
  "icmp match options:\n" +
  "Valid ICMP Types:\n" +
  "echo-reply (pong)\n" +
  "destination-unreachable\n" +
  "   network-unreachable\n";

const LISTINGS: Readonly<Record<string, string>> = {
  "echo-reply": formatStubListing("FORWARD", "icmptype 0"),
  "destination-unreachable": formatStubListing("FORWARD", "icmptype 3"),
  "network-unreachable": formatStubListing("FORWARD", "icmptype 3 code 0"),
};

type Captured = {
  readonly env: Partial<CliEnvironment>;
  readonly stdout: string[];
  readonly stderr: string[];
  readonly configs: ResolvedConfig[];
};

const capture = (cwd: string, help: string = HELP): Captured => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const configs: ResolvedConfig[] = [];
  return {
    stdout,
    stderr,
    configs,
    env: {
      cwd,
      programName: "icmpgen",
      writeOutput: (text) => {
        stdout.push(text);
      },
      writeError: (text) => {
        stderr.push(text);
      },
      createOracle: (config) => {
        configs.push(config);
        return createStubOracle(help, LISTINGS);
      },
      createLogger: () => createLogger("test", "silent"),
    },
  };
};

const withTempDir = (prefix: string, fn: (dir: string) => void): void => {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  try {
    fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};

const EXPECTED_MODULE = [
  "# icmp.py",
  "# generated by icmpgen",
  "ICMP_TYPE = {}",
  "ICMP_TYPE_CODE = {}",
  'ICMP_TYPE["echo-reply"] = 0',
  'ICMP_TYPE["pong"] = 0',
  'ICMP_TYPE["destination-unreachable"] = 3',
  'ICMP_TYPE_CODE["network-unreachable"] = (3, 0,)',
  "",
].join("\n");

describe("CLI Dispatcher", () => {
  it("should print the version", () => {
    const { env, stdout } = capture(tmpdir());

    expect(runCli(["--version"], env)).to.equal(0);
    expect(stdout).to.deep.equal([`icmpgen v${VERSION}\n`]);
  });

  it("should print help", () => {
    const { env, stdout } = capture(tmpdir());

    expect(runCli(["help"], env)).to.equal(0);
    expect(stdout.join("")).to.include("USAGE:\n  icmpgen [generate] [options]");
  });

  it("should exit 2 on a usage error", () => {
    const { env, stdout, stderr } = capture(tmpdir());

    expect(runCli(["--bogus"], env)).to.equal(2);
    expect(stdout).to.deep.equal([]);
    expect(stderr).to.deep.equal([
      "Error: Unknown option '--bogus'\n",
      "Run 'icmpgen --help' for usage information\n",
    ]);
  });

  it("should write the module to stdout", () => {
    withTempDir("icmpgen-cli-stdout-", (dir) => {
      const { env, stdout, stderr } = capture(dir);

      expect(runCli([], env)).to.equal(0);
      expect(stdout).to.deep.equal([EXPECTED_MODULE]);
      expect(stderr).to.deep.equal([]);
    });
  });

  it("should write the module to --out and nothing to stdout", () => {
    withTempDir("icmpgen-cli-out-", (dir) => {
      const { env, stdout } = capture(dir);

      expect(runCli(["generate", "-o", "icmp.py"], env)).to.equal(0);
      expect(stdout).to.deep.equal([]);
      expect(readFileSync(join(dir, "icmp.py"), "utf-8")).to.equal(
        EXPECTED_MODULE
      );
    });
  });

  it("should exit 1 with a diagnostic and no output on failure", () => {
    withTempDir("icmpgen-cli-failure-", (dir) => {
      const { env, stdout, stderr } = capture(
        dir,
        "Valid ICMP Types:\n   network-unreachable\n"
      );

      expect(runCli(["-o", "icmp.py"], env)).to.equal(1);
      expect(stdout).to.deep.equal([]);
      expect(stderr).to.deep.equal([
        'error OrphanCodeError: Code name "network-unreachable" appears before any ICMP type (help text line 1)\n',
      ]);
    });
  });

  it("should apply icmpgen.json found in the working directory", () => {
    withTempDir("icmpgen-cli-config-", (dir) => {
      writeFileSync(
        join(dir, "icmpgen.json"),
        JSON.stringify({ chain: "ICMPGEN", tool: "/usr/sbin/iptables-legacy" }),
        "utf-8"
      );
      const { env, configs } = capture(dir);

      expect(runCli([], env)).to.equal(0);
      expect(configs).to.have.length(1);
      expect(configs[0]?.chain).to.equal("ICMPGEN");
      expect(configs[0]?.tool).to.equal("/usr/sbin/iptables-legacy");
    });
  });

  it("should let CLI options override icmpgen.json", () => {
    withTempDir("icmpgen-cli-override-", (dir) => {
      writeFileSync(
        join(dir, "icmpgen.json"),
        JSON.stringify({ chain: "ICMPGEN" }),
        "utf-8"
      );
      const { env, configs } = capture(dir);

      runCli(["--chain", "SCRATCH"], env);
      expect(configs[0]?.chain).to.equal("SCRATCH");
    });
  });

  it("should exit 3 for an invalid config file", () => {
    withTempDir("icmpgen-cli-bad-config-", (dir) => {
      writeFileSync(join(dir, "custom.json"), '{"family":"ipx"}', "utf-8");
      const { env, stderr, configs } = capture(dir);

      expect(runCli(["-c", "custom.json"], env)).to.equal(3);
      expect(stderr).to.deep.equal([
        `Error: icmpgen.json: 'family' must be "ipv4" or "ipv6"\n`,
      ]);
      expect(configs).to.deep.equal([]);
    });
  });
});
