/**
 * Tests for configuration loading and resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  findConfig,
  loadConfig,
  resolveConfig,
  validateConfig,
} from "./config.js";

describe("Config", () => {
  describe("resolveConfig", () => {
    it("should use ipv4 iptables defaults", () => {
      const result = resolveConfig({}, {});

      expect(result).to.deep.equal({
        family: "ipv4",
        tool: "iptables",
        chain: "FORWARD",
        protocol: "icmp",
        typeOption: "--icmp-type",
        helpMarker: "Valid ICMP Types:",
        listingMarker: "icmptype ",
        moduleName: "icmp.py",
        typeTable: "ICMP_TYPE",
        codeTable: "ICMP_TYPE_CODE",
        out: undefined,
        verbose: false,
        quiet: false,
      });
    });

    it("should switch every default for ipv6", () => {
      const result = resolveConfig({ family: "ipv6" }, {});

      expect(result.tool).to.equal("ip6tables");
      expect(result.protocol).to.equal("icmpv6");
      expect(result.typeOption).to.equal("--icmpv6-type");
      expect(result.helpMarker).to.equal("Valid ICMPv6 Types:");
      expect(result.listingMarker).to.equal("ipv6-icmptype ");
      expect(result.moduleName).to.equal("icmp6.py");
      expect(result.typeTable).to.equal("ICMP6_TYPE");
      expect(result.codeTable).to.equal("ICMP6_TYPE_CODE");
    });

    it("should use config values over defaults", () => {
      const result = resolveConfig(
        {
          tool: "/usr/sbin/iptables-legacy",
          chain: "ICMPGEN",
          moduleName: "icmp_names.py",
          typeTable: "TYPES",
          codeTable: "CODES",
        },
        {}
      );

      expect(result.tool).to.equal("/usr/sbin/iptables-legacy");
      expect(result.chain).to.equal("ICMPGEN");
      expect(result.moduleName).to.equal("icmp_names.py");
      expect(result.typeTable).to.equal("TYPES");
      expect(result.codeTable).to.equal("CODES");
    });

    it("should override config with CLI options", () => {
      const result = resolveConfig(
        { family: "ipv4", tool: "iptables-legacy", chain: "ICMPGEN" },
        {
          family: "ipv6",
          tool: "ip6tables-nft",
          chain: "SCRATCH",
          out: "icmp6.py",
          verbose: true,
        }
      );

      expect(result.family).to.equal("ipv6");
      expect(result.tool).to.equal("ip6tables-nft");
      expect(result.chain).to.equal("SCRATCH");
      expect(result.out).to.equal("icmp6.py");
      expect(result.verbose).to.equal(true);
    });
  });

  describe("validateConfig", () => {
    it("should accept an empty object", () => {
      expect(validateConfig({})).to.deep.equal({ ok: true, value: {} });
    });

    it("should ignore unknown fields", () => {
      expect(validateConfig({ chain: "ICMPGEN", comment: 1 })).to.deep.equal({
        ok: true,
        value: { chain: "ICMPGEN" },
      });
    });

    it("should reject a non-object", () => {
      expect(validateConfig(["ipv4"])).to.deep.equal({
        ok: false,
        error: "icmpgen.json: must be a JSON object",
      });
    });

    it("should reject an unknown family", () => {
      expect(validateConfig({ family: "ipx" })).to.deep.equal({
        ok: false,
        error: `icmpgen.json: 'family' must be "ipv4" or "ipv6"`,
      });
    });

    it("should reject a non-string tool", () => {
      expect(validateConfig({ tool: 42 })).to.deep.equal({
        ok: false,
        error: "icmpgen.json: 'tool' must be a non-empty string",
      });
    });

    it("should reject a table name that is not a Python identifier", () => {
      expect(validateConfig({ typeTable: "ICMP-TYPE" })).to.deep.equal({
        ok: false,
        error: "icmpgen.json: 'typeTable' must be a Python identifier",
      });
    });
  });

  describe("loadConfig and findConfig", () => {
    it("should load a config file", () => {
      const dir = mkdtempSync(join(tmpdir(), "icmpgen-config-load-"));

      try {
        const configPath = join(dir, "icmpgen.json");
        writeFileSync(
          configPath,
          JSON.stringify({ family: "ipv6", chain: "ICMPGEN" }),
          "utf-8"
        );

        expect(loadConfig(configPath)).to.deep.equal({
          ok: true,
          value: { family: "ipv6", chain: "ICMPGEN" },
        });
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should report a missing file", () => {
      const dir = mkdtempSync(join(tmpdir(), "icmpgen-config-missing-"));

      try {
        const configPath = join(dir, "icmpgen.json");
        expect(loadConfig(configPath)).to.deep.equal({
          ok: false,
          error: `Config file not found: ${configPath}`,
        });
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should report invalid JSON", () => {
      const dir = mkdtempSync(join(tmpdir(), "icmpgen-config-invalid-"));

      try {
        const configPath = join(dir, "icmpgen.json");
        writeFileSync(configPath, "{ chain: ", "utf-8");

        const result = loadConfig(configPath);
        expect(result.ok).to.equal(false);
        if (!result.ok) {
          expect(result.error.startsWith("Failed to parse icmpgen.json: ")).to.equal(
            true
          );
        }
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should find a config in a parent directory", () => {
      const dir = mkdtempSync(join(tmpdir(), "icmpgen-config-find-"));

      try {
        const nested = join(dir, "gen", "python");
        mkdirSync(nested, { recursive: true });
        writeFileSync(join(dir, "icmpgen.json"), "{}", "utf-8");

        expect(findConfig(nested)).to.equal(join(dir, "icmpgen.json"));
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
