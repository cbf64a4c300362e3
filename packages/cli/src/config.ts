/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  DEFAULT_CHAIN,
  FIREWALL_FAMILIES,
  isFirewallFamily,
  type FirewallFamily,
} from "@icmpgen/backend";
import { type Result, ok, error } from "@icmpgen/frontend";
import type { IcmpgenConfig, CliOptions, ResolvedConfig } from "./types.js";

export const CONFIG_FILE_NAME = "icmpgen.json";

const PYTHON_IDENTIFIER = /^[A-Za-z_]\w*$/;

const STRING_FIELDS = ["tool", "chain", "moduleName"] as const;
const TABLE_FIELDS = ["typeTable", "codeTable"] as const;

type StringField = (typeof STRING_FIELDS)[number];
type TableField = (typeof TABLE_FIELDS)[number];

/**
 * Output names per family
 */
export const EMISSION_DEFAULTS: Readonly<
  Record<FirewallFamily, Pick<ResolvedConfig, "moduleName" | "typeTable" | "codeTable">>
> = {
  ipv4: {
    moduleName: "icmp.py",
    typeTable: "ICMP_TYPE",
    codeTable: "ICMP_TYPE_CODE",
  },
  ipv6: {
    moduleName: "icmp6.py",
    typeTable: "ICMP6_TYPE",
    codeTable: "ICMP6_TYPE_CODE",
  },
};

/**
 * Check parsed JSON against the icmpgen.json shape.
 * Unknown fields are ignored.
 */
export const validateConfig = (
  value: unknown
): Result<IcmpgenConfig, string> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return error(`${CONFIG_FILE_NAME}: must be a JSON object`);
  }

  const read = (key: string): unknown =>
    key in value ? Reflect.get(value, key) : undefined;

  const rawFamily = read("family");
  let family: FirewallFamily | undefined;
  if (rawFamily !== undefined) {
    if (typeof rawFamily !== "string" || !isFirewallFamily(rawFamily)) {
      return error(`${CONFIG_FILE_NAME}: 'family' must be "ipv4" or "ipv6"`);
    }
    family = rawFamily;
  }

  const fields: Partial<Record<StringField | TableField, string>> = {};

  for (const key of STRING_FIELDS) {
    const field = read(key);
    if (field === undefined) continue;
    if (typeof field !== "string" || field === "") {
      return error(`${CONFIG_FILE_NAME}: '${key}' must be a non-empty string`);
    }
    fields[key] = field;
  }

  for (const key of TABLE_FIELDS) {
    const field = read(key);
    if (field === undefined) continue;
    if (typeof field !== "string" || !PYTHON_IDENTIFIER.test(field)) {
      return error(
        `${CONFIG_FILE_NAME}: '${key}' must be a Python identifier`
      );
    }
    fields[key] = field;
  }

  return ok({ ...(family !== undefined ? { family } : {}), ...fields });
};

/**
 * Load icmpgen.json
 */
export const loadConfig = (
  configPath: string
): Result<IcmpgenConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    return validateConfig(parsed);
  } catch (e) {
    return error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
};

/**
 * Find icmpgen.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find icmpgen.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration: CLI options, then config file, then
 * the family's defaults
 */
export const resolveConfig = (
  config: IcmpgenConfig,
  cliOptions: CliOptions
): ResolvedConfig => {
  const family = cliOptions.family ?? config.family ?? "ipv4";
  const profile = FIREWALL_FAMILIES[family];
  const emission = EMISSION_DEFAULTS[family];

  return {
    family,
    tool: cliOptions.tool ?? config.tool ?? profile.tool,
    chain: cliOptions.chain ?? config.chain ?? DEFAULT_CHAIN,
    protocol: profile.protocol,
    typeOption: profile.typeOption,
    helpMarker: profile.helpMarker,
    listingMarker: profile.listingMarker,
    moduleName: config.moduleName ?? emission.moduleName,
    typeTable: config.typeTable ?? emission.typeTable,
    codeTable: config.codeTable ?? emission.codeTable,
    out: cliOptions.out,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
