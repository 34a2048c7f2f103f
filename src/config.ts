// src/config.ts — Config Resolver
// defaults ← codemap.config.json (or package.json "codemap" key) ← CLI args

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import type { MapLevel, ResolvedConfig, SizeLimits, Warning } from "./types.js";
import { DEFAULT_REPORT_LIMIT, DEFAULT_SIZE_LIMITS, DEFAULT_TOLERANCE } from "./types.js";
import { defaultConcurrency } from "./concurrency.js";

export const CONFIG_FILENAME = "codemap.config.json";
export const PACKAGE_JSON_KEY = "codemap";

export type Command = "generate" | "validate";

export interface ParsedArgs {
  command?: string;
  positionals: string[];
  exclude: string[];
  config?: string;
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  dryRun: boolean;
  help: boolean;
  version: boolean;
}

/** Config file keys; everything optional, validated field by field. */
export interface FileConfig {
  exclude?: string[];
  tolerance?: number;
  reportLimit?: number;
  sizeLimits?: Partial<SizeLimits>;
  concurrency?: number;
  projectName?: string;
}

export function defaultConfig(): ResolvedConfig {
  return {
    exclude: [],
    tolerance: DEFAULT_TOLERANCE,
    reportLimit: DEFAULT_REPORT_LIMIT,
    sizeLimits: { ...DEFAULT_SIZE_LIMITS },
    concurrency: defaultConcurrency(),
    projectName: undefined,
    dryRun: false,
    verbose: false,
  };
}

/**
 * Resolve config from CLI args, config file, and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const defaults = defaultConfig();
  const fileConfig = loadConfigFile(args.config, warnings, cwd) ?? {};

  return {
    exclude: [...(fileConfig.exclude ?? []), ...args.exclude],
    tolerance: fileConfig.tolerance ?? defaults.tolerance,
    reportLimit: fileConfig.reportLimit ?? defaults.reportLimit,
    sizeLimits: { ...defaults.sizeLimits, ...fileConfig.sizeLimits },
    concurrency: fileConfig.concurrency ?? defaults.concurrency,
    projectName: fileConfig.projectName,
    dryRun: args.dryRun,
    verbose: args.verbose,
  };
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
  cwd: string,
): FileConfig | null {
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    const parsed = parseJsonFile(absPath, warnings);
    return parsed === undefined ? null : validateFileConfig(parsed, absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    const parsed = parseJsonFile(jsonConfig, warnings);
    return parsed === undefined ? null : validateFileConfig(parsed, jsonConfig, warnings);
  }

  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    const pkg = parseJsonFile(pkgJson, warnings);
    if (isRecord(pkg) && PACKAGE_JSON_KEY in pkg) {
      return validateFileConfig(pkg[PACKAGE_JSON_KEY], `${pkgJson} (${PACKAGE_JSON_KEY})`, warnings);
    }
  }

  return null;
}

function parseJsonFile(filePath: string, warnings: Warning[]): unknown {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    return parsed;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPositiveInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

/**
 * Keep the valid keys of a config object; warn about each invalid one.
 */
export function validateFileConfig(
  raw: unknown,
  source: string,
  warnings: Warning[] = [],
): FileConfig {
  const invalid = (key: string, expected: string): void => {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Ignoring "${key}" in ${source}: expected ${expected}`,
    });
  };

  if (!isRecord(raw)) {
    invalid("config", "an object");
    return {};
  }

  const config: FileConfig = {};

  if (raw.exclude !== undefined) {
    const exclude = raw.exclude;
    if (Array.isArray(exclude) && exclude.every((e): e is string => typeof e === "string")) {
      config.exclude = exclude;
    } else {
      invalid("exclude", "an array of glob strings");
    }
  }

  if (raw.tolerance !== undefined) {
    const t = raw.tolerance;
    if (typeof t === "number" && Number.isInteger(t) && t >= 0) config.tolerance = t;
    else invalid("tolerance", "a non-negative integer");
  }

  if (raw.reportLimit !== undefined) {
    if (isPositiveInt(raw.reportLimit)) config.reportLimit = raw.reportLimit;
    else invalid("reportLimit", "a positive integer");
  }

  if (raw.concurrency !== undefined) {
    if (isPositiveInt(raw.concurrency)) config.concurrency = raw.concurrency;
    else invalid("concurrency", "a positive integer");
  }

  if (raw.projectName !== undefined) {
    if (typeof raw.projectName === "string" && raw.projectName.trim() !== "") {
      config.projectName = raw.projectName.trim();
    } else {
      invalid("projectName", "a non-empty string");
    }
  }

  if (raw.sizeLimits !== undefined) {
    const limits = raw.sizeLimits;
    if (isRecord(limits)) {
      const sizeLimits: Partial<SizeLimits> = {};
      const levels: MapLevel[] = ["L0", "L1", "L2"];
      for (const level of levels) {
        const value = limits[level];
        if (value === undefined) continue;
        if (isPositiveInt(value)) sizeLimits[level] = value;
        else invalid(`sizeLimits.${level}`, "a positive integer");
      }
      config.sizeLimits = sizeLimits;
    } else {
      invalid("sizeLimits", "an object with L0, L1, L2");
    }
  }

  return config;
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { c: "config", q: "quiet", v: "verbose", h: "help", e: "exclude" },
    boolean: ["dry-run", "json", "quiet", "verbose", "help", "version"],
    string: ["config", "exclude"],
  });

  const [command, ...positionals] = args._.map(String);
  const exclude: unknown = args.exclude;
  const config: unknown = args.config;

  return {
    command,
    positionals,
    exclude: toStringList(exclude),
    config: typeof config === "string" && config !== "" ? config : undefined,
    json: args.json === true,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    dryRun: args["dry-run"] === true,
    help: args.help === true,
    version: args.version === true,
  };
}

function toStringList(value: unknown): string[] {
  if (typeof value === "string") return value === "" ? [] : [value];
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === "string" && v !== "");
  }
  return [];
}

export function isCommand(value: string | undefined): value is Command {
  return value === "generate" || value === "validate";
}
