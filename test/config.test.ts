import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  isCommand,
  parseCliArgs,
  resolveConfig,
  validateFileConfig,
} from "../src/config.js";
import type { ParsedArgs } from "../src/config.js";
import type { Warning } from "../src/types.js";

function args(overrides: Partial<ParsedArgs> = {}): ParsedArgs {
  return {
    command: "generate",
    positionals: [],
    exclude: [],
    json: false,
    quiet: false,
    verbose: false,
    dryRun: false,
    help: false,
    version: false,
    ...overrides,
  };
}

describe("parseCliArgs", () => {
  it("splits the command from its positionals", async () => {
    const parsed = await parseCliArgs(["generate", "src", "docs/map", "--dry-run", "--json"]);
    expect(parsed.command).toBe("generate");
    expect(parsed.positionals).toEqual(["src", "docs/map"]);
    expect(parsed.dryRun).toBe(true);
    expect(parsed.json).toBe(true);
    expect(parsed.quiet).toBe(false);
  });

  it("collects repeated --exclude flags", async () => {
    const parsed = await parseCliArgs(["generate", "a", "b", "--exclude", "**/*.test.ts", "--exclude", "vendor/**"]);
    expect(parsed.exclude).toEqual(["**/*.test.ts", "vendor/**"]);
  });

  it("reads short aliases", async () => {
    const parsed = await parseCliArgs(["validate", "map", "-q", "-v", "-c", "cfg.json"]);
    expect(parsed).toMatchObject({ quiet: true, verbose: true, config: "cfg.json" });
  });

  it("leaves the command undefined when none is given", async () => {
    const parsed = await parseCliArgs(["--help"]);
    expect(parsed.command).toBeUndefined();
    expect(parsed.help).toBe(true);
  });
});

describe("isCommand", () => {
  it("accepts only generate and validate", () => {
    expect(isCommand("generate")).toBe(true);
    expect(isCommand("validate")).toBe(true);
    expect(isCommand("analyze")).toBe(false);
    expect(isCommand(undefined)).toBe(false);
  });
});

describe("validateFileConfig", () => {
  it("keeps valid keys", () => {
    const warnings: Warning[] = [];
    const config = validateFileConfig(
      {
        exclude: ["**/*.spec.ts"],
        tolerance: 3,
        reportLimit: 20,
        sizeLimits: { L2: 150 },
        concurrency: 4,
        projectName: " Shop ",
      },
      "codemap.config.json",
      warnings,
    );
    expect(config).toEqual({
      exclude: ["**/*.spec.ts"],
      tolerance: 3,
      reportLimit: 20,
      sizeLimits: { L2: 150 },
      concurrency: 4,
      projectName: "Shop",
    });
    expect(warnings).toEqual([]);
  });

  it("drops invalid keys with a warning each", () => {
    const warnings: Warning[] = [];
    const config = validateFileConfig(
      { exclude: "src/**", tolerance: -1, reportLimit: 0, sizeLimits: { L1: "big" } },
      "codemap.config.json",
      warnings,
    );
    expect(config).toEqual({ sizeLimits: {} });
    expect(warnings.map((w) => w.message)).toEqual([
      'Ignoring "exclude" in codemap.config.json: expected an array of glob strings',
      'Ignoring "tolerance" in codemap.config.json: expected a non-negative integer',
      'Ignoring "reportLimit" in codemap.config.json: expected a positive integer',
      'Ignoring "sizeLimits.L1" in codemap.config.json: expected a positive integer',
    ]);
  });

  it("rejects a non-object config", () => {
    const warnings: Warning[] = [];
    expect(validateFileConfig([1, 2], "x.json", warnings)).toEqual({});
    expect(warnings).toHaveLength(1);
  });
});

describe("resolveConfig", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "codemap-cfg-"));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  it("uses defaults when there is no config file", () => {
    const config = resolveConfig(args(), [], cwd);
    expect(config).toMatchObject({
      exclude: [],
      tolerance: 5,
      reportLimit: 10,
      sizeLimits: { L0: 500, L1: 300, L2: 200 },
      dryRun: false,
      verbose: false,
    });
    expect(config.concurrency).toBeGreaterThanOrEqual(1);
  });

  it("layers codemap.config.json under CLI flags", () => {
    writeFileSync(
      join(cwd, "codemap.config.json"),
      JSON.stringify({ exclude: ["gen/**"], tolerance: 2, sizeLimits: { L1: 250 } }),
    );
    const config = resolveConfig(args({ exclude: ["**/*.test.ts"], dryRun: true }), [], cwd);
    expect(config.exclude).toEqual(["gen/**", "**/*.test.ts"]);
    expect(config.tolerance).toBe(2);
    expect(config.sizeLimits).toEqual({ L0: 500, L1: 250, L2: 200 });
    expect(config.dryRun).toBe(true);
  });

  it("reads the codemap key of package.json", () => {
    writeFileSync(
      join(cwd, "package.json"),
      JSON.stringify({ name: "shop", codemap: { projectName: "Shop", reportLimit: 3 } }),
    );
    const config = resolveConfig(args(), [], cwd);
    expect(config.projectName).toBe("Shop");
    expect(config.reportLimit).toBe(3);
  });

  it("prefers an explicit --config path", () => {
    writeFileSync(join(cwd, "codemap.config.json"), JSON.stringify({ tolerance: 1 }));
    writeFileSync(join(cwd, "custom.json"), JSON.stringify({ tolerance: 9 }));
    expect(resolveConfig(args({ config: "custom.json" }), [], cwd).tolerance).toBe(9);
  });

  it("warns about a missing or malformed config file", () => {
    const warnings: Warning[] = [];
    resolveConfig(args({ config: "missing.json" }), warnings, cwd);
    writeFileSync(join(cwd, "codemap.config.json"), "{ not json");
    resolveConfig(args(), warnings, cwd);
    expect(warnings.map((w) => w.module)).toEqual(["config", "config"]);
    expect(warnings[0].message).toBe("Config file not found: missing.json");
    expect(warnings[1].message.startsWith("Failed to parse config file")).toBe(true);
  });
});
