import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { cpSync, mkdtempSync, rmSync, unlinkSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { EXIT_FINDINGS, EXIT_MAP_MISSING, EXIT_OK, runCli } from "../src/cli.js";
import type { CliStreams } from "../src/cli.js";
import { ENGINE_VERSION } from "../src/types.js";

const FIXTURES = resolve(import.meta.dirname, "fixtures");

function capture(): CliStreams & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

describe("runCli", () => {
  let tmp: string;
  let sourceRoot: string;
  let mapRoot: string;

  beforeEach(() => {
    tmp = mkdtempSync(join(tmpdir(), "codemap-cli-"));
    sourceRoot = join(tmp, "calc-project");
    mapRoot = join(tmp, "map");
    cpSync(join(FIXTURES, "calc-project"), sourceRoot, { recursive: true });
  });

  afterEach(() => {
    rmSync(tmp, { recursive: true, force: true });
  });

  it("prints the version", async () => {
    const io = capture();
    expect(await runCli(["--version"], io)).toBe(EXIT_OK);
    expect(io.out.join("")).toBe(`${ENGINE_VERSION}\n`);
  });

  it("rejects an unknown command", async () => {
    const io = capture();
    expect(await runCli(["analyze"], io)).toBe(EXIT_FINDINGS);
    expect(io.err.join("")).toBe('[error] Unknown command "analyze". Run codemap --help.\n');
  });

  it("generates then validates cleanly", async () => {
    const gen = capture();
    expect(await runCli(["generate", sourceRoot, mapRoot, "--json"], gen)).toBe(EXIT_OK);
    const report: unknown = JSON.parse(gen.out.join(""));
    expect(report).toMatchObject({ createdFiles: { total: 6 }, dryRun: false });

    const val = capture();
    expect(await runCli(["validate", mapRoot], val)).toBe(EXIT_OK);
    expect(val.out.join("")).toContain("OK: no findings.");
  });

  it("exits 1 when validation finds problems", async () => {
    await runCli(["generate", sourceRoot, mapRoot], capture());
    unlinkSync(join(mapRoot, "ARCHITECTURE.md"));

    const io = capture();
    expect(await runCli(["validate", mapRoot, "--json"], io)).toBe(EXIT_FINDINGS);
    expect(JSON.parse(io.out.join(""))).toMatchObject({
      ok: false,
      counts: { structure: 1, "file-link": 1 },
    });
  });

  it("exits 2 when the map directory is missing", async () => {
    const io = capture();
    expect(await runCli(["validate", join(tmp, "absent")], io)).toBe(EXIT_MAP_MISSING);
    expect(io.err.join("")).toContain("[error] Map directory not found:");
  });

  it("exits 1 when the source directory is missing", async () => {
    const io = capture();
    expect(await runCli(["generate", join(tmp, "absent"), mapRoot], io)).toBe(EXIT_FINDINGS);
    expect(io.err.join("")).toContain("[error] Source directory not found:");
  });

  it("does not write in dry-run mode", async () => {
    const io = capture();
    expect(await runCli(["generate", sourceRoot, mapRoot, "--dry-run"], io)).toBe(EXIT_OK);
    expect(io.out.join("")).toContain("(dry run, nothing written)");
    const val = capture();
    expect(await runCli(["validate", mapRoot], val)).toBe(EXIT_MAP_MISSING);
  });
});
