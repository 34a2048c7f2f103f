// src/cli.ts — Command dispatch for the codemap binary
// Returns an exit code instead of exiting so tests can drive it in-process.

import type { Warning } from "./types.js";
import { ENGINE_VERSION, MapIOError } from "./types.js";
import { isCommand, parseCliArgs, resolveConfig } from "./config.js";
import { generate } from "./generator.js";
import { validate } from "./validator.js";
import {
  formatGenerationReport,
  formatJson,
  formatValidationReport,
} from "./report-formatter.js";

export const EXIT_OK = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_MAP_MISSING = 2;

export interface CliStreams {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processStreams: CliStreams = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export const HELP_TEXT = `
codemap v${ENGINE_VERSION}

Usage:
  codemap generate <sourceDir> <mapDir>   Create or update the map for a source tree
  codemap validate <mapDir>               Check links, anchors and sizes of a map

Options:
  --exclude, -e <glob>  Exclude source paths (repeatable; relative to sourceDir)
  --config, -c <file>   Path to config file (default: ./codemap.config.json)
  --dry-run             Report what generate would change without writing
  --json                Print the report as JSON
  --quiet, -q           Suppress warnings
  --verbose, -v         Print progress to stderr
  --version             Print the version
  --help, -h            Show this help text

Exit codes:
  generate  0 done, 1 source or map directory not readable/writable
  validate  0 clean, 1 findings, 2 map directory missing or unreadable

Examples:
  codemap generate ./src ./docs/map --exclude "**/*.test.ts"
  codemap validate ./docs/map --json
`.trim();

export async function runCli(argv: string[], streams: CliStreams = processStreams): Promise<number> {
  const args = await parseCliArgs(argv);

  if (args.version) {
    streams.stdout(`${ENGINE_VERSION}\n`);
    return EXIT_OK;
  }
  if (args.help || !args.command) {
    streams.stdout(HELP_TEXT + "\n");
    return args.help ? EXIT_OK : EXIT_FINDINGS;
  }
  if (!isCommand(args.command)) {
    streams.stderr(`[error] Unknown command "${args.command}". Run codemap --help.\n`);
    return EXIT_FINDINGS;
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);
  const printWarnings = (extra: Warning[]): void => {
    if (args.quiet) return;
    for (const w of [...warnings, ...extra]) {
      streams.stderr(`[${w.level}] ${w.module}: ${w.message}\n`);
    }
  };

  if (args.command === "generate") {
    const [sourceDir, mapDir] = args.positionals;
    if (!sourceDir || !mapDir) {
      streams.stderr("[error] Usage: codemap generate <sourceDir> <mapDir>\n");
      return EXIT_FINDINGS;
    }
    try {
      const report = await generate(sourceDir, mapDir, config);
      printWarnings(report.warnings);
      streams.stdout((args.json ? formatJson(report) : formatGenerationReport(report)) + "\n");
      return EXIT_OK;
    } catch (err: unknown) {
      if (err instanceof MapIOError) {
        printWarnings([]);
        streams.stderr(`[error] ${err.message}\n`);
        return EXIT_FINDINGS;
      }
      throw err;
    }
  }

  const [mapDir] = args.positionals;
  if (!mapDir) {
    streams.stderr("[error] Usage: codemap validate <mapDir>\n");
    return EXIT_MAP_MISSING;
  }
  try {
    const report = await validate(mapDir, config);
    printWarnings(report.warnings);
    streams.stdout((args.json ? formatJson(report) : formatValidationReport(report)) + "\n");
    return report.ok ? EXIT_OK : EXIT_FINDINGS;
  } catch (err: unknown) {
    if (err instanceof MapIOError) {
      printWarnings([]);
      streams.stderr(`[error] ${err.message}\n`);
      return EXIT_MAP_MISSING;
    }
    throw err;
  }
}
