// src/file-discovery.ts — Source File Discovery
// git ls-files when available (honours .gitignore), filesystem walk otherwise.
// User excludes are picomatch globs relative to the source root.

import { type Stats, existsSync, readdirSync, realpathSync, statSync } from "node:fs";
import { join, relative, resolve, sep } from "node:path";
import { execSync } from "node:child_process";
import picomatch from "picomatch";
import {
  type Warning,
  DEFAULT_EXCLUDE_DIRS,
  DTS_EXTENSION,
  SOURCE_EXTENSIONS,
} from "./types.js";

interface WalkState {
  root: string;
  realRoot: string;
  seenDirs: Set<number>; // inodes of symlinked directories already entered
  found: string[];
  warnings: Warning[];
}

/**
 * Discover all source files under a root, as sorted absolute paths.
 */
export function discoverFiles(
  sourceRoot: string,
  excludePatterns: string[],
  warnings: Warning[] = [],
): string[] {
  const root = resolve(sourceRoot);
  const candidates = listTrackedFiles(root) ?? walkTree(root, warnings);

  const excluded = excludePatterns.length > 0
    ? picomatch(excludePatterns, { dot: true })
    : () => false;

  return candidates
    .filter((file) => !excluded(toPosixRelative(root, file)))
    .sort();
}

/**
 * Convert an absolute source path to the POSIX path relative to the root.
 */
export function toPosixRelative(root: string, filePath: string): string {
  return relative(root, filePath).split(sep).join("/");
}

function isSourceFile(name: string): boolean {
  return SOURCE_EXTENSIONS.test(name) && !DTS_EXTENSION.test(name);
}

function isSkippedDir(name: string): boolean {
  return DEFAULT_EXCLUDE_DIRS.some((dir) => dir === name);
}

// ─── git ─────────────────────────────────────────────────────────────────────

/**
 * Tracked and untracked-but-not-ignored files, or null outside a work tree.
 */
function listTrackedFiles(root: string): string[] | null {
  let output: string;
  try {
    // -z: NUL-separated, no C-quoting of non-ASCII paths
    output = execSync("git ls-files -z --cached --others --exclude-standard", {
      cwd: root,
      encoding: "utf-8",
      timeout: 5000,
      stdio: ["ignore", "pipe", "ignore"],
    });
  } catch {
    return null;
  }

  return output
    .split("\0")
    .filter((rel) => rel !== "" && isSourceFile(rel))
    .filter((rel) => !rel.split("/").some(isSkippedDir))
    .map((rel) => resolve(root, rel))
    // --cached still lists files deleted from the work tree
    .filter((file) => existsSync(file));
}

// ─── Filesystem walk ─────────────────────────────────────────────────────────

function walkTree(root: string, warnings: Warning[]): string[] {
  const state: WalkState = {
    root,
    realRoot: realpathSync(root),
    seenDirs: new Set(),
    found: [],
    warnings,
  };
  walkDir(root, state);
  return state.found;
}

function walkDir(dir: string, state: WalkState): void {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    warn(state, "warn", `Cannot read directory: ${errorMessage(err)}`, dir);
    return;
  }

  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!isSkippedDir(entry.name)) walkDir(full, state);
    } else if (entry.isSymbolicLink()) {
      followLink(full, entry.name, state);
    } else if (entry.isFile() && isSourceFile(entry.name)) {
      state.found.push(full);
    }
  }
}

/**
 * Symlinks are followed only inside the root, and each linked directory once.
 */
function followLink(link: string, name: string, state: WalkState): void {
  const rel = relative(state.root, link);
  let target: string;
  let stat: Stats;
  try {
    target = realpathSync(link);
    stat = statSync(target);
  } catch (err: unknown) {
    warn(state, "warn", `Cannot resolve symlink ${rel}: ${errorMessage(err)}`, link);
    return;
  }

  if (target !== state.realRoot && !target.startsWith(state.realRoot + sep)) {
    warn(state, "info", `Symlink ${rel} points outside the source root, skipped`, link);
    return;
  }

  if (stat.isDirectory()) {
    if (state.seenDirs.has(stat.ino)) {
      warn(state, "info", `Symlink cycle at ${rel}, skipped`, link);
      return;
    }
    state.seenDirs.add(stat.ino);
    if (!isSkippedDir(name)) walkDir(link, state);
  } else if (stat.isFile() && isSourceFile(name)) {
    state.found.push(link);
  }
}

function warn(state: WalkState, level: Warning["level"], message: string, file: string): void {
  state.warnings.push({ level, module: "file-discovery", message, file });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
