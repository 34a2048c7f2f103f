// src/map-model.ts — Map Model: parse map documents into MapNodes and back
//
// Document grammar:
//
//   # core.ts [L2:calc-core]                               title + anchor
//   <preamble — free text, human-owned>
//   ## Symbols
//   ### [`add`](../../src/calc/core.ts#L3)                 live section
//   <section text | <!-- TODO: ... --> placeholder>
//   ## Orphaned
//   ### `old` <!-- codemap:orphaned L9 -->                 orphaned section
//   <section text>

import { existsSync, statSync } from "node:fs";
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join, relative, sep } from "node:path";
import type { Anchor, DocSection, MapGraph, MapLevel, MapNode } from "./types.js";
import { MapIOError } from "./types.js";
import { ANCHOR_PATTERN, levelForPath } from "./map-layout.js";
import { scanLinks } from "./link-scanner.js";

export const SYMBOLS_HEADING = "## Symbols";
export const ORPHANED_HEADING = "## Orphaned";

const PLACEHOLDER_PREFIX = "<!-- TODO: ";
const PLACEHOLDER_SUFFIX = " -->";
// exactly one marker, nothing else: the hint may not close the comment early
const PLACEHOLDER_ONLY = /^<!-- TODO: (?:(?!-->)[^\n])* -->$/;

const LIVE_HEADING = /^###\s+\[`([^`]+)`\]\(([^)#\s]*)#L(\d+)\)\s*$/;
const ORPHAN_HEADING = /^###\s+`([^`]+)`\s+<!--\s*codemap:orphaned\s+L(\d+)\s*-->\s*$/;

// ─── Placeholders ────────────────────────────────────────────────────────────

export function makePlaceholder(hint: string): string {
  return `${PLACEHOLDER_PREFIX}${hint}${PLACEHOLDER_SUFFIX}`;
}

export function isPlaceholder(text: string): boolean {
  return PLACEHOLDER_ONLY.test(text.trim());
}

/** True while the opening paragraph of a preamble is still the scaffolded TODO. */
export function hasPlaceholderDescription(preamble: string): boolean {
  const [first = ""] = preamble.trim().split(/\n\s*\n/);
  return isPlaceholder(first);
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

/** Map node plus the source link its live sections point at. */
export interface ParsedMapNode extends MapNode {
  sourceLink?: string;
}

/**
 * Parse one map document. Pure: no filesystem access.
 */
export function parseMapDocument(text: string, filePath: string): ParsedMapNode {
  const lines = splitLines(text);

  let cursor = 0;
  while (cursor < lines.length && lines[cursor].trim() === "") cursor++;

  let title = "";
  if (cursor < lines.length && lines[cursor].startsWith("# ")) {
    title = lines[cursor].slice(2).trim();
    cursor++;
  }

  const symbolsIdx = lines.findIndex(
    (l, i) => i >= cursor && l.trim() === SYMBOLS_HEADING,
  );
  const hasSymbolIndex = symbolsIdx !== -1;
  const preambleLines = lines.slice(cursor, hasSymbolIndex ? symbolsIdx : lines.length);

  const sections: DocSection[] = [];
  const strayLines: string[] = [];
  let sourceLink: string | undefined;

  if (hasSymbolIndex) {
    let current: { identifier: string; line: number; orphaned: boolean; text: string[] } | undefined;
    const flush = (): void => {
      if (!current) return;
      const sectionText = trimBlankLines(current.text).join("\n");
      sections.push({
        identifier: current.identifier,
        status: current.orphaned
          ? "orphaned"
          : isPlaceholder(sectionText)
            ? "placeholder"
            : "filled",
        text: sectionText,
        line: current.line,
      });
      current = undefined;
    };

    for (const line of lines.slice(symbolsIdx + 1)) {
      const live = LIVE_HEADING.exec(line);
      if (live) {
        flush();
        sourceLink ??= live[2];
        current = {
          identifier: live[1],
          line: Number.parseInt(live[3], 10),
          orphaned: false,
          text: [],
        };
        continue;
      }
      const orphan = ORPHAN_HEADING.exec(line);
      if (orphan) {
        flush();
        current = {
          identifier: orphan[1],
          line: Number.parseInt(orphan[2], 10),
          orphaned: true,
          text: [],
        };
        continue;
      }
      if (line.trim() === ORPHANED_HEADING) {
        flush();
        continue;
      }
      if (current) {
        current.text.push(line);
      } else {
        // Text between "## Symbols" and the first section stays with the preamble
        strayLines.push(line);
      }
    }
    flush();
  }

  const anchors = findAnchors(lines);
  const { crossRefs, codeRefs } = scanLinks(text);

  return {
    level: levelForPath(filePath),
    anchorId: anchors[0]?.id,
    anchors,
    filePath,
    lineCount: countLines(text),
    title,
    preamble: [trimBlankLines(preambleLines), trimBlankLines(strayLines)]
      .filter((block) => block.length > 0)
      .map((block) => block.join("\n"))
      .join("\n\n"),
    hasSymbolIndex,
    sections,
    crossRefs,
    codeRefs,
    sourceLink,
  };
}

function findAnchors(lines: string[]): Anchor[] {
  const anchors: Anchor[] = [];
  let inFence = false;
  for (let i = 0; i < lines.length; i++) {
    const trimmed = lines[i].trim();
    if (trimmed.startsWith("```") || trimmed.startsWith("~~~")) {
      inFence = !inFence;
      continue;
    }
    if (inFence || !trimmed.startsWith("#")) continue;
    for (const match of trimmed.matchAll(ANCHOR_PATTERN)) {
      const level = toLevel(match[1]);
      if (!level) continue;
      anchors.push({ id: `${level}:${match[2]}`, level, line: i + 1 });
    }
  }
  return anchors;
}

function toLevel(value: string): MapLevel | undefined {
  return value === "L0" || value === "L1" || value === "L2" ? value : undefined;
}

function splitLines(text: string): string[] {
  const lines = text.split("\n");
  if (text.endsWith("\n")) lines.pop();
  return lines;
}

function trimBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === "") start++;
  while (end > start && lines[end - 1].trim() === "") end--;
  return lines.slice(start, end);
}

/** Line count ignoring the terminating newline. */
export function countLines(text: string): number {
  return text === "" ? 0 : splitLines(text).length;
}

// ─── Serialization ───────────────────────────────────────────────────────────

export function serializeMapNode(node: ParsedMapNode): string {
  const out: string[] = [];
  if (node.title) out.push(`# ${node.title}`);
  if (node.preamble) {
    if (out.length > 0) out.push("");
    out.push(node.preamble);
  }

  if (node.hasSymbolIndex) {
    if (out.length > 0) out.push("");
    out.push(SYMBOLS_HEADING);

    const sourceLink = node.sourceLink ?? "";
    for (const section of node.sections) {
      if (section.status === "orphaned") continue;
      out.push("", `### [\`${section.identifier}\`](${sourceLink}#L${section.line})`);
      if (section.text) out.push("", section.text);
    }

    const orphans = node.sections.filter((s) => s.status === "orphaned");
    if (orphans.length > 0) {
      out.push("", ORPHANED_HEADING);
      for (const section of orphans) {
        out.push("", `### \`${section.identifier}\` <!-- codemap:orphaned L${section.line} -->`);
        if (section.text) out.push("", section.text);
      }
    }
  }

  return out.join("\n") + "\n";
}

// ─── Filesystem ──────────────────────────────────────────────────────────────

/**
 * Load one document, or undefined if it does not exist.
 */
export async function loadMapNode(
  mapRoot: string,
  mapRel: string,
): Promise<ParsedMapNode | undefined> {
  const fullPath = join(mapRoot, mapRel);
  if (!existsSync(fullPath)) return undefined;
  const text = await readMapFile(fullPath);
  return parseMapDocument(text, mapRel);
}

/**
 * Load every markdown document under the map root into a fresh graph.
 */
export async function loadMap(mapRoot: string): Promise<MapGraph> {
  assertReadableDir(mapRoot);
  const files = await listMarkdown(mapRoot);
  const nodes: MapNode[] = [];
  for (const rel of files) {
    const text = await readMapFile(join(mapRoot, rel));
    nodes.push(parseMapDocument(text, rel));
  }
  return { mapRoot, nodes };
}

/**
 * Markdown files under the map root as sorted POSIX paths relative to it.
 */
export async function listMarkdown(mapRoot: string): Promise<string[]> {
  const results: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    let entries;
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err: unknown) {
      throw new MapIOError(`Cannot read map directory ${dir}`, dir, asError(err));
    }
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (entry.isFile() && entry.name.endsWith(".md")) {
        results.push(relative(mapRoot, full).split(sep).join("/"));
      }
    }
  };
  await walk(mapRoot);
  return results.sort();
}

export async function writeMapFile(mapRoot: string, mapRel: string, content: string): Promise<void> {
  const fullPath = join(mapRoot, mapRel);
  try {
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content);
  } catch (err: unknown) {
    throw new MapIOError(`Cannot write map file ${fullPath}`, fullPath, asError(err));
  }
}

export async function readMapFile(fullPath: string): Promise<string> {
  try {
    return await readFile(fullPath, "utf-8");
  } catch (err: unknown) {
    throw new MapIOError(`Cannot read map file ${fullPath}`, fullPath, asError(err));
  }
}

function assertReadableDir(dir: string): void {
  let isDir = false;
  try {
    isDir = statSync(dir).isDirectory();
  } catch (err: unknown) {
    throw new MapIOError(`Map directory not found: ${dir}`, dir, asError(err));
  }
  if (!isDir) {
    throw new MapIOError(`Not a directory: ${dir}`, dir);
  }
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

