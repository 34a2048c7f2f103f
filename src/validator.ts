// src/validator.ts — Validator: read-only integrity checks over a map directory
//
// Check classes run independently and always all run:
//   structure  — required root documents exist
//   file-link  — cross-references resolve to existing files
//   code-link  — code references resolve to a symbol near the stated line
//   size       — per-level line ceilings
//   anchor     — unique ids, level agreement, L0 → L1 → L2 reachability

import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join, posix, resolve } from "node:path";
import type {
  CheckClass,
  CodeRef,
  MapGraph,
  MapNode,
  ResolvedConfig,
  SymbolRecord,
  ValidationFinding,
  ValidationReport,
  Warning,
} from "./types.js";
import {
  CHECK_CLASSES,
  DEFAULT_SIZE_LIMITS,
  DEFAULT_TOLERANCE,
  ParseError,
  SOURCE_EXTENSIONS,
} from "./types.js";
import { countLines, loadMap } from "./map-model.js";
import { stripFragment } from "./link-scanner.js";
import { ARCHITECTURE_DOC, DOMAINS_DIR, INDEX_DOC } from "./map-layout.js";
import { extractSymbolsFromText } from "./symbol-extractor.js";
import { defaultConcurrency, mapBounded } from "./concurrency.js";

export type ValidateOptions = Partial<
  Pick<ResolvedConfig, "tolerance" | "sizeLimits" | "concurrency" | "verbose">
>;

/** Symbol table of one code-link target, or why it has none. */
type SymbolTable =
  | { kind: "symbols"; symbols: SymbolRecord[]; lineCount: number }
  | { kind: "lines"; lineCount: number }
  | { kind: "unparsable"; message: string }
  | { kind: "missing" };

/**
 * Validate every document under `mapRoot`. Throws MapIOError when the root
 * itself is missing or unreadable; every other problem becomes a finding.
 */
export async function validate(
  mapRoot: string,
  options: ValidateOptions = {},
): Promise<ValidationReport> {
  const absMap = resolve(mapRoot);
  const warnings: Warning[] = [];
  const graph = await loadMap(absMap);

  if (options.verbose) {
    process.stderr.write(`[INFO] Loaded ${graph.nodes.length} map documents from ${absMap}\n`);
  }

  const codeTables = await loadCodeTargets(
    graph,
    options.concurrency ?? defaultConcurrency(),
    warnings,
  );

  const findings = [
    ...checkStructure(graph),
    ...checkFileLinks(graph),
    ...checkCodeLinks(graph, codeTables, options.tolerance ?? DEFAULT_TOLERANCE),
    ...checkSizes(graph, { ...DEFAULT_SIZE_LIMITS, ...options.sizeLimits }),
    ...checkAnchors(graph),
  ].sort(compareFindings);

  const counts: Record<CheckClass, number> = {
    structure: 0,
    "file-link": 0,
    "code-link": 0,
    size: 0,
    anchor: 0,
  };
  for (const finding of findings) counts[finding.checkClass]++;

  return {
    mapRoot: absMap,
    ok: findings.length === 0,
    findings,
    counts,
    checked: {
      documents: graph.nodes.length,
      crossRefs: graph.nodes.reduce((n, node) => n + node.crossRefs.length, 0),
      codeRefs: graph.nodes.reduce((n, node) => n + node.codeRefs.length, 0),
    },
    warnings,
  };
}

const CLASS_ORDER = new Map(CHECK_CLASSES.map((c, i) => [c, i]));

function compareFindings(a: ValidationFinding, b: ValidationFinding): number {
  return (
    (CLASS_ORDER.get(a.checkClass) ?? 0) - (CLASS_ORDER.get(b.checkClass) ?? 0) ||
    a.document.localeCompare(b.document) ||
    a.line - b.line ||
    a.message.localeCompare(b.message)
  );
}

/** Map-relative path a link in `fromDoc` points at. */
function resolveMapPath(fromDoc: string, target: string): string {
  return posix.normalize(posix.join(posix.dirname(fromDoc), stripFragment(target)));
}

// ─── Structure ───────────────────────────────────────────────────────────────

function checkStructure(graph: MapGraph): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  const docs = new Set(graph.nodes.map((n) => n.filePath));

  for (const required of [INDEX_DOC, ARCHITECTURE_DOC]) {
    if (!docs.has(required)) {
      findings.push({
        checkClass: "structure",
        document: required,
        line: 0,
        message: `Required document ${required} is missing`,
      });
    }
  }

  const domainsDir = join(graph.mapRoot, DOMAINS_DIR);
  if (!existsSync(domainsDir) || !statSync(domainsDir).isDirectory()) {
    findings.push({
      checkClass: "structure",
      document: `${DOMAINS_DIR}/`,
      line: 0,
      message: `Required directory ${DOMAINS_DIR}/ is missing`,
    });
  }
  return findings;
}

// ─── File links ──────────────────────────────────────────────────────────────

function checkFileLinks(graph: MapGraph): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  for (const node of graph.nodes) {
    const reported = new Set<string>();
    for (const ref of node.crossRefs) {
      if (reported.has(ref.target)) continue;
      const fullPath = join(graph.mapRoot, dirname(node.filePath), stripFragment(ref.target));
      if (existsSync(fullPath)) continue;
      reported.add(ref.target);
      findings.push({
        checkClass: "file-link",
        document: node.filePath,
        line: ref.line,
        message: `Broken link to ${ref.target}`,
        target: ref.target,
      });
    }
  }
  return findings;
}

// ─── Code links ──────────────────────────────────────────────────────────────

function codeTargetPath(mapRoot: string, node: MapNode, ref: CodeRef): string {
  return resolve(mapRoot, dirname(node.filePath), ref.target);
}

/**
 * Extract each distinct code-link target once, through the worker pool.
 */
async function loadCodeTargets(
  graph: MapGraph,
  concurrency: number,
  warnings: Warning[],
): Promise<Map<string, SymbolTable>> {
  const targets = new Set<string>();
  for (const node of graph.nodes) {
    for (const ref of node.codeRefs) targets.add(codeTargetPath(graph.mapRoot, node, ref));
  }
  const paths = [...targets].sort();
  const tables = await mapBounded(paths, concurrency, (path) => loadCodeTarget(path, warnings));
  return new Map(paths.map((path, i) => [path, tables[i]]));
}

async function loadCodeTarget(path: string, warnings: Warning[]): Promise<SymbolTable> {
  if (!existsSync(path) || !statSync(path).isFile()) return { kind: "missing" };

  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    warnings.push({ level: "warn", module: "validator", message, file: path });
    return { kind: "unparsable", message };
  }

  // Non-source targets only get bounds checks
  if (!SOURCE_EXTENSIONS.test(path)) return { kind: "lines", lineCount: countLines(text) };

  try {
    return { kind: "symbols", symbols: extractSymbolsFromText(text, path), lineCount: countLines(text) };
  } catch (err: unknown) {
    if (err instanceof ParseError) return { kind: "unparsable", message: err.diagnostics[0] ?? err.message };
    throw err;
  }
}

function checkCodeLinks(
  graph: MapGraph,
  tables: Map<string, SymbolTable>,
  tolerance: number,
): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  for (const node of graph.nodes) {
    for (const ref of node.codeRefs) {
      const table = tables.get(codeTargetPath(graph.mapRoot, node, ref));
      const finding = checkCodeRef(node, ref, table ?? { kind: "missing" }, tolerance);
      if (finding) findings.push(finding);
    }
  }
  return findings;
}

function checkCodeRef(
  node: MapNode,
  ref: CodeRef,
  table: SymbolTable,
  tolerance: number,
): ValidationFinding | undefined {
  const at = `${ref.target}#L${ref.sourceLine}`;
  const finding = (message: string): ValidationFinding => ({
    checkClass: "code-link",
    document: node.filePath,
    line: ref.line,
    message,
    target: at,
  });

  if (table.kind === "missing") return finding(`Source file not found: ${ref.target}`);

  if (ref.symbolName === undefined || table.kind === "lines") {
    if (table.kind === "unparsable") return finding(`Cannot parse ${ref.target}: ${table.message}`);
    if (ref.sourceLine < 1 || ref.sourceLine > table.lineCount) {
      return finding(`Line ${ref.sourceLine} is outside ${ref.target} (${table.lineCount} lines)`);
    }
    return undefined;
  }

  if (table.kind === "unparsable") return finding(`Cannot parse ${ref.target}: ${table.message}`);

  const name = ref.symbolName;
  const candidates = table.symbols.filter(
    (s) => s.qualifiedName === name || simpleName(s.qualifiedName) === name,
  );
  if (candidates.length === 0) {
    return finding(`Symbol \`${name}\` not found in ${ref.target}`);
  }
  const nearest = Math.min(...candidates.map((s) => Math.abs(s.startLine - ref.sourceLine)));
  if (nearest <= tolerance) return undefined;

  const actual = candidates
    .map((s) => s.startLine)
    .sort((a, b) => Math.abs(a - ref.sourceLine) - Math.abs(b - ref.sourceLine))[0];
  return finding(
    `Symbol \`${name}\` drifted: linked at line ${ref.sourceLine}, found at line ${actual}`,
  );
}

function simpleName(qualifiedName: string): string {
  return qualifiedName.slice(qualifiedName.lastIndexOf(".") + 1);
}

// ─── Sizes ───────────────────────────────────────────────────────────────────

function checkSizes(graph: MapGraph, limits: Record<MapNode["level"], number>): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  for (const node of graph.nodes) {
    const limit = limits[node.level];
    if (node.lineCount <= limit) continue;
    const overage = node.lineCount - limit;
    findings.push({
      checkClass: "size",
      document: node.filePath,
      line: 0,
      message: `${node.level} document has ${node.lineCount} lines, ${overage} over the ${limit}-line limit`,
      overage,
    });
  }
  return findings;
}

// ─── Anchors ─────────────────────────────────────────────────────────────────

function checkAnchors(graph: MapGraph): ValidationFinding[] {
  const findings: ValidationFinding[] = [];

  // Duplicates: one finding per id, at its first location
  const locations = new Map<string, { document: string; line: number }[]>();
  for (const node of graph.nodes) {
    for (const anchor of node.anchors) {
      const list = locations.get(anchor.id) ?? [];
      list.push({ document: node.filePath, line: anchor.line });
      locations.set(anchor.id, list);
    }
  }
  for (const [id, list] of locations) {
    if (list.length < 2) continue;
    findings.push({
      checkClass: "anchor",
      document: list[0].document,
      line: list[0].line,
      message: `Duplicate anchor ${id} (${list.length} occurrences)`,
      target: id,
      locations: list.map((l) => `${l.document}:${l.line}`),
    });
  }

  for (const node of graph.nodes) {
    for (const anchor of node.anchors) {
      if (anchor.level === node.level) continue;
      findings.push({
        checkClass: "anchor",
        document: node.filePath,
        line: anchor.line,
        message: `Anchor ${anchor.id} is ${anchor.level} but the document is ${node.level}`,
        target: anchor.id,
      });
    }
  }

  // Reachability: L0 → L1 → L2
  const linkedFrom = new Map<string, Set<string>>();
  for (const node of graph.nodes) {
    for (const ref of node.crossRefs) {
      const targetDoc = resolveMapPath(node.filePath, ref.target);
      const levels = linkedFrom.get(targetDoc) ?? new Set<string>();
      levels.add(node.level);
      linkedFrom.set(targetDoc, levels);
    }
  }
  for (const node of graph.nodes) {
    const parent = node.level === "L1" ? "L0" : node.level === "L2" ? "L1" : undefined;
    if (!parent || linkedFrom.get(node.filePath)?.has(parent)) continue;
    findings.push({
      checkClass: "anchor",
      document: node.filePath,
      line: 0,
      message: `Orphan ${node.level} document: not linked from any ${parent} document`,
    });
  }

  return findings;
}
