// src/generator.ts — Generator: source tree + existing map → updated map + report
// Per-file failures are recorded in the report; only root-level I/O failures throw.

import { existsSync, statSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import type {
  CappedList,
  GenerationReport,
  ParseFailure,
  ResolvedConfig,
  SectionRef,
  SymbolRecord,
  Warning,
} from "./types.js";
import { DEFAULT_REPORT_LIMIT, FileNotFoundError, MapIOError, ParseError } from "./types.js";
import { discoverFiles, toPosixRelative } from "./file-discovery.js";
import { extractSymbolsAsync } from "./symbol-extractor.js";
import { defaultConcurrency, mapBounded } from "./concurrency.js";
import { reconcileSections } from "./reconciler.js";
import {
  type ParsedMapNode,
  hasPlaceholderDescription,
  listMarkdown,
  parseMapDocument,
  loadMapNode,
  readMapFile,
  serializeMapNode,
  writeMapFile,
} from "./map-model.js";
import {
  ARCHITECTURE_DOC,
  DOMAINS_DIR,
  INDEX_DOC,
  MODULES_DIR,
  domainFor,
  domainPathFor,
  linkBetween,
  modulePathFor,
} from "./map-layout.js";
import { mergeWithExisting } from "./generated-blocks.js";
import {
  type DomainEntry,
  architectureBlock,
  domainBlock,
  indexBlock,
  scaffoldArchitecture,
  scaffoldDomain,
  scaffoldIndex,
  scaffoldModule,
} from "./templates/scaffold.js";

export type GenerateOptions = Partial<
  Pick<ResolvedConfig, "exclude" | "reportLimit" | "concurrency" | "projectName" | "dryRun" | "verbose">
>;

type Extraction =
  | { sourceRel: string; symbols: SymbolRecord[] }
  | { sourceRel: string; failure: ParseFailure };

/** Verbose logger — writes to stderr only when verbose is enabled. */
function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

/**
 * Generate or update the map for a source tree.
 */
export async function generate(
  sourceRoot: string,
  mapRoot: string,
  options: GenerateOptions = {},
): Promise<GenerationReport> {
  const absSource = resolve(sourceRoot);
  const absMap = resolve(mapRoot);
  const dryRun = options.dryRun ?? false;
  const verbose = options.verbose ?? false;
  const limit = options.reportLimit ?? DEFAULT_REPORT_LIMIT;
  const warnings: Warning[] = [];

  assertSourceRoot(absSource);

  const files = discoverFiles(absSource, options.exclude ?? [], warnings);
  vlog(verbose, `Discovered ${files.length} source files under ${absSource}`);

  const extractions = await mapBounded(
    files,
    options.concurrency ?? defaultConcurrency(),
    (file) => extractOne(file, absSource, warnings),
  );
  extractions.sort((a, b) => a.sourceRel.localeCompare(b.sourceRel));

  if (!dryRun) {
    try {
      await mkdir(join(absMap, DOMAINS_DIR), { recursive: true });
    } catch (err: unknown) {
      throw new MapIOError(
        `Cannot create map directory ${absMap}`,
        absMap,
        err instanceof Error ? err : undefined,
      );
    }
  }
  const existingDocs = existsSync(absMap) ? await listMarkdown(absMap) : [];

  const created: string[] = [];
  const updated: string[] = [];
  const newSections: SectionRef[] = [];
  const removedSections: SectionRef[] = [];
  const placeholders: SectionRef[] = [];
  const parseErrors: ParseFailure[] = [];
  const missingDescriptions: string[] = [];

  const writeIfChanged = async (mapRel: string, content: string): Promise<void> => {
    if (hasPlaceholderDescription(parseMapDocument(content, mapRel).preamble)) {
      missingDescriptions.push(mapRel);
    }
    const fullPath = join(absMap, mapRel);
    const exists = existsSync(fullPath);
    if (exists && (await readMapFile(fullPath)) === content) return;
    (exists ? updated : created).push(mapRel);
    if (!dryRun) await writeMapFile(absMap, mapRel, content);
  };

  // ─── L2: one node per source file ──────────────────────────────────────────

  const sourceRootName = basename(absSource);
  const modulesByDomain = new Map<string, string[]>();
  const liveModuleDocs = new Set<string>();

  for (const extraction of extractions) {
    const { sourceRel } = extraction;
    const mapRel = modulePathFor(sourceRel);
    const domain = domainFor(sourceRel, sourceRootName);
    liveModuleDocs.add(mapRel);

    const existing = await loadMapNode(absMap, mapRel);

    if ("failure" in extraction) {
      // Leave the previous node untouched
      parseErrors.push(extraction.failure);
      if (existing) {
        addModule(modulesByDomain, domain, sourceRel);
        if (hasPlaceholderDescription(existing.preamble)) missingDescriptions.push(mapRel);
      }
      continue;
    }

    const { symbols } = extraction;
    if (symbols.length === 0 && !existing) continue;
    addModule(modulesByDomain, domain, sourceRel);

    const base = existing ?? scaffoldModule(sourceRel, domain);
    const result = reconcileSections(base.sections, symbols);
    const node: ParsedMapNode = {
      ...base,
      hasSymbolIndex: true,
      sections: result.sections,
      sourceLink: linkBetween(join(absMap, mapRel), join(absSource, sourceRel)),
    };

    await writeIfChanged(mapRel, serializeMapNode(node));

    const ref = (identifier: string, line: number): SectionRef => ({
      document: mapRel,
      identifier,
      source: sourceRel,
      line,
    });
    for (const s of result.added) newSections.push(ref(s.identifier, s.line));
    for (const s of result.orphaned) removedSections.push(ref(s.identifier, s.line));
    for (const s of node.sections) {
      if (s.status === "placeholder") placeholders.push(ref(s.identifier, s.line));
    }
  }

  const orphanedDocuments = existingDocs.filter(
    (doc) => doc.startsWith(`${MODULES_DIR}/`) && !liveModuleDocs.has(doc),
  );
  if (orphanedDocuments.length > 0) {
    vlog(verbose, `${orphanedDocuments.length} module documents have no source file`);
  }

  // ─── L1: one domain per top-level source directory ─────────────────────────

  const domains: DomainEntry[] = [...modulesByDomain.entries()]
    .map(([domain, modules]) => ({ domain, modules: modules.sort() }))
    .sort((a, b) => a.domain.localeCompare(b.domain));

  for (const entry of domains) {
    const mapRel = domainPathFor(entry.domain);
    const block = domainBlock(entry.domain, entry.modules);
    await writeIfChanged(mapRel, await mergeOrScaffold(absMap, mapRel, block, () =>
      scaffoldDomain(entry.domain, block),
    ));
  }

  // Hand-written domain documents are linked from L0 as well
  const knownDomains = new Set(domains.map((d) => d.domain));
  for (const doc of existingDocs) {
    const match = new RegExp(`^${DOMAINS_DIR}/([^/]+)\\.md$`).exec(doc);
    if (match && !knownDomains.has(match[1])) {
      knownDomains.add(match[1]);
      domains.push({ domain: match[1], modules: [] });
    }
  }
  domains.sort((a, b) => a.domain.localeCompare(b.domain));

  // ─── L0: index and architecture ────────────────────────────────────────────

  const projectName = options.projectName ?? sourceRootName;
  const archBlock = architectureBlock(domains);
  await writeIfChanged(
    ARCHITECTURE_DOC,
    await mergeOrScaffold(absMap, ARCHITECTURE_DOC, archBlock, () =>
      scaffoldArchitecture(projectName, archBlock),
    ),
  );
  const idxBlock = indexBlock(domains.map((d) => d.domain));
  await writeIfChanged(
    INDEX_DOC,
    await mergeOrScaffold(absMap, INDEX_DOC, idxBlock, () => scaffoldIndex(projectName, idxBlock)),
  );

  vlog(
    verbose,
    `Created ${created.length}, updated ${updated.length}, ${parseErrors.length} parse errors`,
  );

  return {
    sourceRoot: absSource,
    mapRoot: absMap,
    dryRun,
    createdFiles: capList(created.sort(), limit),
    updatedFiles: capList(updated.sort(), limit),
    newSections: capList(newSections, limit),
    removedSections: capList(removedSections, limit),
    unfilledPlaceholders: capList(placeholders, limit),
    orphanedDocuments: capList(orphanedDocuments, limit),
    missingDescriptions: capList(missingDescriptions.sort(), limit),
    parseErrors: capList(parseErrors, limit),
    warnings,
  };
}

/**
 * Keep the first `limit` items and the true total.
 */
export function capList<T>(items: T[], limit: number): CappedList<T> {
  return { total: items.length, items: items.slice(0, Math.max(0, limit)) };
}

async function extractOne(
  file: string,
  sourceRoot: string,
  warnings: Warning[],
): Promise<Extraction> {
  const sourceRel = toPosixRelative(sourceRoot, file);
  try {
    return { sourceRel, symbols: await extractSymbolsAsync(file, sourceRoot, warnings) };
  } catch (err: unknown) {
    if (err instanceof ParseError) {
      warnings.push({
        level: "warn",
        module: "symbol-extractor",
        message: `Skipped ${sourceRel}: ${err.diagnostics[0] ?? "syntax error"}`,
        file,
      });
      return { sourceRel, failure: { file: sourceRel, message: describeSyntaxErrors(err) } };
    }
    const msg = err instanceof FileNotFoundError
      ? `File disappeared during extraction`
      : err instanceof Error ? err.message : String(err);
    warnings.push({ level: "error", module: "symbol-extractor", message: msg, file });
    return { sourceRel, failure: { file: sourceRel, message: msg } };
  }
}

function describeSyntaxErrors(err: ParseError): string {
  const [first, ...rest] = err.diagnostics;
  if (first === undefined) return "syntax error";
  return rest.length > 0 ? `${first} (and ${rest.length} more syntax errors)` : first;
}

async function mergeOrScaffold(
  mapRoot: string,
  mapRel: string,
  block: string,
  scaffold: () => string,
): Promise<string> {
  const fullPath = join(mapRoot, mapRel);
  if (!existsSync(fullPath)) return scaffold();
  return mergeWithExisting(await readMapFile(fullPath), block);
}

function addModule(byDomain: Map<string, string[]>, domain: string, sourceRel: string): void {
  const modules = byDomain.get(domain);
  if (modules) {
    modules.push(sourceRel);
  } else {
    byDomain.set(domain, [sourceRel]);
  }
}

function assertSourceRoot(sourceRoot: string): void {
  let isDir = false;
  try {
    isDir = statSync(sourceRoot).isDirectory();
  } catch (err: unknown) {
    throw new MapIOError(
      `Source directory not found: ${sourceRoot}`,
      sourceRoot,
      err instanceof Error ? err : undefined,
    );
  }
  if (!isDir) throw new MapIOError(`Not a directory: ${sourceRoot}`, sourceRoot);
}
