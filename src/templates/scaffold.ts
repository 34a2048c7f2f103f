// Scaffolds for map documents created by the generator.
// L0/L1 bodies are written once; later runs only refresh the generated block.

import type { ParsedMapNode } from "../map-model.js";
import { makePlaceholder } from "../map-model.js";
import { wrapWithDelimiters } from "../generated-blocks.js";
import {
  ARCHITECTURE_ANCHOR,
  ARCHITECTURE_DOC,
  INDEX_ANCHOR,
  domainAnchorFor,
  domainPathFor,
  mapLink,
  moduleAnchorFor,
  modulePathFor,
  withAnchor,
} from "../map-layout.js";

export interface DomainEntry {
  domain: string;
  modules: string[]; // source-relative paths
}

// ─── Generated blocks ────────────────────────────────────────────────────────

export function indexBlock(domains: string[]): string {
  const lines = [`- [Architecture](${ARCHITECTURE_DOC})`];
  for (const domain of domains) {
    lines.push(`- [${domain}](${domainPathFor(domain)})`);
  }
  return lines.join("\n");
}

export function architectureBlock(domains: DomainEntry[]): string {
  if (domains.length === 0) return "_No domains yet._";
  const lines = ["| Domain | Modules |", "|--------|---------|"];
  for (const entry of domains) {
    lines.push(`| [${entry.domain}](${domainPathFor(entry.domain)}) | ${entry.modules.length} |`);
  }
  return lines.join("\n");
}

export function domainBlock(domain: string, modules: string[]): string {
  if (modules.length === 0) return "_No modules._";
  const from = domainPathFor(domain);
  return modules
    .map((sourceRel) => `- [${sourceRel}](${mapLink(from, modulePathFor(sourceRel))})`)
    .join("\n");
}

// ─── New documents ───────────────────────────────────────────────────────────

export function scaffoldIndex(projectName: string, block: string): string {
  return [
    `# ${withAnchor(`${projectName} Code Map`, INDEX_ANCHOR)}`,
    "",
    makePlaceholder("Describe this project"),
    "",
    wrapWithDelimiters(block),
    "",
  ].join("\n");
}

export function scaffoldArchitecture(projectName: string, block: string): string {
  return [
    `# ${withAnchor(`${projectName} Architecture`, ARCHITECTURE_ANCHOR)}`,
    "",
    makePlaceholder("Describe entry points and data flow"),
    "",
    "## Domains",
    "",
    wrapWithDelimiters(block),
    "",
  ].join("\n");
}

export function scaffoldDomain(domain: string, block: string): string {
  return [
    `# ${withAnchor(domain, domainAnchorFor(domain))}`,
    "",
    makePlaceholder(`Describe the ${domain} domain`),
    "",
    "## Modules",
    "",
    wrapWithDelimiters(block),
    "",
  ].join("\n");
}

/**
 * Empty L2 node for a source file seen for the first time.
 */
export function scaffoldModule(sourceRel: string, domain: string): ParsedMapNode {
  const filePath = modulePathFor(sourceRel);
  const fileName = sourceRel.slice(sourceRel.lastIndexOf("/") + 1);
  return {
    level: "L2",
    anchorId: moduleAnchorFor(sourceRel),
    anchors: [],
    filePath,
    lineCount: 0,
    title: withAnchor(fileName, moduleAnchorFor(sourceRel)),
    preamble: [
      makePlaceholder("Describe this module"),
      "",
      `Domain: [${domain}](${mapLink(filePath, domainPathFor(domain))})`,
    ].join("\n"),
    hasSymbolIndex: true,
    sections: [],
    crossRefs: [],
    codeRefs: [],
  };
}
