// src/reconciler.ts — Merge freshly extracted symbols into a node's existing sections
// Keyed by qualified name, never by line: line numbers drift with unrelated edits.

import type { DocSection, SymbolRecord } from "./types.js";
import { isPlaceholder, makePlaceholder } from "./map-model.js";

export interface ReconcileResult {
  /** Live sections in source order, then orphans by identifier. */
  sections: DocSection[];
  /** Sections created (or restored from orphaned) by this pass. */
  added: DocSection[];
  /** Sections that became orphaned in this pass. */
  orphaned: DocSection[];
}

export function placeholderFor(symbol: SymbolRecord): string {
  return makePlaceholder(`Describe ${symbol.qualifiedName}`);
}

/**
 * Section content derived from the symbol alone: Filled from the doc comment
 * when there is one, Placeholder otherwise.
 */
function seededSection(symbol: SymbolRecord): DocSection {
  return symbol.docSummary
    ? { identifier: symbol.qualifiedName, status: "filled", text: symbol.docSummary, line: symbol.startLine }
    : { identifier: symbol.qualifiedName, status: "placeholder", text: placeholderFor(symbol), line: symbol.startLine };
}

/**
 * Reconcile existing sections against the current symbol set. Pure.
 *
 * - no section            → new section (Filled from docSummary, else Placeholder)
 * - Placeholder section   → refreshed from docSummary
 * - Filled section        → text kept, line updated
 * - Orphaned section      → restored, text kept
 * - section without symbol → Orphaned, never dropped
 */
export function reconcileSections(
  existing: readonly DocSection[],
  symbols: readonly SymbolRecord[],
): ReconcileResult {
  const byIdentifier = new Map<string, DocSection>();
  for (const section of existing) {
    if (!byIdentifier.has(section.identifier)) {
      byIdentifier.set(section.identifier, section);
    }
  }

  const live: DocSection[] = [];
  const added: DocSection[] = [];
  const seen = new Set<string>();

  for (const symbol of symbols) {
    if (seen.has(symbol.qualifiedName)) continue;
    seen.add(symbol.qualifiedName);

    const previous = byIdentifier.get(symbol.qualifiedName);
    if (!previous) {
      const created = seededSection(symbol);
      live.push(created);
      added.push(created);
      continue;
    }

    switch (previous.status) {
      case "placeholder":
        live.push(seededSection(symbol));
        break;
      case "filled":
        live.push({ ...previous, line: symbol.startLine });
        break;
      case "orphaned": {
        const restored: DocSection = isPlaceholder(previous.text)
          ? seededSection(symbol)
          : { ...previous, status: "filled", line: symbol.startLine };
        live.push(restored);
        added.push(restored);
        break;
      }
    }
  }

  const orphans: DocSection[] = [];
  const orphaned: DocSection[] = [];
  for (const section of byIdentifier.values()) {
    if (seen.has(section.identifier)) continue;
    if (section.status === "orphaned") {
      orphans.push(section);
    } else {
      const flipped: DocSection = { ...section, status: "orphaned" };
      orphans.push(flipped);
      orphaned.push(flipped);
    }
  }
  orphans.sort((a, b) => a.identifier.localeCompare(b.identifier));

  return { sections: [...live, ...orphans], added, orphaned };
}
