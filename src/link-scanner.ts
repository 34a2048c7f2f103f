// src/link-scanner.ts — Finds cross-references and code references in map markdown
//
//   [Billing](../domains/billing.md)      cross-reference (another map document)
//   [`Cart.total`](../../src/cart.ts#L42) code reference (symbol at a line)
//   [Source](../../src/cart.ts#L42)       line link (no symbol, bounds only)

import type { CodeRef, CrossRef } from "./types.js";

// link text: code spans (which may hold brackets, as in `C.[Symbol.iterator]`),
// balanced [..] pairs, or any other character but "]"
const LINK_PATTERN = /\[((?:`[^`\n]*`|\[[^\]\n]*\]|[^\]\n])+)\]\(([^)\s]+)\)/g;
const LINE_FRAGMENT = /^L(\d+)$/;
const SYMBOL_TEXT = /^`([^`]+)`$/;
const EXTERNAL_TARGET = /^[a-z][a-z0-9+.-]*:/i;

export interface ScannedLinks {
  crossRefs: CrossRef[];
  codeRefs: CodeRef[];
}

/**
 * Scan document text for links. Fenced code blocks and inline code spans are skipped.
 */
export function scanLinks(text: string): ScannedLinks {
  const crossRefs: CrossRef[] = [];
  const codeRefs: CodeRef[] = [];
  let inFence = false;

  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const trimmed = line.trim();
    if (trimmed.startsWith("```") || trimmed.startsWith("~~~")) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;

    for (const match of line.matchAll(LINK_PATTERN)) {
      const start = match.index ?? 0;
      if (isInCodeSpan(line, start)) continue;

      const linkText = match[1];
      const target = match[2];
      if (EXTERNAL_TARGET.test(target) || target.startsWith("#")) continue;

      const hashIdx = target.indexOf("#");
      const path = hashIdx === -1 ? target : target.slice(0, hashIdx);
      const fragment = hashIdx === -1 ? "" : target.slice(hashIdx + 1);
      const lineMatch = LINE_FRAGMENT.exec(fragment);

      if (lineMatch) {
        const symbol = SYMBOL_TEXT.exec(linkText);
        codeRefs.push({
          target: path,
          sourceLine: Number.parseInt(lineMatch[1], 10),
          symbolName: symbol ? symbol[1] : undefined,
          text: linkText,
          line: i + 1,
        });
      } else {
        crossRefs.push({ target, text: linkText, line: i + 1 });
      }
    }
  }

  return { crossRefs, codeRefs };
}

/**
 * True when `index` sits inside an inline code span (odd number of backticks before it).
 */
export function isInCodeSpan(line: string, index: number): boolean {
  const prefix = line.slice(0, index);
  if ((prefix.match(/``/g) ?? []).length % 2 === 1) return true;
  const singles = prefix.replace(/``/g, "");
  return (singles.match(/`/g) ?? []).length % 2 === 1;
}

/** Path part of a link target, fragment dropped. */
export function stripFragment(target: string): string {
  const hashIdx = target.indexOf("#");
  return hashIdx === -1 ? target : target.slice(0, hashIdx);
}
