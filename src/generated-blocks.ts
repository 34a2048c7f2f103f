// src/generated-blocks.ts — Machine-owned regions inside human-owned documents
// L0/L1 documents keep their generated link lists between delimiters; everything
// outside the delimiters is preserved across regenerations.

export const CODEMAP_START = "<!-- codemap:start -->";
export const CODEMAP_END = "<!-- codemap:end -->";

/**
 * Wrap generated content in delimiters for first-time generation.
 */
export function wrapWithDelimiters(content: string): string {
  return [CODEMAP_START, content, CODEMAP_END].join("\n");
}

export function hasGeneratedBlock(existingContent: string): boolean {
  const startIdx = existingContent.indexOf(CODEMAP_START);
  const endIdx = existingContent.indexOf(CODEMAP_END);
  return startIdx !== -1 && endIdx > startIdx;
}

/**
 * Merge new generated content into an existing document.
 *
 * With delimiters: the region between them is replaced.
 * Without: the generated block is appended below the existing content.
 */
export function mergeWithExisting(existingContent: string, generated: string): string {
  if (hasGeneratedBlock(existingContent)) {
    const before = existingContent.slice(0, existingContent.indexOf(CODEMAP_START));
    const after = existingContent.slice(existingContent.indexOf(CODEMAP_END) + CODEMAP_END.length);
    return before + wrapWithDelimiters(generated) + after;
  }

  return [existingContent.trimEnd(), "", wrapWithDelimiters(generated), ""].join("\n");
}
