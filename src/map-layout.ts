// src/map-layout.ts — On-disk layout of the map and the source → document mapping
//
//   README.md             L0:index         root index
//   ARCHITECTURE.md       L0:architecture  architecture overview
//   domains/{id}.md       L1:{id}          one per top-level source directory
//   modules/{path}.md     L2:{path-slug}   one per source file, mirrors the tree;
//                                          the extension stays (foo.ts → foo.ts.md)

import { dirname, relative, sep, posix } from "node:path";
import type { MapLevel } from "./types.js";

export const INDEX_DOC = "README.md";
export const ARCHITECTURE_DOC = "ARCHITECTURE.md";
export const DOMAINS_DIR = "domains";
export const MODULES_DIR = "modules";

export const INDEX_ANCHOR = "L0:index";
export const ARCHITECTURE_ANCHOR = "L0:architecture";

// [L1:billing-core] — identifier is lowercase alphanumerics joined by single hyphens
export const ANCHOR_PATTERN = /\[(L[0-2]):([a-z0-9]+(?:-[a-z0-9]+)*)\]/g;

export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "root";
}

/** src-relative `calc/core.ts` → map-relative `modules/calc/core.ts.md` */
export function modulePathFor(sourceRel: string): string {
  return `${MODULES_DIR}/${sourceRel}.md`;
}

export function moduleAnchorFor(sourceRel: string): string {
  return `L2:${slugify(sourceRel)}`;
}

/**
 * Domain of a source file: its first directory, or the source root's own
 * name for files directly under the root.
 */
export function domainFor(sourceRel: string, sourceRootName: string): string {
  const slash = sourceRel.indexOf("/");
  return slash === -1 ? slugify(sourceRootName) : slugify(sourceRel.slice(0, slash));
}

export function domainPathFor(domain: string): string {
  return `${DOMAINS_DIR}/${domain}.md`;
}

export function domainAnchorFor(domain: string): string {
  return `L1:${domain}`;
}

/** Level of a document from its place in the layout. */
export function levelForPath(mapRel: string): MapLevel {
  if (mapRel.startsWith(`${MODULES_DIR}/`)) return "L2";
  if (mapRel.startsWith(`${DOMAINS_DIR}/`)) return "L1";
  return "L0";
}

export function withAnchor(title: string, anchorId: string): string {
  return `${title} [${anchorId}]`;
}

/** Link target between two map-relative documents. */
export function mapLink(fromRel: string, toRel: string): string {
  return posix.relative(posix.dirname(fromRel), toRel);
}

/** Markdown link target from one file to another, both absolute. */
export function linkBetween(fromFile: string, toFile: string): string {
  return relative(dirname(fromFile), toFile).split(sep).join("/");
}
