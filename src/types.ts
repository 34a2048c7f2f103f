// src/types.ts — ALL shared types for the code map engine

// ─── Warnings (passed to all modules) ────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Symbols ─────────────────────────────────────────────────────────────────

export type SymbolKind = "function" | "class" | "method";

export interface SymbolRecord {
  kind: SymbolKind;
  qualifiedName: string; // "add", "Calculator", "Calculator.add"
  ownerClass?: string; // only set for methods
  startLine: number; // 1-based
  docSummary: string; // "" when the symbol has no doc comment
  signature?: string; // "(a: number, b: number) => number"
}

// ─── Map model ───────────────────────────────────────────────────────────────

export type MapLevel = "L0" | "L1" | "L2";

export type SectionStatus = "filled" | "placeholder" | "orphaned";

export interface DocSection {
  identifier: string; // matches SymbolRecord.qualifiedName
  status: SectionStatus;
  text: string;
  line: number; // source line from the code link (last known line for orphans)
}

export interface Anchor {
  id: string; // "L1:billing"
  level: MapLevel;
  line: number; // line in the map document
}

export interface CrossRef {
  target: string; // as written, fragment included
  text: string;
  line: number;
}

export interface CodeRef {
  target: string; // path part of the link, relative to the document
  sourceLine: number;
  symbolName?: string; // undefined for plain line links such as [Source](x.ts#L4)
  text: string;
  line: number;
}

export interface MapNode {
  level: MapLevel;
  anchorId?: string;
  anchors: Anchor[];
  filePath: string; // POSIX path relative to the map root
  lineCount: number;
  title: string; // heading text after "# ", anchor included as written
  preamble: string;
  hasSymbolIndex: boolean;
  sections: DocSection[];
  crossRefs: CrossRef[];
  codeRefs: CodeRef[];
}

export interface MapGraph {
  mapRoot: string;
  nodes: MapNode[];
}

// ─── Generation report ───────────────────────────────────────────────────────

export interface CappedList<T> {
  total: number;
  items: T[];
}

export interface SectionRef {
  document: string; // map-relative path of the L2 node
  identifier: string;
  source: string; // source-relative path
  line: number;
}

export interface ParseFailure {
  file: string; // source-relative path
  message: string;
}

export interface GenerationReport {
  sourceRoot: string;
  mapRoot: string;
  dryRun: boolean;
  createdFiles: CappedList<string>;
  updatedFiles: CappedList<string>;
  newSections: CappedList<SectionRef>;
  removedSections: CappedList<SectionRef>;
  unfilledPlaceholders: CappedList<SectionRef>;
  orphanedDocuments: CappedList<string>;
  missingDescriptions: CappedList<string>; // documents whose preamble is still a TODO
  parseErrors: CappedList<ParseFailure>;
  warnings: Warning[];
}

// ─── Validation report ───────────────────────────────────────────────────────

export type CheckClass = "structure" | "file-link" | "code-link" | "size" | "anchor";

export const CHECK_CLASSES: readonly CheckClass[] = [
  "structure",
  "file-link",
  "code-link",
  "size",
  "anchor",
];

export interface ValidationFinding {
  checkClass: CheckClass;
  document: string; // map-relative path
  line: number; // 0 when the finding is about the whole document
  message: string;
  target?: string;
  locations?: string[]; // duplicate anchors: "domains/a.md:1"
  overage?: number; // size findings
}

export interface ValidationReport {
  mapRoot: string;
  ok: boolean;
  findings: ValidationFinding[];
  counts: Record<CheckClass, number>;
  checked: {
    documents: number;
    crossRefs: number;
    codeRefs: number;
  };
  warnings: Warning[];
}

// ─── Config ──────────────────────────────────────────────────────────────────

export type SizeLimits = Record<MapLevel, number>;

export interface ResolvedConfig {
  exclude: string[];
  tolerance: number;
  reportLimit: number;
  sizeLimits: SizeLimits;
  concurrency: number;
  projectName?: string;
  dryRun: boolean;
  verbose: boolean;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class FileNotFoundError extends Error {
  constructor(
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(`File not found: ${filePath}`);
    this.name = "FileNotFoundError";
    if (cause) this.cause = cause;
  }
}

/** One source file could not be parsed. Recorded, never fatal. */
export class ParseError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly diagnostics: string[],
  ) {
    super(
      diagnostics.length > 1
        ? `${filePath}: ${diagnostics[0]} (and ${diagnostics.length - 1} more syntax errors)`
        : `${filePath}: ${diagnostics[0] ?? "syntax error"}`,
    );
    this.name = "ParseError";
  }
}

/** The source or map root cannot be read or written. Aborts the run. */
export class MapIOError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    cause?: Error,
  ) {
    super(message);
    this.name = "MapIOError";
    if (cause) this.cause = cause;
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const ENGINE_VERSION = "0.3.0";

export const DEFAULT_TOLERANCE = 5;
export const DEFAULT_REPORT_LIMIT = 10;

export const DEFAULT_SIZE_LIMITS: SizeLimits = {
  L0: 500,
  L1: 300,
  L2: 200,
};

export const DEFAULT_EXCLUDE_DIRS = [
  "node_modules",
  "dist",
  "build",
  "out",
  "coverage",
  "__mocks__",
  ".git",
] as const;

export const SOURCE_EXTENSIONS = /\.(ts|tsx|js|jsx|mts|cts|mjs|cjs)$/;
export const DTS_EXTENSION = /\.d\.(ts|tsx|mts|cts)$/;
