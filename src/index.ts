// src/index.ts — Library API
// Two entry points: generate() and validate()

export { generate, capList } from "./generator.js";
export type { GenerateOptions } from "./generator.js";
export { validate } from "./validator.js";
export type { ValidateOptions } from "./validator.js";

export {
  extractSymbols,
  extractSymbolsAsync,
  extractSymbolsFromText,
} from "./symbol-extractor.js";
export {
  parseMapDocument,
  serializeMapNode,
  loadMap,
  loadMapNode,
  isPlaceholder,
  makePlaceholder,
} from "./map-model.js";
export type { ParsedMapNode } from "./map-model.js";
export { reconcileSections } from "./reconciler.js";
export type { ReconcileResult } from "./reconciler.js";
export { scanLinks } from "./link-scanner.js";
export { wrapWithDelimiters, mergeWithExisting } from "./generated-blocks.js";
export {
  formatGenerationReport,
  formatValidationReport,
  formatJson,
} from "./report-formatter.js";
export { resolveConfig, parseCliArgs, defaultConfig } from "./config.js";

// Re-export all public types
export type {
  Warning,
  SymbolKind,
  SymbolRecord,
  MapLevel,
  SectionStatus,
  DocSection,
  Anchor,
  CrossRef,
  CodeRef,
  MapNode,
  MapGraph,
  CappedList,
  SectionRef,
  ParseFailure,
  GenerationReport,
  CheckClass,
  ValidationFinding,
  ValidationReport,
  SizeLimits,
  ResolvedConfig,
} from "./types.js";

export {
  FileNotFoundError,
  ParseError,
  MapIOError,
  ENGINE_VERSION,
  CHECK_CLASSES,
  DEFAULT_SIZE_LIMITS,
  DEFAULT_TOLERANCE,
} from "./types.js";
