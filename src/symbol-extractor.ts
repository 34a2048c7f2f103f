// src/symbol-extractor.ts — Symbol Extractor
// Parses one TypeScript/JavaScript file into SymbolRecords ordered by line.

import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { relative, extname } from "node:path";
import ts from "typescript";
import type { SymbolRecord, Warning } from "./types.js";
import { FileNotFoundError, ParseError } from "./types.js";

const LARGE_FILE_LINES = 10_000;

/**
 * Extract symbols from a file on disk.
 * Throws ParseError on syntax errors and FileNotFoundError when the file is gone.
 */
export function extractSymbols(
  filePath: string,
  sourceRoot: string,
  warnings: Warning[] = [],
): SymbolRecord[] {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    throw toReadError(filePath, err);
  }
  return extractFromContent(content, filePath, sourceRoot, warnings);
}

/**
 * Async variant used by the worker pool. Same contract as extractSymbols.
 */
export async function extractSymbolsAsync(
  filePath: string,
  sourceRoot: string,
  warnings: Warning[] = [],
): Promise<SymbolRecord[]> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err: unknown) {
    throw toReadError(filePath, err);
  }
  return extractFromContent(content, filePath, sourceRoot, warnings);
}

/**
 * Extract symbols from in-memory source text. The file name only selects the script kind.
 */
export function extractSymbolsFromText(
  content: string,
  fileName: string,
): SymbolRecord[] {
  const diagnostics = syntaxErrors(content, fileName);
  if (diagnostics.length > 0) {
    throw new ParseError(fileName, diagnostics);
  }

  const sourceFile = ts.createSourceFile(
    fileName,
    content,
    ts.ScriptTarget.Latest,
    true,
    scriptKindFor(fileName),
  );

  const symbols: SymbolRecord[] = [];
  for (const stmt of sourceFile.statements) {
    collectStatement(stmt, sourceFile, symbols);
  }

  return symbols.sort(
    (a, b) =>
      a.startLine - b.startLine ||
      a.qualifiedName.localeCompare(b.qualifiedName),
  );
}

function extractFromContent(
  content: string,
  filePath: string,
  sourceRoot: string,
  warnings: Warning[],
): SymbolRecord[] {
  const relPath = relative(sourceRoot, filePath);
  const lineCount = content.split("\n").length;
  if (lineCount > LARGE_FILE_LINES) {
    warnings.push({
      level: "info",
      module: "symbol-extractor",
      message: `File ${relPath} is ${lineCount} lines — extraction may be slow.`,
      file: filePath,
    });
  }
  return extractSymbolsFromText(content, filePath);
}

function toReadError(filePath: string, err: unknown): Error {
  if (err instanceof Error && "code" in err && err.code === "ENOENT") {
    return new FileNotFoundError(filePath, err);
  }
  return err instanceof Error ? err : new Error(String(err));
}

function scriptKindFor(fileName: string): ts.ScriptKind {
  const ext = extname(fileName).toLowerCase();
  if (ext === ".tsx") return ts.ScriptKind.TSX;
  if (ext === ".jsx") return ts.ScriptKind.JSX;
  if (ext === ".js" || ext === ".mjs" || ext === ".cjs") return ts.ScriptKind.JS;
  return ts.ScriptKind.TS;
}

// ─── Syntax Errors ───────────────────────────────────────────────────────────

/**
 * Syntactic diagnostics only; type errors never block extraction.
 */
function syntaxErrors(content: string, fileName: string): string[] {
  const output = ts.transpileModule(content, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: {
      allowJs: true,
      jsx: ts.JsxEmit.Preserve,
      target: ts.ScriptTarget.Latest,
    },
  });

  return (output.diagnostics ?? [])
    .filter((d) => d.category === ts.DiagnosticCategory.Error)
    .map((d) => {
      const message = ts.flattenDiagnosticMessageText(d.messageText, " ");
      if (d.file && d.start !== undefined) {
        const { line, character } = d.file.getLineAndCharacterOfPosition(d.start);
        return `line ${line + 1}:${character + 1} ${message}`;
      }
      return message;
    });
}

// ─── Declarations ────────────────────────────────────────────────────────────

function collectStatement(
  stmt: ts.Statement,
  sourceFile: ts.SourceFile,
  symbols: SymbolRecord[],
): void {
  if (ts.isFunctionDeclaration(stmt)) {
    // Overload signatures have no body; only the implementation is a symbol
    if (!stmt.body) return;
    symbols.push({
      kind: "function",
      qualifiedName: stmt.name?.text ?? "default",
      startLine: lineOf(stmt, sourceFile),
      docSummary: docSummaryOf(stmt),
      signature: formatSignature(stmt, sourceFile),
    });
    return;
  }

  if (ts.isClassDeclaration(stmt)) {
    const className = stmt.name?.text ?? "default";
    symbols.push({
      kind: "class",
      qualifiedName: className,
      startLine: lineOf(stmt, sourceFile),
      docSummary: docSummaryOf(stmt),
    });
    for (const member of stmt.members) {
      collectMember(member, className, sourceFile, symbols);
    }
    return;
  }

  if (ts.isVariableStatement(stmt)) {
    for (const decl of stmt.declarationList.declarations) {
      if (!ts.isIdentifier(decl.name)) continue;
      const func = functionInitializer(decl.initializer);
      if (!func) continue;
      symbols.push({
        kind: "function",
        qualifiedName: decl.name.text,
        startLine: lineOf(stmt, sourceFile),
        docSummary: docSummaryOf(decl),
        signature: formatSignature(func, sourceFile),
      });
    }
  }
}

function collectMember(
  member: ts.ClassElement,
  className: string,
  sourceFile: ts.SourceFile,
  symbols: SymbolRecord[],
): void {
  let func: ts.SignatureDeclaration | undefined;
  if (ts.isMethodDeclaration(member)) {
    if (!member.body) return;
    func = member;
  } else if (ts.isPropertyDeclaration(member)) {
    func = functionInitializer(member.initializer);
  }
  if (!func || !member.name) return;

  const name = propertyNameText(member.name, sourceFile);
  symbols.push({
    kind: "method",
    qualifiedName: `${className}.${name}`,
    ownerClass: className,
    startLine: lineOf(member, sourceFile),
    docSummary: docSummaryOf(member),
    signature: formatSignature(func, sourceFile),
  });
}

function functionInitializer(
  init: ts.Expression | undefined,
): ts.ArrowFunction | ts.FunctionExpression | undefined {
  if (!init) return undefined;
  if (ts.isArrowFunction(init) || ts.isFunctionExpression(init)) return init;
  return undefined;
}

function propertyNameText(name: ts.PropertyName, sourceFile: ts.SourceFile): string {
  if (
    ts.isIdentifier(name) ||
    ts.isPrivateIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name)
  ) {
    return name.text;
  }
  return name.getText(sourceFile);
}

function lineOf(node: ts.Node, sourceFile: ts.SourceFile): number {
  return sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile)).line + 1;
}

function formatSignature(
  decl: ts.SignatureDeclaration,
  sourceFile: ts.SourceFile,
): string {
  const params = decl.parameters
    .map((p) => {
      const name = p.name.getText(sourceFile);
      const rest = p.dotDotDotToken ? "..." : "";
      const optional = p.questionToken || p.initializer ? "?" : "";
      const type = p.type ? p.type.getText(sourceFile) : "unknown";
      return `${rest}${name}${optional}: ${type}`;
    })
    .join(", ");
  const returnType = decl.type ? decl.type.getText(sourceFile) : "unknown";
  return `(${params}) => ${returnType}`;
}

// ─── Doc Comments ────────────────────────────────────────────────────────────

/**
 * First sentence of the first non-empty line of the closest JSDoc block.
 */
function docSummaryOf(node: ts.Node): string {
  const docs = ts.getJSDocCommentsAndTags(node).filter(ts.isJSDoc);
  const closest = docs[docs.length - 1];
  if (!closest) return "";
  const text = ts.getTextOfJSDocComment(closest.comment) ?? "";
  return summarize(text);
}

export function summarize(text: string): string {
  const firstLine = text
    .split("\n")
    .map((l) => l.trim())
    .find((l) => l.length > 0);
  if (!firstLine) return "";
  // a sentence ends before a capitalised word or at end of line, so "e.g. foo" stays whole
  const sentence = /^(.*?[.!?])(?=\s+[A-Z]|\s*$)/.exec(firstLine);
  return sentence ? sentence[1] : firstLine;
}
