import { describe, it, expect } from "vitest";
import { resolve } from "node:path";
import {
  extractSymbols,
  extractSymbolsAsync,
  extractSymbolsFromText,
  summarize,
} from "../src/symbol-extractor.js";
import { FileNotFoundError, ParseError } from "../src/types.js";
import type { Warning } from "../src/types.js";

const FIXTURES = resolve(import.meta.dirname, "fixtures");
const PROJECT = resolve(FIXTURES, "calc-project");

describe("extractSymbols", () => {
  it("extracts functions, classes and methods in line order", () => {
    const symbols = extractSymbols(resolve(PROJECT, "calc/core.ts"), PROJECT);
    expect(symbols.map((s) => [s.kind, s.qualifiedName, s.startLine])).toEqual([
      ["function", "add", 4],
      ["class", "Calculator", 8],
      ["method", "Calculator.multiply", 12],
      ["method", "Calculator.reset", 17],
    ]);
  });

  it("takes the first sentence of the doc comment as the summary", () => {
    const symbols = extractSymbols(resolve(PROJECT, "calc/core.ts"), PROJECT);
    const byName = new Map(symbols.map((s) => [s.qualifiedName, s]));
    expect(byName.get("add")?.docSummary).toBe("Adds two numbers.");
    expect(byName.get("Calculator.multiply")?.docSummary).toBe("Multiplies the running total.");
    expect(byName.get("Calculator")?.docSummary).toBe("");
    expect(byName.get("Calculator.reset")?.docSummary).toBe("");
  });

  it("records owner class and signature", () => {
    const symbols = extractSymbols(resolve(PROJECT, "calc/core.ts"), PROJECT);
    const add = symbols.find((s) => s.qualifiedName === "add");
    const multiply = symbols.find((s) => s.qualifiedName === "Calculator.multiply");
    expect(add?.signature).toBe("(a: number, b: number) => number");
    expect(add?.ownerClass).toBeUndefined();
    expect(multiply?.ownerClass).toBe("Calculator");
    expect(multiply?.signature).toBe("(factor: number) => number");
  });

  it("treats arrow-function constants as functions and skips plain constants", () => {
    const symbols = extractSymbols(resolve(PROJECT, "format.ts"), PROJECT);
    expect(symbols).toHaveLength(1);
    expect(symbols[0]).toMatchObject({
      kind: "function",
      qualifiedName: "formatResult",
      startLine: 1,
      docSummary: "",
      signature: "(value: number) => string",
    });
  });

  it("throws FileNotFoundError for a missing file", () => {
    expect(() => extractSymbols(resolve(PROJECT, "missing.ts"), PROJECT)).toThrow(
      FileNotFoundError,
    );
  });

  it("async variant matches the sync one", async () => {
    const file = resolve(PROJECT, "calc/core.ts");
    const warnings: Warning[] = [];
    expect(await extractSymbolsAsync(file, PROJECT, warnings)).toEqual(
      extractSymbols(file, PROJECT),
    );
    expect(warnings).toHaveLength(0);
  });

  it("async variant rejects with FileNotFoundError for a missing file", async () => {
    await expect(
      extractSymbolsAsync(resolve(PROJECT, "missing.ts"), PROJECT),
    ).rejects.toBeInstanceOf(FileNotFoundError);
  });
});

describe("extractSymbolsFromText", () => {
  it("throws ParseError with located diagnostics on syntax errors", () => {
    let caught: unknown;
    try {
      extractSymbolsFromText("export function broken( {\n", "broken.ts");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ParseError);
    if (caught instanceof ParseError) {
      expect(caught.filePath).toBe("broken.ts");
      expect(caught.diagnostics.length).toBeGreaterThan(0);
      expect(caught.diagnostics[0]).toMatch(/^line \d+:\d+ /);
      expect(caught.message.startsWith("broken.ts: line ")).toBe(true);
    }
  });

  it("ignores type errors", () => {
    const symbols = extractSymbolsFromText(
      "export function f(): number {\n  return 'not a number';\n}\n",
      "typed.ts",
    );
    expect(symbols.map((s) => s.qualifiedName)).toEqual(["f"]);
  });

  it("keeps only the implementation of an overloaded function", () => {
    const source = [
      "export function pick(x: string): string;",
      "export function pick(x: number): number;",
      "export function pick(x: string | number) {",
      "  return x;",
      "}",
    ].join("\n");
    const symbols = extractSymbolsFromText(source, "overloads.ts");
    expect(symbols).toHaveLength(1);
    expect(symbols[0].startLine).toBe(3);
  });

  it("names anonymous default exports \"default\"", () => {
    const symbols = extractSymbolsFromText(
      "export default function () {\n  return 1;\n}\n",
      "anon.ts",
    );
    expect(symbols.map((s) => s.qualifiedName)).toEqual(["default"]);
  });

  it("parses JSX in .tsx files", () => {
    const source = [
      "/** Renders a greeting. */",
      "export function Greeting(props: { name: string }) {",
      "  return <p>Hello {props.name}</p>;",
      "}",
    ].join("\n");
    const symbols = extractSymbolsFromText(source, "greeting.tsx");
    expect(symbols).toHaveLength(1);
    expect(symbols[0]).toMatchObject({
      qualifiedName: "Greeting",
      startLine: 2,
      docSummary: "Renders a greeting.",
    });
  });

  it("handles plain JavaScript classes", () => {
    const source = [
      "class Store {",
      "  get(key) {",
      "    return key;",
      "  }",
      "}",
      "module.exports = { Store };",
    ].join("\n");
    const symbols = extractSymbolsFromText(source, "store.js");
    expect(symbols.map((s) => s.qualifiedName)).toEqual(["Store", "Store.get"]);
    expect(symbols[1].signature).toBe("(key: unknown) => unknown");
  });

  it("uses the line of the declaration, not of its doc comment", () => {
    const source = ["/**", " * Doubles.", " */", "const twice = (n: number) => n * 2;"].join("\n");
    const symbols = extractSymbolsFromText(source, "twice.ts");
    expect(symbols[0]).toMatchObject({ qualifiedName: "twice", startLine: 4, docSummary: "Doubles." });
  });
});

describe("summarize", () => {
  it("keeps a single sentence without a terminator", () => {
    expect(summarize("Multiply two numbers")).toBe("Multiply two numbers");
  });

  it("cuts at the first sentence end", () => {
    expect(summarize("Adds two numbers. Handles negatives.")).toBe("Adds two numbers.");
    expect(summarize("Really? Yes.")).toBe("Really?");
  });

  it("does not cut after an abbreviation followed by a lowercase word", () => {
    expect(summarize("e.g. foo bar.")).toBe("e.g. foo bar.");
    expect(summarize("Caches results, e.g. lookups. Clears on reset.")).toBe(
      "Caches results, e.g. lookups.",
    );
  });

  it("does not cut inside a version number", () => {
    expect(summarize("Added in v1.2 of the API")).toBe("Added in v1.2 of the API");
  });

  it("uses the first non-empty line", () => {
    expect(summarize("\n\n  Second line wins\nThird")).toBe("Second line wins");
    expect(summarize("")).toBe("");
  });
});
