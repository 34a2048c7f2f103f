import { describe, it, expect } from "vitest";
import { isInCodeSpan, scanLinks, stripFragment } from "../src/link-scanner.js";

describe("scanLinks", () => {
  it("separates cross-references from code references", () => {
    const text = [
      "# Billing [L1:billing]",
      "",
      "See [Cart](../modules/cart.md) and [`Cart.total`](../../src/cart.ts#L42).",
    ].join("\n");
    const { crossRefs, codeRefs } = scanLinks(text);
    expect(crossRefs).toEqual([{ target: "../modules/cart.md", text: "Cart", line: 3 }]);
    expect(codeRefs).toEqual([
      {
        target: "../../src/cart.ts",
        sourceLine: 42,
        symbolName: "Cart.total",
        text: "`Cart.total`",
        line: 3,
      },
    ]);
  });

  it("treats line links without a symbol name as bounds-only code references", () => {
    const { codeRefs } = scanLinks("[Source](../src/cart.ts#L7)");
    expect(codeRefs).toHaveLength(1);
    expect(codeRefs[0].symbolName).toBeUndefined();
    expect(codeRefs[0].sourceLine).toBe(7);
  });

  it("reads symbol names that contain brackets", () => {
    const { codeRefs } = scanLinks("### [`Bag.[Symbol.iterator]`](../../src/bag.ts#L2)");
    expect(codeRefs).toEqual([
      {
        target: "../../src/bag.ts",
        sourceLine: 2,
        symbolName: "Bag.[Symbol.iterator]",
        text: "`Bag.[Symbol.iterator]`",
        line: 1,
      },
    ]);
  });

  it("accepts balanced brackets in plain link text", () => {
    const { crossRefs } = scanLinks("[notes [draft]](notes.md) and [x](y.md)");
    expect(crossRefs.map((r) => [r.text, r.target])).toEqual([
      ["notes [draft]", "notes.md"],
      ["x", "y.md"],
    ]);
  });

  it("keeps non-line fragments on cross-references", () => {
    const { crossRefs, codeRefs } = scanLinks("[Setup](guide.md#setup)");
    expect(codeRefs).toEqual([]);
    expect(crossRefs).toEqual([{ target: "guide.md#setup", text: "Setup", line: 1 }]);
  });

  it("skips external and in-page links", () => {
    const text = [
      "[Site](https://example.com/docs.md)",
      "[Mail](mailto:team@example.com)",
      "[Top](#top)",
    ].join("\n");
    expect(scanLinks(text)).toEqual({ crossRefs: [], codeRefs: [] });
  });

  it("skips links inside fenced code blocks", () => {
    const text = [
      "```md",
      "[Ignored](missing.md)",
      "```",
      "~~~",
      "[`alsoIgnored`](x.ts#L1)",
      "~~~",
      "[Kept](kept.md)",
    ].join("\n");
    const { crossRefs, codeRefs } = scanLinks(text);
    expect(crossRefs.map((r) => r.target)).toEqual(["kept.md"]);
    expect(crossRefs[0].line).toBe(7);
    expect(codeRefs).toEqual([]);
  });

  it("skips links inside inline code spans", () => {
    const { crossRefs } = scanLinks("Write `[text](target.md)` to link, like [this](real.md).");
    expect(crossRefs.map((r) => r.target)).toEqual(["real.md"]);
  });
});

describe("isInCodeSpan", () => {
  it("counts backticks before the index", () => {
    expect(isInCodeSpan("a `b` c", 6)).toBe(false);
    expect(isInCodeSpan("a `b c", 4)).toBe(true);
    expect(isInCodeSpan("``x`` y", 6)).toBe(false);
  });
});

describe("stripFragment", () => {
  it("drops everything from the first #", () => {
    expect(stripFragment("a/b.md#L3")).toBe("a/b.md");
    expect(stripFragment("a/b.md")).toBe("a/b.md");
  });
});
