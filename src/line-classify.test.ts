import { describe, expect, it } from "vitest";

import { classifyLine, splitTextLines } from "./line-classify.ts";

describe("classifyLine", () => {
  it("treats empty and whitespace-only lines as blank", () => {
    expect(classifyLine("")).toEqual({ kind: "blank" });
    expect(classifyLine("   \t")).toEqual({ kind: "blank" });
  });

  it("classifies dotted numerals by depth using the trimmed line", () => {
    expect(classifyLine("1 Introduction")).toEqual({ kind: "heading1", text: "1 Introduction" });
    expect(classifyLine("  2.1 Overview  ")).toEqual({ kind: "heading2", text: "2.1 Overview" });
    expect(classifyLine("2.1.3 Details")).toEqual({ kind: "heading3", text: "2.1.3 Details" });
  });

  it("accepts bare numerals as headings", () => {
    expect(classifyLine("2024")).toEqual({ kind: "heading1", text: "2024" });
    expect(classifyLine("1.1")).toEqual({ kind: "heading2", text: "1.1" });
  });

  it("reads a numeral followed by a period and whitespace as a numbered item", () => {
    expect(classifyLine("3. Some text")).toEqual({
      kind: "numberedItem",
      designator: "3",
      description: "Some text",
    });
    expect(classifyLine("2.\tFirst item")).toEqual({
      kind: "numberedItem",
      designator: "2",
      description: "First item",
    });
  });

  it("accepts decimal digits from any script", () => {
    expect(classifyLine("\u0661 Intro")).toEqual({ kind: "heading1", text: "\u0661 Intro" });
    expect(classifyLine("\u0967.\u0968 Scope")).toEqual({ kind: "heading2", text: "\u0967.\u0968 Scope" });
    expect(classifyLine("\u0663. item")).toEqual({
      kind: "numberedItem",
      designator: "\u0663",
      description: "item",
    });
  });

  it("keeps list items whose text contains a stray carriage return or line separator", () => {
    expect(classifyLine("1. a\rb")).toEqual({ kind: "numberedItem", designator: "1", description: "a\rb" });
    expect(classifyLine("2 Next\u2028page")).toEqual({ kind: "heading1", text: "2 Next\u2028page" });
    expect(classifyLine("• a\u2029b")).toEqual({ kind: "bulletItem", designator: "•", description: "a\u2029b" });
  });

  it("falls through to continuation for dotted numerals that fit no rule", () => {
    expect(classifyLine("1.2. Scope")).toEqual({ kind: "continuation", text: "1.2. Scope" });
  });

  it("recognizes bullet glyphs at the start of the raw line", () => {
    expect(classifyLine("• Buy milk")).toEqual({
      kind: "bulletItem",
      designator: "•",
      description: "Buy milk",
    });
    expect(classifyLine("  - dash item")).toEqual({
      kind: "bulletItem",
      designator: "•",
      description: "dash item",
    });
    expect(classifyLine("\t* star")).toEqual({ kind: "bulletItem", designator: "•", description: "star" });
    expect(classifyLine("●Tight")).toEqual({ kind: "bulletItem", designator: "•", description: "Tight" });
    expect(classifyLine("\uF0B7 symbol font")).toEqual({
      kind: "bulletItem",
      designator: "•",
      description: "symbol font",
    });
  });

  it("does not accept a bullet behind a non-breaking space", () => {
    expect(classifyLine("\u00A0• indented")).toEqual({ kind: "continuation", text: "• indented" });
  });

  it("keeps other text as a trimmed continuation", () => {
    expect(classifyLine("  plain text here ")).toEqual({ kind: "continuation", text: "plain text here" });
  });
});

describe("splitTextLines", () => {
  it("splits on both line ending styles and drops form feeds", () => {
    expect(splitTextLines("a\r\nb\f\nc")).toEqual(["a", "b", "c"]);
  });
});
