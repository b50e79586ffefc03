import { describe, it, expect } from "vitest";
import { ALL_KEYWORDS, KEYWORDS, compareKeywords, formatKeyword } from "../../src/lexer/keywords.js";
import { classifyLiteralBody, formatLiteralConst, isPrintable } from "../../src/lexer/literals.js";
import { Keyword, LiteralConst } from "../../src/lexer/tokens.js";

describe("keywords", () => {
  it("lists every keyword in declaration order", () => {
    expect(ALL_KEYWORDS.map(formatKeyword)).toEqual([
      "lam", "program", "con", "builtin", "error",
      "abs", "fun", "all", "type", "ifix", "iwrap", "unwrap",
      "force", "delay",
    ]);
  });

  it("orders keywords by declaration", () => {
    expect(compareKeywords(Keyword.Lam, Keyword.Delay)).toBeLessThan(0);
    expect(compareKeywords(Keyword.Force, Keyword.Abs)).toBeGreaterThan(0);
    expect(compareKeywords(Keyword.Type, Keyword.Type)).toBe(0);
  });

  it("matches each rendering back to the same keyword", () => {
    for (const kw of ALL_KEYWORDS) {
      expect(KEYWORDS.get(formatKeyword(kw))).toBe(kw);
    }
  });

  it("recognizes exactly the declared keywords", () => {
    expect(KEYWORDS.size).toBe(ALL_KEYWORDS.length);
    expect(new Set(ALL_KEYWORDS.map(formatKeyword)).size).toBe(14);
    expect(KEYWORDS.get("lambda")).toBeUndefined();
    expect(KEYWORDS.get("Lam")).toBeUndefined();
  });
});

describe("literal constants", () => {
  it("renders each shape", () => {
    expect(formatLiteralConst(LiteralConst.EmptyBrackets)).toBe("lit ()");
    expect(formatLiteralConst(LiteralConst.SingleQuotedChars)).toBe("lit '");
    expect(formatLiteralConst(LiteralConst.DoubleQuotedChars)).toBe('lit "');
    expect(formatLiteralConst(LiteralConst.UnquotedChars)).toBe("lit");
  });

  it("classifies empty brackets", () => {
    expect(classifyLiteralBody("()")).toBe(LiteralConst.EmptyBrackets);
  });

  it("classifies quoted runs, including empty ones", () => {
    expect(classifyLiteralBody("'a'")).toBe(LiteralConst.SingleQuotedChars);
    expect(classifyLiteralBody("''")).toBe(LiteralConst.SingleQuotedChars);
    expect(classifyLiteralBody('"hello (world)"')).toBe(LiteralConst.DoubleQuotedChars);
    expect(classifyLiteralBody('""')).toBe(LiteralConst.DoubleQuotedChars);
    expect(classifyLiteralBody('"say \\"hi\\""')).toBe(LiteralConst.DoubleQuotedChars);
  });

  it("classifies unquoted runs with inner spaces", () => {
    expect(classifyLiteralBody("-42")).toBe(LiteralConst.UnquotedChars);
    expect(classifyLiteralBody("12 4 55 -4")).toBe(LiteralConst.UnquotedChars);
    expect(classifyLiteralBody("<1,2.3,\"yes\">")).toBe(LiteralConst.UnquotedChars);
    expect(classifyLiteralBody("[1, 2, -7]")).toBe(LiteralConst.UnquotedChars);
  });

  it("rejects text with no shape", () => {
    expect(classifyLiteralBody("")).toBeUndefined();
    expect(classifyLiteralBody("(1,2)")).toBeUndefined();
    expect(classifyLiteralBody(" 1")).toBeUndefined();
    expect(classifyLiteralBody("1 ")).toBeUndefined();
    expect(classifyLiteralBody("'open")).toBeUndefined();
    expect(classifyLiteralBody("'a'b")).toBeUndefined();
    expect(classifyLiteralBody("'")).toBeUndefined();
    expect(classifyLiteralBody("a\tb")).toBeUndefined();
    expect(classifyLiteralBody('"line\nbreak"')).toBeUndefined();
  });

  it("accepts space and non-ASCII as printable", () => {
    expect(isPrintable(" ")).toBe(true);
    expect(isPrintable("λ")).toBe(true);
    expect(isPrintable("😀")).toBe(true);
    expect(isPrintable("\t")).toBe(false);
    expect(isPrintable("\n")).toBe(false);
  });
});
