import { LiteralConst } from "./tokens.js";

export function formatLiteralConst(literal: LiteralConst): string {
  switch (literal) {
    case LiteralConst.EmptyBrackets: return "lit ()";
    case LiteralConst.SingleQuotedChars: return "lit '";
    case LiteralConst.DoubleQuotedChars: return 'lit "';
    case LiteralConst.UnquotedChars: return "lit";
    default: {
      const unreachable: never = literal;
      return unreachable;
    }
  }
}

/** Code points 32 through 0x10FFFF. Space counts; tab and newline do not. */
export function isPrintable(ch: string): boolean {
  const cp = ch.codePointAt(0);
  return cp !== undefined && cp >= 32 && cp <= 0x10ffff;
}

/**
 * Index of the quote closing the run that opens at `start`, or -1.
 * A backslash skips the character after it.
 */
export function findClosingQuote(text: string, start: number): number {
  const quote = text[start];
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\\") {
      i += 2;
    } else if (ch === quote) {
      return i;
    } else {
      i++;
    }
  }
  return -1;
}

/**
 * Shape of a complete literal body, or undefined when the text is not one.
 * At most one shape ever matches.
 */
export function classifyLiteralBody(text: string): LiteralConst | undefined {
  for (const ch of text) {
    if (!isPrintable(ch)) return undefined;
  }

  if (text === "()") return LiteralConst.EmptyBrackets;

  if (text.startsWith("'") || text.startsWith('"')) {
    if (findClosingQuote(text, 0) !== text.length - 1 || text.length < 2) return undefined;
    return text[0] === "'" ? LiteralConst.SingleQuotedChars : LiteralConst.DoubleQuotedChars;
  }

  if (
    text.length === 0 ||
    text.includes("(") ||
    text.includes(")") ||
    text.startsWith(" ") ||
    text.endsWith(" ")
  ) {
    return undefined;
  }
  return LiteralConst.UnquotedChars;
}
