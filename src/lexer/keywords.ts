import { Keyword } from "./tokens.js";

export const ALL_KEYWORDS: readonly Keyword[] = Object.values(Keyword);

export function formatKeyword(keyword: Keyword): string {
  return keyword;
}

export function compareKeywords(a: Keyword, b: Keyword): number {
  return ALL_KEYWORDS.indexOf(a) - ALL_KEYWORDS.indexOf(b);
}

// Built from ALL_KEYWORDS so the scanner recognizes exactly the declared set.
export const KEYWORDS: ReadonlyMap<string, Keyword> = new Map(
  ALL_KEYWORDS.map((kw): [string, Keyword] => [formatKeyword(kw), kw]),
);
