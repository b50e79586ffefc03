import type { Span } from "../errors/diagnostic.js";
import type { Unique } from "./unique.js";

export enum TokenKind {
  // Identifiers
  Name = "Name",
  BuiltinFunctionId = "BuiltinFunctionId",
  BuiltinTypeId = "BuiltinTypeId",

  // Constants
  ConArgs = "ConArgs",
  LiteralConst = "LiteralConst",
  Natural = "Natural",

  Keyword = "Keyword",
  Special = "Special",

  EOF = "EOF",
}

/**
 * Reserved words. Typed and untyped programs share one lexer, so some of these
 * only mean something in one dialect. Declaration order is the keyword order.
 */
export enum Keyword {
  Lam = "lam",
  Program = "program",
  // (con tyname) or (con tyname const)
  Con = "con",
  // the following name is a builtin function, not a variable
  Builtin = "builtin",
  Error = "error",

  // typed only
  Abs = "abs",
  Fun = "fun",
  All = "all",
  Type = "type",
  IFix = "ifix",
  IWrap = "iwrap",
  Unwrap = "unwrap",

  // untyped only
  Force = "force",
  Delay = "delay",
}

/** Surface shape of a literal constant body. The value is parsed later, per type. */
export enum LiteralConst {
  /** `()` */
  EmptyBrackets = "EmptyBrackets",
  /** `'...'`, possibly empty */
  SingleQuotedChars = "SingleQuotedChars",
  /** `"..."`, possibly empty */
  DoubleQuotedChars = "DoubleQuotedChars",
  /**
   * Non-empty run without `(` or `)` that does not start with a quote.
   * Inner spaces are kept, surrounding ones are not.
   */
  UnquotedChars = "UnquotedChars",
}

export enum Special {
  OpenParen = "(",
  CloseParen = ")",
  OpenBracket = "[",
  CloseBracket = "]",
  OpenBrace = "{",
  CloseBrace = "}",
  Dot = ".",
}

interface TokenBase {
  readonly span: Span;
}

export interface NameToken extends TokenBase {
  readonly kind: TokenKind.Name;
  readonly name: string;
  /** Assigned by the session's identifier table. */
  readonly unique: Unique;
}

export interface BuiltinFunctionIdToken extends TokenBase {
  readonly kind: TokenKind.BuiltinFunctionId;
  readonly name: string;
}

export interface BuiltinTypeIdToken extends TokenBase {
  readonly kind: TokenKind.BuiltinTypeId;
  readonly name: string;
}

/** What follows `con`: a builtin type name and a literal of that type. */
export interface ConArgsToken extends TokenBase {
  readonly kind: TokenKind.ConArgs;
  readonly typeName: string;
  readonly literal: LiteralConst;
  /** Raw source text of the literal, quotes and escapes untouched. */
  readonly body: string;
}

export interface KeywordToken extends TokenBase {
  readonly kind: TokenKind.Keyword;
  readonly keyword: Keyword;
}

export interface LiteralConstToken extends TokenBase {
  readonly kind: TokenKind.LiteralConst;
  readonly literal: LiteralConst;
  readonly body: string;
}

export interface NaturalToken extends TokenBase {
  readonly kind: TokenKind.Natural;
  readonly value: bigint;
}

export interface SpecialToken extends TokenBase {
  readonly kind: TokenKind.Special;
  readonly special: Special;
}

export interface EOFToken extends TokenBase {
  readonly kind: TokenKind.EOF;
}

export type Token =
  | NameToken
  | BuiltinFunctionIdToken
  | BuiltinTypeIdToken
  | ConArgsToken
  | KeywordToken
  | LiteralConstToken
  | NaturalToken
  | SpecialToken
  | EOFToken;
