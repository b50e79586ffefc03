import { error, makeSpan, type Diagnostic, type Position, type Span } from "../errors/diagnostic.js";
import { emptyIdentifierState, type IdentifierState } from "./identifiers.js";
import { KEYWORDS } from "./keywords.js";
import { classifyLiteralBody, findClosingQuote, isPrintable } from "./literals.js";
import { Keyword, Special, TokenKind, type LiteralConst, type Token } from "./tokens.js";

export interface LexResult {
  tokens: Token[];
  errors: Diagnostic[];
}

interface LiteralBody {
  literal: LiteralConst;
  body: string;
  end: Position;
}

const SPECIALS: ReadonlyMap<string, Special> = new Map(
  Object.values(Special).map((s): [string, Special] => [s, s]),
);

export class Lexer {
  private source: string;
  private filename: string;
  private pos: number = 0;
  private line: number = 1;
  private col: number = 1;
  private tokens: Token[] = [];
  private errors: Diagnostic[] = [];
  private result: LexResult | undefined;

  /** Pass a state from an earlier session to keep its handles distinct. */
  readonly identifiers: IdentifierState;

  constructor(
    source: string,
    filename: string = "<stdin>",
    identifiers: IdentifierState = emptyIdentifierState(),
  ) {
    this.source = source;
    this.filename = filename;
    this.identifiers = identifiers;
  }

  /** Scans once; later calls return the same result. */
  tokenize(): LexResult {
    if (this.result) return this.result;
    for (;;) {
      this.skipWhitespaceAndComments();
      if (this.pos >= this.source.length) break;
      this.scanToken();
    }
    const end = this.mark();
    this.tokens.push({ kind: TokenKind.EOF, span: makeSpan(this.filename, end) });
    this.result = { tokens: this.tokens, errors: this.errors };
    return this.result;
  }

  private scanToken(): void {
    const ch = this.source[this.pos];

    if (this.isDigit(ch)) return this.readNatural();
    if (this.isAlpha(ch)) return this.readNameOrKeyword();

    const start = this.mark();
    const special = SPECIALS.get(ch);
    if (special !== undefined) {
      this.advance();
      this.tokens.push({ kind: TokenKind.Special, special, span: this.spanFrom(start) });
      return;
    }

    const cp = this.source.codePointAt(this.pos) ?? 0;
    const unexpected = String.fromCodePoint(cp);
    this.advance();
    this.errors.push(error(`Unexpected character: '${unexpected}'`, this.spanFrom(start)));
  }

  private readNatural(): void {
    const start = this.mark();
    while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
      this.advance();
    }
    const value = BigInt(this.source.slice(start.offset, this.pos));
    this.tokens.push({ kind: TokenKind.Natural, value, span: this.spanFrom(start) });
  }

  private readNameOrKeyword(): void {
    const start = this.mark();
    const text = this.readWhile((ch) => this.isNameChar(ch));

    const keyword = KEYWORDS.get(text);
    if (keyword === undefined) {
      const unique = this.identifiers.intern(text);
      this.tokens.push({ kind: TokenKind.Name, name: text, unique, span: this.spanFrom(start) });
      return;
    }

    this.tokens.push({ kind: TokenKind.Keyword, keyword, span: this.spanFrom(start) });
    if (keyword === Keyword.Builtin) this.readBuiltinName();
    else if (keyword === Keyword.Con) this.readConArgs();
  }

  private readBuiltinName(): void {
    this.skipWhitespaceAndComments();
    const start = this.mark();
    if (this.pos >= this.source.length || !this.isAlpha(this.source[this.pos])) {
      this.errors.push(error("Expected a builtin function name after 'builtin'", this.spanFrom(start)));
      return;
    }
    const name = this.readWhile((ch) => this.isNameChar(ch));
    this.tokens.push({ kind: TokenKind.BuiltinFunctionId, name, span: this.spanFrom(start) });
  }

  // (con ty), (con ty body) or (con body)
  private readConArgs(): void {
    this.skipWhitespaceAndComments();
    const start = this.mark();
    const ch = this.source[this.pos];

    if (ch === "'" || ch === '"' || this.source.startsWith("()", this.pos)) {
      const lit = this.readLiteralBody();
      if (lit) {
        this.tokens.push({
          kind: TokenKind.LiteralConst,
          literal: lit.literal,
          body: lit.body,
          span: makeSpan(this.filename, start, lit.end),
        });
      }
      return;
    }

    if (this.pos >= this.source.length || !this.isAlpha(ch)) {
      this.errors.push(
        error("Expected a builtin type name after 'con'", this.spanFrom(start), "Write (con <type>) or (con <type> <literal>)"),
      );
      return;
    }

    const typeName = this.readWhile((c) => this.isAlphaNum(c) || c === "_");
    const typeSpan = this.spanFrom(start);
    this.skipWhitespace();

    const lit = this.pos < this.source.length && this.source[this.pos] !== ")"
      ? this.readLiteralBody()
      : undefined;

    if (lit) {
      this.tokens.push({
        kind: TokenKind.ConArgs,
        typeName,
        literal: lit.literal,
        body: lit.body,
        span: makeSpan(this.filename, start, lit.end),
      });
    } else {
      this.tokens.push({ kind: TokenKind.BuiltinTypeId, name: typeName, span: typeSpan });
    }
  }

  /**
   * Reads the raw text of a literal without interpreting it. Reports and
   * returns undefined when the text has no valid shape.
   */
  private readLiteralBody(): LiteralBody | undefined {
    const start = this.mark();
    const ch = this.source[this.pos];
    let end: Position;

    if (this.source.startsWith("()", this.pos)) {
      this.advance();
      this.advance();
      end = this.mark();
    } else if (ch === "'" || ch === '"') {
      const close = findClosingQuote(this.source, this.pos);
      if (close < 0) {
        this.readWhile((c) => c !== "\n");
        this.errors.push(error("Unterminated quoted literal constant", this.spanFrom(start)));
        return undefined;
      }
      while (this.pos <= close) this.advance();
      end = this.mark();
    } else {
      end = start;
      while (this.pos < this.source.length) {
        const c = this.source[this.pos];
        if (c === "(" || c === ")" || !isPrintable(c)) break;
        this.advance();
        if (c !== " ") end = this.mark();
      }
    }

    const body = this.source.slice(start.offset, end.offset);
    const literal = classifyLiteralBody(body);
    if (literal === undefined) {
      this.errors.push(
        error(
          body.length === 0 ? "Expected a literal constant" : `Malformed literal constant: ${body}`,
          makeSpan(this.filename, start, this.mark()),
          "Literal constants are (), a quoted run of printable characters, or an unquoted run without parentheses",
        ),
      );
      return undefined;
    }
    this.expectLiteralEnd();
    return { literal, body, end };
  }

  // Only whitespace may separate a literal from the closing paren.
  private expectLiteralEnd(): void {
    this.skipWhitespace();
    if (this.pos >= this.source.length || this.source[this.pos] === ")") return;
    const at = this.mark();
    this.errors.push(
      error("Unexpected text after literal constant", makeSpan(this.filename, at), "Close the constant with ')'"),
    );
  }

  private skipWhitespace(): void {
    this.readWhile((ch) => ch === " " || ch === "\t" || ch === "\r" || ch === "\n");
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];

      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
        this.advance();
      } else if (this.source.startsWith("--", this.pos)) {
        // Line comment
        this.readWhile((c) => c !== "\n");
      } else if (this.source.startsWith("{-", this.pos)) {
        this.skipBlockComment();
      } else {
        break;
      }
    }
  }

  // {- ... -}, nestable
  private skipBlockComment(): void {
    const start = this.mark();
    this.advance();
    this.advance();
    const opening = this.spanFrom(start);
    let depth = 1;
    while (this.pos < this.source.length) {
      if (this.source.startsWith("{-", this.pos)) {
        depth++;
        this.advance();
        this.advance();
      } else if (this.source.startsWith("-}", this.pos)) {
        depth--;
        this.advance();
        this.advance();
        if (depth === 0) return;
      } else {
        this.advance();
      }
    }
    this.errors.push(error("Unterminated block comment", opening));
  }

  private readWhile(pred: (ch: string) => boolean): string {
    const startPos = this.pos;
    while (this.pos < this.source.length && pred(this.source[this.pos])) {
      this.advance();
    }
    return this.source.slice(startPos, this.pos);
  }

  private advance(): void {
    if (this.pos < this.source.length) {
      if (this.source[this.pos] === "\n") {
        this.line++;
        this.col = 1;
      } else {
        this.col++;
      }
      // a surrogate pair is one column
      const cp = this.source.codePointAt(this.pos) ?? 0;
      this.pos += cp > 0xffff ? 2 : 1;
    }
  }

  private mark(): Position {
    return { offset: this.pos, line: this.line, column: this.col };
  }

  private spanFrom(start: Position): Span {
    return makeSpan(this.filename, start, this.mark());
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isAlpha(ch: string): boolean {
    return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
  }

  private isAlphaNum(ch: string): boolean {
    return this.isDigit(ch) || this.isAlpha(ch);
  }

  private isNameChar(ch: string): boolean {
    return this.isAlphaNum(ch) || ch === "_" || ch === "'";
  }
}
