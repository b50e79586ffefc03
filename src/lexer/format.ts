import { TokenKind, type Special, type Token } from "./tokens.js";
import { formatKeyword } from "./keywords.js";
import { formatLiteralConst } from "./literals.js";

export function formatSpecial(special: Special): string {
  return special;
}

/** Rendering for diagnostics. Not meant to be lexed again. */
export function formatToken(token: Token): string {
  switch (token.kind) {
    case TokenKind.Name: return token.name;
    case TokenKind.Natural: return token.value.toString();
    case TokenKind.BuiltinFunctionId: return token.name;
    case TokenKind.BuiltinTypeId: return token.name;
    case TokenKind.ConArgs: return `${token.typeName} ${formatLiteralConst(token.literal)}`;
    case TokenKind.LiteralConst: return formatLiteralConst(token.literal);
    case TokenKind.Keyword: return formatKeyword(token.keyword);
    case TokenKind.Special: return formatSpecial(token.special);
    case TokenKind.EOF: return "";
    default: {
      const unreachable: never = token;
      return unreachable;
    }
  }
}

export type TokenJSON = Record<string, string | number>;

/** Plain-data view of a token: bigints as decimal strings, handles as numbers. */
export function tokenToJSON(token: Token): TokenJSON {
  const at = `${token.span.source}:${token.span.start.line}:${token.span.start.column}`;
  switch (token.kind) {
    case TokenKind.Name:
      return { kind: token.kind, name: token.name, unique: token.unique.toNumber(), at };
    case TokenKind.BuiltinFunctionId:
    case TokenKind.BuiltinTypeId:
      return { kind: token.kind, name: token.name, at };
    case TokenKind.ConArgs:
      return { kind: token.kind, typeName: token.typeName, literal: token.literal, body: token.body, at };
    case TokenKind.LiteralConst:
      return { kind: token.kind, literal: token.literal, body: token.body, at };
    case TokenKind.Natural:
      return { kind: token.kind, value: token.value.toString(), at };
    case TokenKind.Keyword:
      return { kind: token.kind, keyword: token.keyword, at };
    case TokenKind.Special:
      return { kind: token.kind, special: token.special, at };
    case TokenKind.EOF:
      return { kind: token.kind, at };
    default: {
      const unreachable: never = token;
      return unreachable;
    }
  }
}
