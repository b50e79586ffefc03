import { readFile } from "node:fs/promises";
import type { Diagnostic } from "./errors/diagnostic.js";
import { emptyIdentifierState, identifierStateFrom, type IdentifierState } from "./lexer/identifiers.js";
import { Lexer } from "./lexer/lexer.js";
import type { Token } from "./lexer/tokens.js";
import type { Unique } from "./lexer/unique.js";

export interface LexOptions {
  /** Continue interning into an existing table. Wins over `startUnique`. */
  identifiers?: IdentifierState;
  /** Start a fresh table whose first handle is this one. */
  startUnique?: Unique;
}

export interface LexSessionResult {
  tokens: Token[];
  /** Non-empty means the source did not lex cleanly. */
  errors: Diagnostic[];
  /** Final table; hand `identifiers.next` to a later session to avoid collisions. */
  identifiers: IdentifierState;
}

function initialState(options: LexOptions): IdentifierState {
  if (options.identifiers) return options.identifiers;
  if (options.startUnique) return identifierStateFrom(options.startUnique);
  return emptyIdentifierState();
}

/**
 * Lex a source string in one session.
 * Throws an InternalCompilerError if the session runs out of handles.
 */
export function lexSource(
  source: string,
  filename: string,
  options: LexOptions = {},
): LexSessionResult {
  const lexer = new Lexer(source, filename, initialState(options));
  const { tokens, errors } = lexer.tokenize();
  return { tokens, errors, identifiers: lexer.identifiers };
}

export async function lexFile(
  filePath: string,
  options: LexOptions = {},
): Promise<LexSessionResult & { source: string }> {
  const source = await readFile(filePath, "utf-8");
  return { ...lexSource(source, filePath, options), source };
}
