import { InvalidArgumentError } from "commander";
import { readdir } from "node:fs/promises";
import path from "node:path";
import { lexFile } from "./session.js";
import { formatDiagnostics, formatInternalError } from "./errors/reporter.js";
import { InternalCompilerError } from "./errors/internal.js";
import { ALL_KEYWORDS, formatKeyword } from "./lexer/keywords.js";
import { formatToken, tokenToJSON } from "./lexer/format.js";
import { Unique } from "./lexer/unique.js";

export const SOURCE_EXTENSIONS = [".plc", ".uplc"];

export const EXIT_OK = 0;
export const EXIT_DIAGNOSTICS = 1;
export const EXIT_INTERNAL = 2;

export interface TokensOptions {
  json?: boolean;
  startUnique?: Unique;
  showIdentifiers?: boolean;
}

export async function resolveDefaultFile(file: string | undefined, cwd: string = process.cwd()): Promise<string> {
  if (file) return file;
  const entries = await readdir(cwd);
  const found = entries.filter((f) => SOURCE_EXTENSIONS.includes(path.extname(f)));
  if (found.length === 0) {
    throw new Error(`No ${SOURCE_EXTENSIONS.join(" or ")} file found in the current directory. Pass a file path explicitly.`);
  }
  if (found.length > 1) {
    throw new Error(`Multiple source files found: ${found.join(", ")}. Pass a file path explicitly.`);
  }
  return path.join(cwd, found[0]);
}

/** commander argument parser for `--start-unique`. */
export function parseUnique(value: string): Unique {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  try {
    return Unique.of(Number(value));
  } catch (e) {
    throw new InvalidArgumentError(e instanceof Error ? e.message : String(e));
  }
}

/** Prints the token stream of `file` and returns the process exit code. */
export async function runTokens(file: string | undefined, opts: TokensOptions): Promise<number> {
  try {
    file = await resolveDefaultFile(file);
    const result = await lexFile(file, { startUnique: opts.startUnique });

    if (result.errors.length > 0) {
      console.error(formatDiagnostics(result.source, result.errors));
      return EXIT_DIAGNOSTICS;
    }

    if (opts.json) {
      console.log(JSON.stringify({
        tokens: result.tokens.map(tokenToJSON),
        next: result.identifiers.next.toNumber(),
      }, null, 2));
      return EXIT_OK;
    }

    for (const tok of result.tokens) {
      console.log(`${tok.kind}\t${JSON.stringify(formatToken(tok))}\t${tok.span.start.line}:${tok.span.start.column}`);
    }

    if (opts.showIdentifiers) {
      for (const [name, unique] of result.identifiers.entries()) {
        console.log(`${unique.toString()}\t${name}`);
      }
      console.log(`next\t${result.identifiers.next.toString()}`);
    }
    return EXIT_OK;
  } catch (e) {
    if (e instanceof InternalCompilerError) {
      console.error(formatInternalError(e));
      return EXIT_INTERNAL;
    }
    console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return EXIT_DIAGNOSTICS;
  }
}

export function runKeywords(): number {
  for (const kw of ALL_KEYWORDS) {
    console.log(formatKeyword(kw));
  }
  return EXIT_OK;
}
