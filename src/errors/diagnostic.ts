export interface Position {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
  readonly source: string;
}

export type Severity = "error" | "warning" | "info";

/** A problem in the text being lexed. Internal failures are thrown instead. */
export interface Diagnostic {
  severity: Severity;
  message: string;
  span: Span;
  help?: string;
}

export function error(message: string, span: Span, help?: string): Diagnostic {
  return { severity: "error", message, span, help };
}

export function warning(message: string, span: Span, help?: string): Diagnostic {
  return { severity: "warning", message, span, help };
}

export function makeSpan(source: string, start: Position, end: Position = start): Span {
  return { start, end, source };
}
