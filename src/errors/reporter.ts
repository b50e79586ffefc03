import chalk from "chalk";
import type { Diagnostic, Severity } from "./diagnostic.js";
import type { InternalCompilerError } from "./internal.js";

function severityLabel(severity: Severity): string {
  switch (severity) {
    case "error": return chalk.red.bold("error");
    case "warning": return chalk.yellow.bold("warning");
    case "info": return chalk.blue.bold("info");
  }
}

export function formatDiagnostic(source: string, diag: Diagnostic): string {
  const { start, end } = diag.span;
  const line = source.split("\n")[start.line - 1] ?? "";
  const lineNum = String(start.line);
  const padding = " ".repeat(lineNum.length);

  // Spans running past the first line are underlined to its end
  const lastCol = end.line === start.line ? end.column : line.length + 1;
  const width = Math.max(1, lastCol - start.column);

  let output = `${severityLabel(diag.severity)}: ${chalk.bold(diag.message)}\n`;
  output += `${padding} ${chalk.blue("-->")} ${diag.span.source}:${start.line}:${start.column}\n`;
  output += `${padding} ${chalk.blue("|")}\n`;
  output += `${chalk.blue(lineNum)} ${chalk.blue("|")} ${line}\n`;
  output += `${padding} ${chalk.blue("|")} ${" ".repeat(start.column - 1)}${chalk.red("^".repeat(width))}\n`;

  if (diag.help) {
    output += `${padding} ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }

  return output;
}

export function formatDiagnostics(source: string, diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(source, d)).join("\n");
}

export function formatInternalError(err: InternalCompilerError): string {
  return `${chalk.red.bold("internal error")}: ${err.message}\n`;
}
