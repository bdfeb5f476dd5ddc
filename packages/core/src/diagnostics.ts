/**
 * Diagnostics: what the CLI prints for a failed parse, extraction or read.
 */
import type { ParseOutcome } from "./grammars.js";

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

export interface Diagnostic {
  code: string;
  message: string;
  span?: Span;
  hint?: string;
}

export function makeDiag(code: string, message: string, span?: Span, hint?: string): Diagnostic {
  return { code, message, span, hint };
}

/**
 * Span of `length` characters starting at a 0-based `offset` into `text`.
 * Lines and columns are 1-based; an empty match still covers one column.
 */
export function spanAt(text: string, offset: number, length: number, file: string): Span {
  const lines = text.slice(0, offset).split(/\r?\n/);
  const line = lines.length;
  const col = lines[lines.length - 1].length + 1;
  return { file, startLine: line, startCol: col, endLine: line, endCol: col + Math.max(length, 1) };
}

/** One diagnostic per failed attempt, its message prefixed with the grammar tried. */
export function attemptDiagnostics(attempts: readonly ParseOutcome[]): Diagnostic[] {
  return attempts.flatMap((attempt) =>
    attempt.ok
      ? []
      : [{ ...attempt.error.toDiagnostic(), message: `${attempt.grammar} grammar: ${attempt.error.message}` }]
  );
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  const loc = d.span ? `${d.span.file}:${d.span.startLine}:${d.span.startCol}` : "<unknown>";
  let out = `error[${d.code}]: ${d.message}\n  --> ${loc}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: readonly Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}
