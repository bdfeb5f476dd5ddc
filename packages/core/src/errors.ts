/**
 * Error taxonomy. Every failure is terminal: the transformations are exact,
 * so nothing here is retried or recovered from.
 */
import type { Diagnostic, Span } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

export class MathTermError extends Error {
  code: string;
  span?: Span;
  hint?: string;

  constructor(code: string, message: string, span?: Span, hint?: string) {
    super(message);
    this.name = "MathTermError";
    this.code = code;
    this.span = span;
    this.hint = hint;
  }

  toDiagnostic(): Diagnostic {
    return makeDiag(this.code, this.message, this.span, this.hint);
  }
}

export interface ParseErrorDetails {
  /** 0-based offset into the input text. */
  position: number;
  line: number;
  column: number;
  expected: string;
  found: string;
  span: Span;
}

export class ParseError extends MathTermError {
  position: number;
  line: number;
  column: number;
  expected: string;
  found: string;

  constructor(code: "E_LEX" | "E_PARSE", message: string, details: ParseErrorDetails) {
    super(code, message, details.span, "Check syntax near this location.");
    this.name = "ParseError";
    this.position = details.position;
    this.line = details.line;
    this.column = details.column;
    this.expected = details.expected;
    this.found = details.found;
  }
}

export class UnsupportedConstructError extends MathTermError {
  detail: string;

  constructor(detail: string) {
    super("E_UNSUPPORTED", detail);
    this.name = "UnsupportedConstructError";
    this.detail = detail;
  }
}

export class UnknownNotationError extends MathTermError {
  notation: string;

  constructor(notation: string, known: string[]) {
    super(
      "E_NOTATION",
      `Unknown notation '${notation}'.`,
      undefined,
      `Known notations: ${known.join(", ")}.`
    );
    this.name = "UnknownNotationError";
    this.notation = notation;
  }
}

export class NumericFormatError extends MathTermError {
  constructor(message: string) {
    super("E_NUMERIC", message);
    this.name = "NumericFormatError";
  }
}

export class ConfigError extends MathTermError {
  path: string;

  constructor(path: string, message: string) {
    super("E_CONFIG", `Invalid configuration in ${path}: ${message}`);
    this.name = "ConfigError";
    this.path = path;
  }
}
