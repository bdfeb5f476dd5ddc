/**
 * Shared CLI plumbing: where the expression comes from, how it is parsed,
 * and how failures map to diagnostics and exit codes.
 */
import * as fs from "node:fs";
import {
  GRAMMAR_NAMES,
  MathTermError,
  attemptDiagnostics,
  formatDiagnostic,
  isGrammarName,
  parseWithFallback,
  resolveConfig,
} from "@mathterm/core";
import type { Diagnostic, Expr, GrammarName, MathTermConfig } from "@mathterm/core";

export type InputSource =
  | { kind: "text"; text: string }
  | { kind: "file"; path: string }
  | { kind: "stream"; fd: number };

export class CliIoError extends MathTermError {
  constructor(message: string) {
    super("E_IO", message);
    this.name = "CliIoError";
  }
}

export class CliUsageError extends MathTermError {
  constructor(message: string, hint?: string) {
    super("E_USAGE", message, undefined, hint);
    this.name = "CliUsageError";
  }
}

export interface CommonOptions {
  pretty?: boolean;
  cwd?: string;
  homeDir?: string;
}

/** Pick the input from the positional argument or --file; `-` means stdin. */
export function resolveInput(expression: string | undefined, file: string | undefined): InputSource {
  if (expression !== undefined && file !== undefined) {
    throw new CliUsageError("Give either an expression or --file, not both.");
  }
  if (file !== undefined) return { kind: "file", path: file };
  if (expression === "-") return { kind: "stream", fd: 0 };
  if (expression !== undefined) return { kind: "text", text: expression };
  throw new CliUsageError("No expression given.", "Pass the expression as an argument, - for stdin, or --file <path>.");
}

export interface SourceText {
  text: string;
  /** Label used in diagnostic spans. */
  file: string;
}

export function readInput(source: InputSource): SourceText {
  switch (source.kind) {
    case "text":
      return { text: source.text, file: "<input>" };
    case "file":
      return { text: readOrFail(source.path, "file"), file: source.path };
    case "stream":
      return { text: readOrFail(source.fd, "stdin"), file: "<stdin>" };
  }
}

function readOrFail(target: string | number, what: string): string {
  try {
    return fs.readFileSync(target, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new CliIoError(`Error reading ${what}: ${msg}`);
  }
}

export function loadSettings(opts: CommonOptions): MathTermConfig {
  return resolveConfig(opts.cwd, opts.homeDir).config;
}

export type ParsedInput =
  | { ok: true; ast: Expr; grammar: GrammarName }
  | { ok: false; diagnostics: Diagnostic[] };

/** Parse with one named grammar, or with the configured fallback order for "auto". */
export function parseInput(source: SourceText, grammar: string, fallback: readonly GrammarName[]): ParsedInput {
  let order: readonly GrammarName[];
  if (grammar === "auto") {
    order = fallback;
  } else if (isGrammarName(grammar)) {
    order = [grammar];
  } else {
    throw new CliUsageError(`Unknown grammar '${grammar}'.`, `Use auto, ${GRAMMAR_NAMES.join(", ")}.`);
  }

  const result = parseWithFallback(source.text, order, source.file);
  if (result.ast && result.grammar) {
    return { ok: true, ast: result.ast, grammar: result.grammar };
  }
  return { ok: false, diagnostics: attemptDiagnostics(result.attempts) };
}

/** Report a failure on stderr and return its exit code: 4 for I/O, 2 otherwise. */
export function reportFailure(e: unknown, pretty: boolean): number {
  if (!(e instanceof MathTermError)) throw e;
  console.error(formatDiagnostic(e.toDiagnostic(), pretty));
  return e.code === "E_IO" ? 4 : 2;
}
