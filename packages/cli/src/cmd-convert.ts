/**
 * mathterm convert - expression to content MathML or another notation,
 * or content MathML back to an expression
 */
import { formatDiagnostics, formatTree, render } from "@mathterm/core";
import type { Expr } from "@mathterm/core";
import { fromXml, toXml } from "@mathterm/markup";
import { CliUsageError, loadSettings, parseInput, readInput, reportFailure, resolveInput } from "./input.js";
import type { CommonOptions } from "./input.js";

export interface ConvertOptions extends CommonOptions {
  file?: string;
  from?: string;
  grammar?: string;
  to?: string;
  indent?: string;
}

function parseIndent(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 8) {
    throw new CliUsageError(`Invalid indent '${value}'.`, "Use a whole number from 0 to 8.");
  }
  return n;
}

export async function runConvert(expression: string | undefined, opts: ConvertOptions): Promise<number> {
  const pretty = !!opts.pretty;
  try {
    const config = loadSettings(opts);
    const source = readInput(resolveInput(expression, opts.file));

    let ast: Expr;
    const from = opts.from ?? "text";
    if (from === "mathml") {
      ast = fromXml(source.text);
    } else if (from === "text") {
      const parsed = parseInput(source, opts.grammar ?? config.grammar, config.fallback);
      if (!parsed.ok) {
        console.error(formatDiagnostics(parsed.diagnostics, pretty));
        return 2;
      }
      ast = parsed.ast;
    } else {
      throw new CliUsageError(`Unknown input format '${from}'.`, "Use text or mathml.");
    }

    const target = opts.to ?? config.notation;
    if (target === "mathml") {
      const indent = parseIndent(opts.indent, config.indent);
      console.log(toXml(ast, { indent }).trimEnd());
    } else if (target === "ast") {
      console.log(formatTree(ast).trimEnd());
    } else {
      console.log(render(ast, target));
    }
    return 0;
  } catch (e) {
    return reportFailure(e, pretty);
  }
}
