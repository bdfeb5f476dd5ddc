/**
 * mathterm check - syntax check without conversion
 */
import { formatDiagnostics } from "@mathterm/core";
import { loadSettings, parseInput, readInput, reportFailure, resolveInput } from "./input.js";
import type { CommonOptions } from "./input.js";

export interface CheckOptions extends CommonOptions {
  file?: string;
  grammar?: string;
}

export async function runCheck(expression: string | undefined, opts: CheckOptions): Promise<number> {
  const pretty = !!opts.pretty;
  try {
    const config = loadSettings(opts);
    const source = readInput(resolveInput(expression, opts.file));
    const parsed = parseInput(source, opts.grammar ?? config.grammar, config.fallback);
    if (!parsed.ok) {
      console.error(formatDiagnostics(parsed.diagnostics, pretty));
      return 2;
    }

    if (pretty) {
      console.log(`No errors found (${parsed.grammar} grammar).`);
    } else {
      console.log("[]");
    }
    return 0;
  } catch (e) {
    return reportFailure(e, pretty);
  }
}
