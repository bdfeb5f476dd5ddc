/**
 * mathterm show - walk one expression through every representation
 */
import { extract, formatDiagnostics, formatTree, render } from "@mathterm/core";
import { XmlWriterSink, replay, toMarkup } from "@mathterm/markup";
import { loadSettings, parseInput, readInput, reportFailure, resolveInput } from "./input.js";
import type { CommonOptions } from "./input.js";

export interface ShowOptions extends CommonOptions {
  file?: string;
  grammar?: string;
  json?: boolean;
}

export async function runShow(expression: string | undefined, opts: ShowOptions): Promise<number> {
  const pretty = !!opts.pretty;
  try {
    const config = loadSettings(opts);
    const source = readInput(resolveInput(expression, opts.file));
    const parsed = parseInput(source, opts.grammar ?? config.grammar, config.fallback);
    if (!parsed.ok) {
      console.error(formatDiagnostics(parsed.diagnostics, pretty));
      return 2;
    }

    // Everything below works from the tree read back out of the document
    const doc = toMarkup(parsed.ast);
    const writer = new XmlWriterSink({ indent: config.indent });
    replay(doc, writer);
    const ast = extract(doc);
    const mathml = writer.toString().trimEnd();
    const infix = render(ast, "infix");
    const prefix = render(ast, "prefix");
    const postfix = render(ast, "postfix");

    if (opts.json) {
      console.log(
        JSON.stringify({ input: source.text, grammar: parsed.grammar, mathml, infix, prefix, postfix }, null, 2)
      );
      return 0;
    }

    console.log(
      [
        `Input:    ${source.text.trim()}`,
        `Grammar:  ${parsed.grammar}`,
        "MathML:",
        mathml,
        "AST:",
        formatTree(ast).trimEnd(),
        `Infix:    ${infix}`,
        `Prefix:   ${prefix}`,
        `Postfix:  ${postfix}`,
      ].join("\n")
    );
    return 0;
  } catch (e) {
    return reportFailure(e, pretty);
  }
}
