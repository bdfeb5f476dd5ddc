/**
 * @mathterm/markup - in-process content markup documents
 */
import { emit, extract } from "@mathterm/core";
import type { Expr } from "@mathterm/core";
import type { MarkupElement } from "./element.js";
import { readXml } from "./xml-reader.js";
import { TreeBuilderSink } from "./tree-sink.js";
import { XmlWriterSink } from "./xml-writer.js";
import type { XmlWriterOptions } from "./xml-writer.js";

export { MarkupElement, element } from "./element.js";
export type { MarkupNode } from "./element.js";
export { TreeBuilderSink, MarkupStructureError, replay } from "./tree-sink.js";
export { XmlWriterSink } from "./xml-writer.js";
export type { XmlWriterOptions } from "./xml-writer.js";
export { readXml } from "./xml-reader.js";

/** Build the markup document for `ast`. */
export function toMarkup(ast: Expr): MarkupElement {
  const sink = new TreeBuilderSink();
  emit(ast, sink);
  return sink.document();
}

/** Write the markup document for `ast` as XML text. */
export function toXml(ast: Expr, options: XmlWriterOptions = {}): string {
  const writer = new XmlWriterSink(options);
  emit(ast, writer);
  return writer.toString();
}

/** Build a document from XML text. */
export function parseMarkup(xml: string): MarkupElement {
  const sink = new TreeBuilderSink();
  readXml(xml, sink);
  return sink.document();
}

/** The content below a `<math>` wrapper, or the element itself. */
export function contentRoot(root: MarkupElement): MarkupElement {
  const children = root.children();
  if (root.localName === "math" && children.length === 1) {
    return children[0];
  }
  return root;
}

/** Read content markup text back into an AST. */
export function fromXml(xml: string): Expr {
  return extract(contentRoot(parseMarkup(xml)));
}
