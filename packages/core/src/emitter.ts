/**
 * Tree-to-markup emitter: walks an AST and reports it as a bracketed
 * sequence of element events to an EventSink.
 */
import type * as AST from "./ast.js";
import { isOperatorSymbol } from "./ast.js";
import { numericParts } from "./numeric.js";
import { CONSTANT_ELEMENTS, MATHML_NAMESPACE_URI, OPERATOR_ELEMENTS } from "./vocabulary.js";

export type Attributes = Readonly<Record<string, string>>;

/**
 * Receiver of markup events. Every element lives in the namespace passed to
 * `prefixDeclaration`.
 */
export interface EventSink {
  startDocument(): void;
  endDocument(): void;
  prefixDeclaration(namespaceUri: string): void;
  open(name: string, attributes: Attributes): void;
  text(content: string): void;
  close(name: string): void;
}

const NO_ATTRIBUTES: Attributes = Object.freeze({});

/** Emit a whole document for `ast`. */
export function emit(ast: AST.Expr, sink: EventSink): void {
  sink.startDocument();
  sink.prefixDeclaration(MATHML_NAMESPACE_URI);
  emitNode(ast, sink);
  sink.endDocument();
}

function emitNode(node: AST.Expr, sink: EventSink): void {
  switch (node.kind) {
    case "Apply":
      emitApply(node, sink);
      return;
    case "Name": {
      const constant = CONSTANT_ELEMENTS.get(node.identifier);
      if (constant) {
        writeElement(sink, constant);
      } else {
        writeElement(sink, "ci", node.identifier);
      }
      return;
    }
    case "Const":
      emitConst(node, sink);
      return;
    case "Case":
      emitCase(node, sink);
      return;
    case "Collection":
      if (node.collection === "interval") {
        emitItems(sink, "interval", { closure: node.closure }, node.items);
      } else {
        emitItems(sink, "list", NO_ATTRIBUTES, node.items);
      }
      return;
  }
}

function emitApply(node: AST.Apply, sink: EventSink): void {
  sink.open("apply", NO_ATTRIBUTES);
  const element = isOperatorSymbol(node.operator) ? OPERATOR_ELEMENTS.get(node.operator) : undefined;
  if (element) {
    writeElement(sink, element);
  } else {
    writeElement(sink, "ci", node.operator);
  }
  for (const operand of node.operands) {
    emitNode(operand, sink);
  }
  sink.close("apply");
}

function emitConst(node: AST.Const, sink: EventSink): void {
  const value = node.value;
  if (value.type === "bool") {
    writeElement(sink, value.value ? "true" : "false");
    return;
  }

  const parts = numericParts(value);
  sink.open("cn", { type: value.type });
  sink.text(parts[0]);
  if (parts.length === 2) {
    writeElement(sink, "sep");
    sink.text(parts[1]);
  }
  sink.close("cn");
}

// Each piece carries its value first, then its condition
function emitCase(node: AST.Case, sink: EventSink): void {
  sink.open("piecewise", NO_ATTRIBUTES);
  for (const clause of node.clauses) {
    sink.open("piece", NO_ATTRIBUTES);
    emitNode(clause.value, sink);
    emitNode(clause.condition, sink);
    sink.close("piece");
  }
  if (node.otherwise) {
    sink.open("otherwise", NO_ATTRIBUTES);
    emitNode(node.otherwise, sink);
    sink.close("otherwise");
  }
  sink.close("piecewise");
}

function emitItems(sink: EventSink, name: string, attributes: Attributes, items: readonly AST.Expr[]): void {
  sink.open(name, attributes);
  for (const item of items) {
    emitNode(item, sink);
  }
  sink.close(name);
}

function writeElement(sink: EventSink, name: string, content?: string): void {
  sink.open(name, NO_ATTRIBUTES);
  if (content) {
    sink.text(content);
  }
  sink.close(name);
}
