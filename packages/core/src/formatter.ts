/**
 * AST pretty-printer: one node per line, children indented below their
 * parent. Deterministic, so it doubles as a readable test oracle.
 */
import type * as AST from "./ast.js";
import { numericText } from "./numeric.js";

const INDENT = "  ";

export function formatTree(ast: AST.Expr): string {
  const lines: string[] = [];
  formatNode(ast, 0, lines);
  return lines.join("\n") + "\n";
}

function formatNode(node: AST.Expr, depth: number, lines: string[]): void {
  const prefix = INDENT.repeat(depth);
  switch (node.kind) {
    case "Name":
      lines.push(`${prefix}Name ${node.identifier}`);
      return;
    case "Const":
      lines.push(`${prefix}Const ${node.value.type} ${numericText(node.value)}`);
      return;
    case "Apply":
      lines.push(`${prefix}Apply ${node.operator}`);
      for (const operand of node.operands) {
        formatNode(operand, depth + 1, lines);
      }
      return;
    case "Case":
      lines.push(`${prefix}Case`);
      for (const clause of node.clauses) {
        formatLabeled("when", clause.condition, depth + 1, lines);
        formatLabeled("then", clause.value, depth + 1, lines);
      }
      if (node.otherwise) {
        formatLabeled("otherwise", node.otherwise, depth + 1, lines);
      }
      return;
    case "Collection":
      lines.push(node.collection === "list" ? `${prefix}List` : `${prefix}Interval ${node.closure}`);
      for (const item of node.items) {
        formatNode(item, depth + 1, lines);
      }
      return;
  }
}

function formatLabeled(label: string, node: AST.Expr, depth: number, lines: string[]): void {
  lines.push(`${INDENT.repeat(depth)}${label}`);
  formatNode(node, depth + 1, lines);
}
