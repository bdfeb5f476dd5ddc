/**
 * Infix notation builder.
 * Output parses back to the same tree: parentheses appear only where the
 * precedence table needs them.
 */
import type * as AST from "../ast.js";
import { isOperatorSymbol, isRelational } from "../ast.js";
import type { NumericLiteral } from "../numeric.js";
import { isImaginary, isNegative, numericText } from "../numeric.js";
import type { NotationBuilder } from "./types.js";

// Binding priority (higher = tighter), mirroring the parser's rule levels
const PRECEDENCE: Record<string, number> = {
  "or": 1,
  "and": 2,
  "not": 3,
  "=": 4, "<>": 4, "!=": 4, ">": 4, ">=": 4, "<=": 4, "<": 4,
  "+": 5, "-": 5,
  "*": 6, "/": 6,
  "|": 7,
  "^": 9,
};
const UNARY_PRIORITY = 8;
const ATOM_PRIORITY = 10;

const SPACED_OPERATORS = new Set(["and", "or"]);

const INTERVAL_BRACKETS: Record<AST.Closure, [string, string]> = {
  "open": ["(", ")"],
  "closed": ["[", "]"],
  "open-closed": ["(", "]"],
  "closed-open": ["[", ")"],
};

function isWrappedComplex(value: NumericLiteral): boolean {
  return value.type === "complex" && !isImaginary(value);
}

function isPrefixOperator(node: AST.Apply): boolean {
  return node.operands.length === 1 && isOperatorSymbol(node.operator);
}

function priorityOf(node: AST.Expr): number {
  switch (node.kind) {
    case "Apply":
      if (!isOperatorSymbol(node.operator)) return ATOM_PRIORITY;
      if (isPrefixOperator(node)) {
        return node.operator === "not" ? PRECEDENCE["not"] : UNARY_PRIORITY;
      }
      return PRECEDENCE[node.operator] ?? ATOM_PRIORITY;
    case "Const":
      // a leading sign reads back as unary minus
      return isNegative(node.value) && !isWrappedComplex(node.value) ? UNARY_PRIORITY : ATOM_PRIORITY;
    default:
      return ATOM_PRIORITY;
  }
}

function needsParens(child: AST.Expr, parentOp: string, isRight: boolean): boolean {
  const childPrec = priorityOf(child);
  const parentPrec = PRECEDENCE[parentOp] ?? ATOM_PRIORITY;
  if (childPrec < parentPrec) return true;
  if (childPrec > parentPrec) return false;
  // Same level: relational operators do not chain, power groups to the right,
  // everything else groups to the left
  if (isRelational(parentOp)) return true;
  if (parentOp === "^") return !isRight;
  return isRight;
}

export function buildInfix(node: AST.Expr): string {
  switch (node.kind) {
    case "Name":
      return node.identifier;
    case "Const": {
      const text = numericText(node.value);
      // 1+0.3i is a single literal, keep it together
      return isWrappedComplex(node.value) ? `(${text})` : text;
    }
    case "Apply":
      return buildApply(node);
    case "Case":
      return buildCase(node);
    case "Collection": {
      const items = node.items.map(buildInfix).join(", ");
      if (node.collection === "list") return `{${items}}`;
      const [open, close] = INTERVAL_BRACKETS[node.closure];
      return `${open}${items}${close}`;
    }
  }
}

function buildApply(node: AST.Apply): string {
  const op = node.operator;
  if (!isOperatorSymbol(op)) {
    return `${op}(${node.operands.map(buildInfix).join(", ")})`;
  }

  if (isPrefixOperator(node)) {
    const operand = node.operands[0];
    const ownPrec = priorityOf(node);
    let operandStr = buildInfix(operand);
    if (priorityOf(operand) < ownPrec) operandStr = `(${operandStr})`;
    return op === "not" ? `not ${operandStr}` : `${op}${operandStr}`;
  }

  const separator = SPACED_OPERATORS.has(op) ? ` ${op} ` : op;
  return node.operands
    .map((operand, index) => {
      const str = buildInfix(operand);
      return needsParens(operand, op, index > 0) ? `(${str})` : str;
    })
    .join(separator);
}

// A case in the default slot continues the same CASE as further WHEN clauses
function buildCase(node: AST.Case): string {
  const parts = ["CASE"];
  let current: AST.Case | undefined = node;
  while (current) {
    for (const clause of current.clauses) {
      parts.push(`WHEN ${buildInfix(clause.condition)} THEN ${buildInfix(clause.value)}`);
    }
    const otherwise: AST.Expr | undefined = current.otherwise;
    current = undefined;
    if (otherwise?.kind === "Case") {
      current = otherwise;
    } else if (otherwise) {
      parts.push(`ELSE ${buildInfix(otherwise)}`);
    }
  }
  parts.push("END");
  return parts.join(" ");
}

export const infixBuilder: NotationBuilder = {
  name: "infix",
  build: buildInfix,
};
