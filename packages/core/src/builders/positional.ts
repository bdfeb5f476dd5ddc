/**
 * Prefix and postfix notation builders.
 *
 * Tokens are space separated and never parenthesised. An operator whose
 * operand count differs from its natural arity says so with an `@N` suffix
 * (`-@1 x` is a negation), so every token stream reads back one way.
 */
import type * as AST from "../ast.js";
import { isOperatorSymbol } from "../ast.js";
import { numericText } from "../numeric.js";
import type { NotationBuilder } from "./types.js";

type Placement = "prefix" | "postfix";

const INTERVAL_TOKENS: Record<AST.Closure, string> = {
  "open": "interval()",
  "closed": "interval[]",
  "open-closed": "interval(]",
  "closed-open": "interval[)",
};

function naturalArity(operator: string): number {
  if (!isOperatorSymbol(operator)) return 1;
  return operator === "not" ? 1 : 2;
}

function head(token: string, count: number, natural?: number): string {
  return count === natural ? token : `${token}@${count}`;
}

function caseOperands(node: AST.Case): AST.Expr[] {
  const operands = node.clauses.flatMap((clause) => [clause.condition, clause.value]);
  if (node.otherwise) operands.push(node.otherwise);
  return operands;
}

interface Branch {
  operator: string;
  operands: readonly AST.Expr[];
}

function branchOf(node: AST.Apply | AST.Case | AST.Collection): Branch {
  switch (node.kind) {
    case "Apply":
      return {
        operator: head(node.operator, node.operands.length, naturalArity(node.operator)),
        operands: node.operands,
      };
    case "Case": {
      const operands = caseOperands(node);
      return { operator: head("case", operands.length, 2), operands };
    }
    case "Collection":
      return {
        operator: node.collection === "list"
          ? head("list", node.items.length)
          : INTERVAL_TOKENS[node.closure],
        operands: node.items,
      };
  }
}

function collect(node: AST.Expr, placement: Placement, out: string[]): void {
  if (node.kind === "Name") {
    out.push(node.identifier);
    return;
  }
  if (node.kind === "Const") {
    out.push(numericText(node.value));
    return;
  }

  const { operator, operands } = branchOf(node);
  if (placement === "prefix") out.push(operator);
  for (const operand of operands) {
    collect(operand, placement, out);
  }
  if (placement === "postfix") out.push(operator);
}

function positionalBuilder(placement: Placement): NotationBuilder {
  return {
    name: placement,
    build(ast: AST.Expr): string {
      const out: string[] = [];
      collect(ast, placement, out);
      return out.join(" ");
    },
  };
}

export const prefixBuilder: NotationBuilder = positionalBuilder("prefix");
export const postfixBuilder: NotationBuilder = positionalBuilder("postfix");
