/**
 * mathterm AST node definitions.
 *
 * The tree is immutable: producers (parser, extractor) build it once and
 * consumers (emitter, notation builders) only read it.
 */
import type { NumericLiteral } from "./numeric.js";
import { bool } from "./numeric.js";

export const ARITHMETIC_OPERATORS = ["+", "-", "*", "/", "^", "|"] as const;
export const RELATIONAL_OPERATORS = ["=", "<>", "!=", ">", ">=", "<=", "<"] as const;
export const BOOLEAN_OPERATORS = ["and", "or", "not"] as const;

export type ArithmeticOperator = (typeof ARITHMETIC_OPERATORS)[number];
export type RelationalOperator = (typeof RELATIONAL_OPERATORS)[number];
export type BooleanOperator = (typeof BOOLEAN_OPERATORS)[number];
export type OperatorSymbol = ArithmeticOperator | RelationalOperator | BooleanOperator;

const SYMBOLS: ReadonlySet<string> = new Set<string>([
  ...ARITHMETIC_OPERATORS,
  ...RELATIONAL_OPERATORS,
  ...BOOLEAN_OPERATORS,
]);

export function isOperatorSymbol(op: string): op is OperatorSymbol {
  return SYMBOLS.has(op);
}

export function isRelational(op: string): op is RelationalOperator {
  return (RELATIONAL_OPERATORS as readonly string[]).includes(op);
}

/** Names bound to symbolic constants rather than free variables. */
export const SYMBOLIC_CONSTANTS = ["pi", "e", "i", "true", "false"] as const;

// --- Nodes ---

/** Operator or function application. `operator` is a symbol or a function identifier. */
export interface Apply {
  readonly kind: "Apply";
  readonly operator: string;
  readonly operands: readonly Expr[];
}

export interface Name {
  readonly kind: "Name";
  readonly identifier: string;
}

export interface Const {
  readonly kind: "Const";
  readonly value: NumericLiteral;
}

export interface CaseClause {
  readonly condition: Expr;
  readonly value: Expr;
}

export interface Case {
  readonly kind: "Case";
  readonly clauses: readonly CaseClause[];
  readonly otherwise?: Expr;
}

export type Closure = "open" | "closed" | "open-closed" | "closed-open";

export const CLOSURES: readonly Closure[] = ["open", "closed", "open-closed", "closed-open"];

export interface ListCollection {
  readonly kind: "Collection";
  readonly collection: "list";
  readonly items: readonly Expr[];
}

export interface IntervalCollection {
  readonly kind: "Collection";
  readonly collection: "interval";
  readonly closure: Closure;
  readonly items: readonly [Expr, Expr];
}

export type Collection = ListCollection | IntervalCollection;

export type Expr = Apply | Name | Const | Case | Collection;

// --- Constructors ---

export function apply(operator: string, operands: readonly Expr[]): Apply {
  if (operator.length === 0) {
    throw new TypeError("Apply needs an operator.");
  }
  if (operands.length === 0) {
    throw new TypeError(`Apply '${operator}' needs at least one operand.`);
  }
  return { kind: "Apply", operator, operands: [...operands] };
}

export function name(identifier: string): Name {
  return { kind: "Name", identifier };
}

export function constant(value: NumericLiteral): Const {
  return { kind: "Const", value };
}

export function truth(value: boolean): Const {
  return constant(bool(value));
}

export function caseOf(clauses: readonly CaseClause[], otherwise?: Expr): Case {
  if (clauses.length === 0) {
    throw new TypeError("Case needs at least one clause.");
  }
  const node: Case = otherwise === undefined
    ? { kind: "Case", clauses: [...clauses] }
    : { kind: "Case", clauses: [...clauses], otherwise };
  return node;
}

export function list(items: readonly Expr[]): ListCollection {
  return { kind: "Collection", collection: "list", items: [...items] };
}

export function interval(closure: Closure, items: readonly Expr[]): IntervalCollection {
  if (items.length !== 2) {
    throw new TypeError(`An interval has exactly 2 items, got ${items.length}.`);
  }
  return { kind: "Collection", collection: "interval", closure, items: [items[0], items[1]] };
}

export function isClosure(value: string): value is Closure {
  return (CLOSURES as readonly string[]).includes(value);
}
