import type { Expr } from "../ast.js";

/** Converts an AST into one textual surface syntax. */
export interface NotationBuilder {
  readonly name: string;
  build(ast: Expr): string;
}
