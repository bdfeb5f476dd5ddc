/**
 * Notation builder registry. `infix`, `prefix` and `postfix` are always
 * present; callers may register more under new names.
 */
import type { Expr } from "../ast.js";
import { UnknownNotationError } from "../errors.js";
import { infixBuilder } from "./infix.js";
import { postfixBuilder, prefixBuilder } from "./positional.js";
import type { NotationBuilder } from "./types.js";

const registry = new Map<string, NotationBuilder>([
  [infixBuilder.name, infixBuilder],
  [prefixBuilder.name, prefixBuilder],
  [postfixBuilder.name, postfixBuilder],
]);

export function registerNotation(builder: NotationBuilder): void {
  registry.set(builder.name, builder);
}

export function getNotation(name: string): NotationBuilder | undefined {
  return registry.get(name);
}

export function listNotations(): string[] {
  return [...registry.keys()];
}

export function render(ast: Expr, notation: string): string {
  const builder = registry.get(notation);
  if (!builder) {
    throw new UnknownNotationError(notation, listNotations());
  }
  return builder.build(ast);
}
