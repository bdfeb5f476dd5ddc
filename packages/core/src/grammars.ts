/**
 * Named entry grammars and caller-level composition over them.
 *
 * The parsers never fall back on their own. A caller that does not know
 * whether its input is a term or a boolean expression lists the grammars to
 * try, in order, and gets every attempt back.
 */
import type { Expr } from "./ast.js";
import { ParseError } from "./errors.js";
import { parseBoolExpression, parseTerm, parseTermList } from "./parser.js";

export type GrammarName = "term" | "bool" | "list";

export const GRAMMARS: ReadonlyMap<GrammarName, (text: string, file?: string) => Expr> = new Map<
  GrammarName,
  (text: string, file?: string) => Expr
>([
  ["term", parseTerm],
  ["bool", parseBoolExpression],
  ["list", parseTermList],
]);

export const GRAMMAR_NAMES: readonly GrammarName[] = ["term", "bool", "list"];

/** The usual order: an arithmetic term first, then a boolean expression. */
export const DEFAULT_FALLBACK: readonly GrammarName[] = ["term", "bool"];

export function isGrammarName(value: string): value is GrammarName {
  return (GRAMMAR_NAMES as readonly string[]).includes(value);
}

export type ParseOutcome =
  | { ok: true; grammar: GrammarName; ast: Expr }
  | { ok: false; grammar: GrammarName; error: ParseError };

export interface FallbackResult {
  ast?: Expr;
  grammar?: GrammarName;
  attempts: ParseOutcome[];
}

/** Parse with one grammar, reporting a syntax error as a value. */
export function safeParse(grammar: GrammarName, text: string, file?: string): ParseOutcome {
  const parse = GRAMMARS.get(grammar);
  if (!parse) {
    throw new Error(`Unknown grammar '${grammar}'`);
  }
  try {
    return { ok: true, grammar, ast: parse(text, file) };
  } catch (e) {
    if (e instanceof ParseError) {
      return { ok: false, grammar, error: e };
    }
    throw e;
  }
}

/**
 * Try each grammar in order and stop at the first that accepts the whole
 * input. When none does, `ast` is undefined and `attempts` holds one failure
 * per grammar.
 */
export function parseWithFallback(
  text: string,
  order: readonly GrammarName[] = DEFAULT_FALLBACK,
  file?: string
): FallbackResult {
  const attempts: ParseOutcome[] = [];
  for (const grammar of order) {
    const outcome = safeParse(grammar, text, file);
    attempts.push(outcome);
    if (outcome.ok) {
      return { ast: outcome.ast, grammar, attempts };
    }
  }
  return { attempts };
}
