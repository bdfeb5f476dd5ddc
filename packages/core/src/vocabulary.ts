/**
 * Content markup vocabulary: element names and the static tables that map
 * operators and symbolic constants to them and back.
 */
import type { OperatorSymbol } from "./ast.js";

export const MATHML_NAMESPACE_URI = "http://www.w3.org/1998/Math/MathML";

export const OPERATOR_ELEMENTS: ReadonlyMap<OperatorSymbol, string> = new Map<OperatorSymbol, string>([
  ["+", "plus"],
  ["-", "minus"],
  ["*", "times"],
  ["/", "divide"],
  ["^", "power"],
  ["|", "factorof"],
  ["=", "eq"],
  ["<>", "neq"],
  ["!=", "neq"],
  [">", "gt"],
  [">=", "geq"],
  ["<=", "leq"],
  ["<", "lt"],
  ["and", "and"],
  ["or", "or"],
  ["not", "not"],
]);

export const CONSTANT_ELEMENTS: ReadonlyMap<string, string> = new Map<string, string>([
  ["true", "true"],
  ["false", "false"],
  ["pi", "pi"],
  ["i", "imaginaryi"],
  ["e", "exponentiale"],
]);

function invert<K, V>(map: ReadonlyMap<K, V>): ReadonlyMap<V, K> {
  const inverse = new Map<V, K>();
  for (const [key, value] of map) {
    // first entry wins: neq reads back as <>
    if (!inverse.has(value)) inverse.set(value, key);
  }
  return inverse;
}

export const ELEMENT_OPERATORS: ReadonlyMap<string, OperatorSymbol> = invert(OPERATOR_ELEMENTS);
export const ELEMENT_CONSTANTS: ReadonlyMap<string, string> = invert(CONSTANT_ELEMENTS);
