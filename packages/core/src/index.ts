/**
 * @mathterm/core - term parsing, content markup and notations
 */
export * from "./ast.js";
export * from "./numeric.js";
export * from "./diagnostics.js";
export * from "./errors.js";
export { parseTerm, parseBoolExpression, parseTermList } from "./parser.js";
export {
  GRAMMARS,
  GRAMMAR_NAMES,
  DEFAULT_FALLBACK,
  isGrammarName,
  safeParse,
  parseWithFallback,
} from "./grammars.js";
export type { GrammarName, ParseOutcome, FallbackResult } from "./grammars.js";
export {
  MATHML_NAMESPACE_URI,
  OPERATOR_ELEMENTS,
  CONSTANT_ELEMENTS,
  ELEMENT_OPERATORS,
  ELEMENT_CONSTANTS,
} from "./vocabulary.js";
export { emit } from "./emitter.js";
export type { EventSink, Attributes } from "./emitter.js";
export { extract } from "./extractor.js";
export type { MarkupView } from "./extractor.js";
export { registerNotation, getNotation, listNotations, render } from "./builders/registry.js";
export type { NotationBuilder } from "./builders/types.js";
export { infixBuilder } from "./builders/infix.js";
export { prefixBuilder, postfixBuilder } from "./builders/positional.js";
export { resolveConfig, loadConfig, loadConfigFile, configSchema, DEFAULT_CONFIG, PROJECT_CONFIG_FILE } from "./config.js";
export type { MathTermConfig, ResolvedConfig } from "./config.js";
export { formatTree } from "./formatter.js";
