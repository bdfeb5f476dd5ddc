/**
 * Term lexer using Chevrotain.
 */
import { createToken, Lexer } from "chevrotain";

// Identifiers may be dot-qualified (a.b.c); no scoping is implied
export const Ident = createToken({
  name: "Ident",
  pattern: /[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*/,
});

// Keywords are case-insensitive and fall back to Ident when followed by more name characters
export const Case = createToken({ name: "Case", pattern: /case/i, longer_alt: Ident });
export const When = createToken({ name: "When", pattern: /when/i, longer_alt: Ident });
export const Then = createToken({ name: "Then", pattern: /then/i, longer_alt: Ident });
export const Else = createToken({ name: "Else", pattern: /else/i, longer_alt: Ident });
export const End = createToken({ name: "End", pattern: /end/i, longer_alt: Ident });
export const And = createToken({ name: "And", pattern: /and/i, longer_alt: Ident });
export const Or = createToken({ name: "Or", pattern: /or/i, longer_alt: Ident });
export const Not = createToken({ name: "Not", pattern: /not/i, longer_alt: Ident });
export const True = createToken({ name: "True", pattern: /true/i, longer_alt: Ident });
export const False = createToken({ name: "False", pattern: /false/i, longer_alt: Ident });

// Literals (no leading sign: unary minus is an operator).
// Order matters: the first matching pattern wins, so suffixed forms come first.
export const RationalLit = createToken({
  name: "RationalLit",
  pattern: /(?:\d+(?:\.\d+)?|\.\d+)\/(?:\d+(?:\.\d+)?|\.\d+)r/,
});
export const ComplexLit = createToken({
  name: "ComplexLit",
  pattern: /(?:\d+(?:\.\d+)?|\.\d+)i/,
});
export const ENotationLit = createToken({
  name: "ENotationLit",
  pattern: /(?:\d+(?:\.\d+)?|\.\d+)[eE][+-]?\d+/,
});
export const DecimalLit = createToken({
  name: "DecimalLit",
  pattern: /\d+\.\d+|\.\d+/,
});
export const IntLit = createToken({
  name: "IntLit",
  pattern: /\d+/,
});

// Operator categories keep mixed operators in source order inside one CST node
export const RelationalOp = createToken({ name: "RelationalOp", pattern: Lexer.NA });
export const AdditiveOp = createToken({ name: "AdditiveOp", pattern: Lexer.NA });
export const MultiplicativeOp = createToken({ name: "MultiplicativeOp", pattern: Lexer.NA });

// Relational operators (multi-char before single-char)
export const GtEq = createToken({ name: "GtEq", pattern: />=/, categories: RelationalOp });
export const LtEq = createToken({ name: "LtEq", pattern: /<=/, categories: RelationalOp });
export const LtGt = createToken({ name: "LtGt", pattern: /<>/, categories: RelationalOp });
export const BangEq = createToken({ name: "BangEq", pattern: /!=/, categories: RelationalOp });
export const Gt = createToken({ name: "Gt", pattern: />/, categories: RelationalOp });
export const Lt = createToken({ name: "Lt", pattern: /</, categories: RelationalOp });
export const Equals = createToken({ name: "Equals", pattern: /=/, categories: RelationalOp });

// Arithmetic operators
export const Plus = createToken({ name: "Plus", pattern: /\+/, categories: AdditiveOp });
export const Minus = createToken({ name: "Minus", pattern: /-/, categories: AdditiveOp });
export const Star = createToken({ name: "Star", pattern: /\*/, categories: MultiplicativeOp });
export const Slash = createToken({ name: "Slash", pattern: /\//, categories: MultiplicativeOp });
export const Pipe = createToken({ name: "Pipe", pattern: /\|/ });
export const Caret = createToken({ name: "Caret", pattern: /\^/ });

// Punctuation
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const LBracket = createToken({ name: "LBracket", pattern: /\[/ });
export const RBracket = createToken({ name: "RBracket", pattern: /\]/ });
export const LBrace = createToken({ name: "LBrace", pattern: /\{/ });
export const RBrace = createToken({ name: "RBrace", pattern: /\}/ });
export const Comma = createToken({ name: "Comma", pattern: /,/ });

export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /\s+/,
  group: Lexer.SKIPPED,
});

// Token order matters: longer/more specific tokens first
export const allTokens = [
  WhiteSpace,
  // Multi-char operators first (order critical)
  GtEq,
  LtEq,
  LtGt,
  BangEq,
  // Keywords (before Ident)
  Case,
  When,
  Then,
  Else,
  End,
  And,
  Or,
  Not,
  True,
  False,
  // Literals
  RationalLit,
  ComplexLit,
  ENotationLit,
  DecimalLit,
  IntLit,
  Ident,
  // Single-char operators & punctuation
  Gt,
  Lt,
  Equals,
  Plus,
  Minus,
  Star,
  Slash,
  Pipe,
  Caret,
  LParen,
  RParen,
  LBracket,
  RBracket,
  LBrace,
  RBrace,
  Comma,
  // Categories
  RelationalOp,
  AdditiveOp,
  MultiplicativeOp,
];

export const TermLexer = new Lexer(allTokens);
