/**
 * Term parser using Chevrotain.
 * Produces a mathterm AST from text, in three entry grammars: term,
 * boolean expression and term list.
 */
import { CstParser, EOF, type CstElement, type CstNode, type IToken } from "chevrotain";
import {
  allTokens,
  TermLexer,
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
  RationalLit,
  ComplexLit,
  ENotationLit,
  DecimalLit,
  IntLit,
  Ident,
  RelationalOp,
  AdditiveOp,
  MultiplicativeOp,
  Minus,
  Pipe,
  Caret,
  LParen,
  RParen,
  LBracket,
  RBracket,
  LBrace,
  RBrace,
  Comma,
} from "./lexer.js";
import * as AST from "./ast.js";
import type { Expr, ListCollection } from "./ast.js";
import { spanAt } from "./diagnostics.js";
import { ParseError } from "./errors.js";
import { complex, decimal, eNotation, integer, rational } from "./numeric.js";

class TermCstParser extends CstParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false });
    this.performSelfAnalysis();
  }

  // --- Entry rules ---

  term = this.RULE("term", () => {
    this.SUBRULE(this.relExpr);
  });

  boolExpression = this.RULE("boolExpression", () => {
    this.SUBRULE(this.orExpr);
  });

  termList = this.RULE("termList", () => {
    this.SUBRULE(this.relExpr);
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.relExpr);
    });
  });

  // --- Precedence levels, loosest first ---

  orExpr = this.RULE("orExpr", () => {
    this.SUBRULE(this.andExpr);
    this.MANY(() => {
      this.CONSUME(Or);
      this.SUBRULE2(this.andExpr);
    });
  });

  andExpr = this.RULE("andExpr", () => {
    this.SUBRULE(this.notExpr);
    this.MANY(() => {
      this.CONSUME(And);
      this.SUBRULE2(this.notExpr);
    });
  });

  notExpr = this.RULE("notExpr", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Not);
          this.SUBRULE(this.notExpr);
        },
      },
      { ALT: () => this.SUBRULE(this.relExpr) },
    ]);
  });

  // non-chaining: at most one relational operator
  relExpr = this.RULE("relExpr", () => {
    this.SUBRULE(this.addExpr);
    this.OPTION(() => {
      this.CONSUME(RelationalOp);
      this.SUBRULE2(this.addExpr);
    });
  });

  addExpr = this.RULE("addExpr", () => {
    this.SUBRULE(this.mulExpr);
    this.MANY(() => {
      this.CONSUME(AdditiveOp);
      this.SUBRULE2(this.mulExpr);
    });
  });

  mulExpr = this.RULE("mulExpr", () => {
    this.SUBRULE(this.factorExpr);
    this.MANY(() => {
      this.CONSUME(MultiplicativeOp);
      this.SUBRULE2(this.factorExpr);
    });
  });

  factorExpr = this.RULE("factorExpr", () => {
    this.SUBRULE(this.unaryExpr);
    this.MANY(() => {
      this.CONSUME(Pipe);
      this.SUBRULE2(this.unaryExpr);
    });
  });

  unaryExpr = this.RULE("unaryExpr", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Minus);
          this.SUBRULE(this.unaryExpr);
        },
      },
      { ALT: () => this.SUBRULE(this.powerExpr) },
    ]);
  });

  // right-associative: the exponent is parsed as a unary expression again
  powerExpr = this.RULE("powerExpr", () => {
    this.SUBRULE(this.atom);
    this.OPTION(() => {
      this.CONSUME(Caret);
      this.SUBRULE(this.unaryExpr);
    });
  });

  atom = this.RULE("atom", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.literal) },
      { ALT: () => this.SUBRULE(this.caseExpr) },
      { ALT: () => this.SUBRULE(this.listExpr) },
      { ALT: () => this.SUBRULE(this.bracketExpr) },
      { ALT: () => this.SUBRULE(this.parenExpr) },
      { ALT: () => this.SUBRULE(this.identOrFnCall) },
    ]);
  });

  literal = this.RULE("literal", () => {
    this.OR([
      { ALT: () => this.CONSUME(RationalLit) },
      { ALT: () => this.CONSUME(ComplexLit) },
      { ALT: () => this.CONSUME(ENotationLit) },
      { ALT: () => this.CONSUME(DecimalLit) },
      { ALT: () => this.CONSUME(IntLit) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
    ]);
  });

  caseExpr = this.RULE("caseExpr", () => {
    this.CONSUME(Case);
    this.AT_LEAST_ONE(() => {
      this.CONSUME(When);
      this.SUBRULE(this.orExpr);
      this.CONSUME(Then);
      this.SUBRULE2(this.orExpr);
    });
    this.OPTION(() => {
      this.CONSUME(Else);
      this.SUBRULE3(this.orExpr);
    });
    this.CONSUME(End);
  });

  listExpr = this.RULE("listExpr", () => {
    this.CONSUME(LBrace);
    this.OPTION(() => {
      this.SUBRULE(this.orExpr);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.orExpr);
      });
    });
    this.CONSUME(RBrace);
  });

  // [a, b] or [a, b)
  bracketExpr = this.RULE("bracketExpr", () => {
    this.CONSUME(LBracket);
    this.SUBRULE(this.orExpr);
    this.CONSUME(Comma);
    this.SUBRULE2(this.orExpr);
    this.OR([
      { ALT: () => this.CONSUME(RBracket) },
      { ALT: () => this.CONSUME(RParen) },
    ]);
  });

  // (x), or the intervals (a, b) and (a, b]
  parenExpr = this.RULE("parenExpr", () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.orExpr);
    this.OR([
      { ALT: () => this.CONSUME(RParen) },
      {
        ALT: () => {
          this.CONSUME(Comma);
          this.SUBRULE2(this.orExpr);
          this.OR2([
            { ALT: () => this.CONSUME2(RParen) },
            { ALT: () => this.CONSUME(RBracket) },
          ]);
        },
      },
    ]);
  });

  // ident that might be followed by an argument list (function call)
  identOrFnCall = this.RULE("identOrFnCall", () => {
    this.CONSUME(Ident);
    this.OPTION(() => {
      this.CONSUME(LParen);
      this.SUBRULE(this.orExpr);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.orExpr);
      });
      this.CONSUME(RParen);
    });
  });
}

// Singleton parser instance, built once at module load
const cstParser = new TermCstParser();

// --- CST helpers ---

function isCstNode(el: CstElement): el is CstNode {
  return "children" in el;
}

function nodes(cst: CstNode, key: string): CstNode[] {
  return (cst.children[key] ?? []).filter(isCstNode);
}

function tokens(cst: CstNode, key: string): IToken[] {
  return (cst.children[key] ?? []).filter((el): el is IToken => !isCstNode(el));
}

function node(cst: CstNode, key: string): CstNode {
  const found = nodes(cst, key)[0];
  if (!found) {
    throw new Error(`Malformed ${cst.name} node: missing ${key}`);
  }
  return found;
}

function has(cst: CstNode, key: string): boolean {
  return (cst.children[key]?.length ?? 0) > 0;
}

// Fold `operand (op operand)*` to the left, pairing each operator token with the next operand
function foldLeft(operands: Expr[], operators: string[]): Expr {
  let result = operands[0];
  for (let i = 1; i < operands.length; i++) {
    result = AST.apply(operators[i - 1], [result, operands[i]]);
  }
  return result;
}

// --- CST to AST visitor ---

function visitOr(cst: CstNode): Expr {
  const operands = nodes(cst, "andExpr").map(visitAnd);
  return foldLeft(operands, operands.slice(1).map(() => "or"));
}

function visitAnd(cst: CstNode): Expr {
  const operands = nodes(cst, "notExpr").map(visitNot);
  return foldLeft(operands, operands.slice(1).map(() => "and"));
}

function visitNot(cst: CstNode): Expr {
  if (has(cst, "Not")) {
    return AST.apply("not", [visitNot(node(cst, "notExpr"))]);
  }
  return visitRel(node(cst, "relExpr"));
}

// `!=` is read as its synonym `<>`, the spelling the markup reads back
function visitRel(cst: CstNode): Expr {
  const operands = nodes(cst, "addExpr").map(visitAdd);
  return foldLeft(operands, tokens(cst, "RelationalOp").map((t) => (t.image === "!=" ? "<>" : t.image)));
}

function visitAdd(cst: CstNode): Expr {
  const operands = nodes(cst, "mulExpr").map(visitMul);
  return foldLeft(operands, tokens(cst, "AdditiveOp").map((t) => t.image));
}

function visitMul(cst: CstNode): Expr {
  const operands = nodes(cst, "factorExpr").map(visitFactor);
  return foldLeft(operands, tokens(cst, "MultiplicativeOp").map((t) => t.image));
}

function visitFactor(cst: CstNode): Expr {
  const operands = nodes(cst, "unaryExpr").map(visitUnary);
  return foldLeft(operands, tokens(cst, "Pipe").map((t) => t.image));
}

function visitUnary(cst: CstNode): Expr {
  if (has(cst, "Minus")) {
    return AST.apply("-", [visitUnary(node(cst, "unaryExpr"))]);
  }
  return visitPower(node(cst, "powerExpr"));
}

function visitPower(cst: CstNode): Expr {
  const base = visitAtom(node(cst, "atom"));
  if (has(cst, "unaryExpr")) {
    return AST.apply("^", [base, visitUnary(node(cst, "unaryExpr"))]);
  }
  return base;
}

function visitAtom(cst: CstNode): Expr {
  if (has(cst, "literal")) return visitLiteral(node(cst, "literal"));
  if (has(cst, "caseExpr")) return visitCase(node(cst, "caseExpr"));
  if (has(cst, "listExpr")) return visitList(node(cst, "listExpr"));
  if (has(cst, "bracketExpr")) return visitBracket(node(cst, "bracketExpr"));
  if (has(cst, "parenExpr")) return visitParen(node(cst, "parenExpr"));
  if (has(cst, "identOrFnCall")) return visitIdentOrFnCall(node(cst, "identOrFnCall"));
  throw new Error("Unknown atom type");
}

function visitLiteral(cst: CstNode): Expr {
  const [token] = [
    ...tokens(cst, "RationalLit"),
    ...tokens(cst, "ComplexLit"),
    ...tokens(cst, "ENotationLit"),
    ...tokens(cst, "DecimalLit"),
    ...tokens(cst, "IntLit"),
    ...tokens(cst, "True"),
    ...tokens(cst, "False"),
  ];
  if (!token) throw new Error("Unknown literal type");

  const image = token.image;
  switch (token.tokenType) {
    case RationalLit: {
      const [numerator, denominator] = image.slice(0, -1).split("/");
      return AST.constant(rational(numerator, denominator));
    }
    case ComplexLit:
      return AST.constant(complex("0", image.slice(0, -1)));
    case ENotationLit: {
      const [mantissa, exponent] = image.split(/[eE]/);
      return AST.constant(eNotation(mantissa, exponent));
    }
    case DecimalLit:
      return AST.constant(decimal(image));
    case IntLit:
      return AST.constant(integer(image));
    case True:
      return AST.truth(true);
    case False:
      return AST.truth(false);
    default:
      throw new Error(`Unknown literal token ${token.tokenType.name}`);
  }
}

// Several WHEN clauses nest: CASE WHEN c1 THEN v1 WHEN c2 THEN v2 ELSE d END
// becomes Case(c1 -> v1, otherwise: Case(c2 -> v2, otherwise: d))
function visitCase(cst: CstNode): Expr {
  const parts = nodes(cst, "orExpr").map(visitOr);
  const clauseCount = tokens(cst, "When").length;
  let otherwise: Expr | undefined = has(cst, "Else") ? parts[parts.length - 1] : undefined;

  let result: AST.Case | undefined;
  for (let i = clauseCount - 1; i >= 0; i--) {
    result = AST.caseOf([{ condition: parts[2 * i], value: parts[2 * i + 1] }], otherwise);
    otherwise = result;
  }
  if (!result) throw new Error("CASE without WHEN clause");
  return result;
}

function visitList(cst: CstNode): ListCollection {
  return AST.list(nodes(cst, "orExpr").map(visitOr));
}

function visitBracket(cst: CstNode): Expr {
  const items = nodes(cst, "orExpr").map(visitOr);
  return AST.interval(has(cst, "RBracket") ? "closed" : "closed-open", items);
}

function visitParen(cst: CstNode): Expr {
  const items = nodes(cst, "orExpr").map(visitOr);
  if (!has(cst, "Comma")) return items[0];
  return AST.interval(has(cst, "RBracket") ? "open-closed" : "open", items);
}

function visitIdentOrFnCall(cst: CstNode): Expr {
  const [ident] = tokens(cst, "Ident");
  if (has(cst, "LParen")) {
    return AST.apply(ident.image, nodes(cst, "orExpr").map(visitOr));
  }
  return AST.name(ident.image);
}

// --- Error mapping ---

function describeToken(token: IToken): string {
  return token.tokenType === EOF ? "end of input" : `'${token.image}'`;
}

function expectedFrom(errorName: string, message: string): string {
  if (errorName === "NotAllInputParsedException") return "end of input";
  const mismatch = /Expecting token of type --> (\w+) <--/.exec(message);
  if (mismatch) return mismatch[1];
  return "an operand";
}

type EntryRule = "term" | "boolExpression" | "termList";

function run(text: string, file: string, rule: EntryRule): CstNode {
  const lexResult = TermLexer.tokenize(text);

  const lexError = lexResult.errors[0];
  if (lexError) {
    const span = spanAt(text, lexError.offset, lexError.length, file);
    const found = text.slice(lexError.offset, lexError.offset + lexError.length);
    throw new ParseError("E_LEX", `Unexpected character '${found}'`, {
      position: lexError.offset,
      line: span.startLine,
      column: span.startCol,
      expected: "a term",
      found: `'${found}'`,
      span,
    });
  }

  cstParser.input = lexResult.tokens;
  const cst = cstParser[rule]();

  const err = cstParser.errors[0];
  if (err) {
    const token = err.token;
    const position = Number.isNaN(token.startOffset) ? text.trimEnd().length : token.startOffset;
    const span = spanAt(text, position, token.image.length, file);
    const expected = expectedFrom(err.name, err.message);
    const found = describeToken(token);
    throw new ParseError("E_PARSE", `Expected ${expected} but found ${found}`, {
      position,
      line: span.startLine,
      column: span.startCol,
      expected,
      found,
      span,
    });
  }

  return cst;
}

// --- Public API ---

/** Parse an arithmetic or relational term. */
export function parseTerm(text: string, file: string = "<input>"): Expr {
  return visitRel(node(run(text, file, "term"), "relExpr"));
}

/** Parse a boolean combination of terms. */
export function parseBoolExpression(text: string, file: string = "<input>"): Expr {
  return visitOr(node(run(text, file, "boolExpression"), "orExpr"));
}

/** Parse comma-separated terms into a list collection. */
export function parseTermList(text: string, file: string = "<input>"): ListCollection {
  return AST.list(nodes(run(text, file, "termList"), "relExpr").map(visitRel));
}
