/**
 * Tests for the infix notation builder.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { buildInfix } from "./infix.js";
import { parseBoolExpression, parseTerm } from "../parser.js";
import * as AST from "../ast.js";
import { complex, integer } from "../numeric.js";

function roundTrip(text: string): string {
  return buildInfix(parseTerm(text));
}

describe("Infix builder", () => {
  it("writes only the parentheses precedence needs", () => {
    assert.equal(roundTrip("1 + 2 * 3"), "1+2*3");
    assert.equal(roundTrip("(1 + 2) * 3"), "(1+2)*3");
    assert.equal(roundTrip("((x))"), "x");
  });

  it("keeps left grouping of subtraction and division", () => {
    assert.equal(roundTrip("1-2-3"), "1-2-3");
    assert.equal(roundTrip("1-(2-3)"), "1-(2-3)");
    assert.equal(roundTrip("a/(b*c)"), "a/(b*c)");
  });

  it("keeps right grouping of power", () => {
    assert.equal(roundTrip("2^3^4"), "2^3^4");
    assert.equal(roundTrip("(2^3)^4"), "(2^3)^4");
  });

  it("places unary minus by priority", () => {
    assert.equal(roundTrip("-(1+2)"), "-(1+2)");
    assert.equal(roundTrip("-2^2"), "-2^2");
    assert.equal(roundTrip("(-2)^2"), "(-2)^2");
    assert.equal(roundTrip("2^-3"), "2^(-3)");
  });

  it("parenthesises negative constants where a sign would regroup", () => {
    const ast = AST.apply("^", [AST.constant(integer(-2)), AST.constant(integer(2))]);
    assert.equal(buildInfix(ast), "(-2)^2");
  });

  it("writes relational and boolean operators", () => {
    assert.equal(roundTrip("x != 1"), "x<>1");
    assert.equal(buildInfix(parseBoolExpression("a < b and not c or d")), "a<b and not c or d");
    assert.equal(buildInfix(parseBoolExpression("a and (b or c)")), "a and (b or c)");
    assert.equal(buildInfix(parseBoolExpression("not (a and b)")), "not (a and b)");
  });

  it("parenthesises a comparison inside a comparison", () => {
    const ast = AST.apply("=", [AST.apply("<", [AST.name("a"), AST.name("b")]), AST.truth(true)]);
    assert.equal(buildInfix(ast), "(a<b)=true");
  });

  it("writes function calls", () => {
    assert.equal(roundTrip("f(x, 2) + 1"), "f(x, 2)+1");
  });

  it("writes a nested case as one CASE with several WHEN clauses", () => {
    assert.equal(
      roundTrip("CASE WHEN x > 0 THEN 1 WHEN x < 0 THEN -1 ELSE 0 END"),
      "CASE WHEN x>0 THEN 1 WHEN x<0 THEN -1 ELSE 0 END"
    );
    assert.equal(roundTrip("case when a then b end"), "CASE WHEN a THEN b END");
    assert.equal(roundTrip("CASE WHEN 3|12 THEN 1+3 ELSE e^(4*1) END"), "CASE WHEN 3|12 THEN 1+3 ELSE e^(4*1) END");
  });

  it("writes literals in their surface form", () => {
    assert.equal(roundTrip(".5 + 1/3r * 2i + 1.2e10"), "0.5+1/3r*2i+1.2e10");
    assert.equal(buildInfix(AST.constant(complex("1", "0.3"))), "(1+0.3i)");
  });

  it("writes lists and intervals", () => {
    assert.equal(roundTrip("{1,x}"), "{1, x}");
    assert.equal(roundTrip("{}"), "{}");
    assert.equal(roundTrip("(0,1]"), "(0, 1]");
    assert.equal(roundTrip("[0,1)"), "[0, 1)");
  });

  it("reads back to the same tree", () => {
    const inputs = [
      "a-(b-c)*d^e^f",
      "-(-x)",
      "CASE WHEN a or b THEN {1, 2} ELSE [0, x) END",
      "f(a and b, not c) = 3",
    ];
    for (const text of inputs) {
      const ast = parseTerm(text);
      assert.deepEqual(parseTerm(buildInfix(ast)), ast, text);
    }
  });
});
