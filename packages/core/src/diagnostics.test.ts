/**
 * Tests for mathterm diagnostics.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { attemptDiagnostics, makeDiag, formatDiagnostic, formatDiagnostics, spanAt } from "./diagnostics.js";
import { safeParse } from "./grammars.js";
import { ConfigError, ParseError, UnknownNotationError } from "./errors.js";

const span = { file: "sum.term", startLine: 3, startCol: 7, endLine: 3, endCol: 8 };

describe("Diagnostics", () => {
  it("creates a diagnostic with all fields", () => {
    const d = makeDiag("E_TEST", "Something went wrong", span, "Try fixing it");
    assert.equal(d.code, "E_TEST");
    assert.equal(d.message, "Something went wrong");
    assert.equal(d.span?.file, "sum.term");
    assert.equal(d.span?.startLine, 3);
    assert.equal(d.hint, "Try fixing it");
  });

  it("creates a diagnostic without span or hint", () => {
    const d = makeDiag("E_TEST", "Error message");
    assert.equal(d.span, undefined);
    assert.equal(d.hint, undefined);
  });

  it("formats a diagnostic as JSON", () => {
    const out = formatDiagnostic(makeDiag("E_PARSE", "Unexpected token"), false);
    assert.equal(out, '{"code":"E_PARSE","message":"Unexpected token"}');
  });

  it("formats a diagnostic in pretty mode with span and hint", () => {
    const out = formatDiagnostic(makeDiag("E_PARSE", "Unexpected token", span, "Check syntax"), true);
    assert.equal(out, "error[E_PARSE]: Unexpected token\n  --> sum.term:3:7\n  hint: Check syntax");
  });

  it("formats a diagnostic without span as <unknown>", () => {
    const out = formatDiagnostic(makeDiag("E_IO", "Cannot read"), true);
    assert.equal(out, "error[E_IO]: Cannot read\n  --> <unknown>");
  });

  it("formats several diagnostics", () => {
    const diags = [makeDiag("E_A", "first"), makeDiag("E_B", "second")];
    assert.deepEqual(JSON.parse(formatDiagnostics(diags, false)), [
      { code: "E_A", message: "first" },
      { code: "E_B", message: "second" },
    ]);
    assert.equal(
      formatDiagnostics(diags, true),
      "error[E_A]: first\n  --> <unknown>\n\nerror[E_B]: second\n  --> <unknown>"
    );
  });
});

describe("Spans", () => {
  it("counts lines and columns from 1", () => {
    assert.deepEqual(spanAt("a+\nbc", 4, 1, "f.term"), {
      file: "f.term",
      startLine: 2,
      startCol: 2,
      endLine: 2,
      endCol: 3,
    });
  });

  it("covers one column for an empty match", () => {
    const s = spanAt("1+", 2, 0, "<input>");
    assert.equal(s.startCol, 3);
    assert.equal(s.endCol, 4);
  });
});

describe("Attempt diagnostics", () => {
  it("reports failed grammars only, labelled by grammar", () => {
    const diags = attemptDiagnostics([safeParse("term", "x+1"), safeParse("bool", "1, 2")]);
    assert.equal(diags.length, 1);
    assert.equal(diags[0].code, "E_PARSE");
    assert.equal(diags[0].message, "bool grammar: Expected end of input but found ','");
    assert.equal(diags[0].span?.startCol, 2);
  });
});

describe("Error diagnostics", () => {
  it("carries parse position into the diagnostic", () => {
    const err = new ParseError("E_PARSE", "Expected RParen but found end of input", {
      position: 6,
      line: 3,
      column: 7,
      expected: "RParen",
      found: "end of input",
      span,
    });
    const d = err.toDiagnostic();
    assert.equal(d.code, "E_PARSE");
    assert.deepEqual(d.span, span);
    assert.equal(d.hint, "Check syntax near this location.");
  });

  it("lists known notations in the hint", () => {
    const d = new UnknownNotationError("rpn", ["infix", "prefix"]).toDiagnostic();
    assert.equal(d.message, "Unknown notation 'rpn'.");
    assert.equal(d.hint, "Known notations: infix, prefix.");
  });

  it("names the offending file for configuration errors", () => {
    const err = new ConfigError("/tmp/x.json", "indent: too big");
    assert.equal(err.code, "E_CONFIG");
    assert.equal(err.message, "Invalid configuration in /tmp/x.json: indent: too big");
  });
});
