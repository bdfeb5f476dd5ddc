/**
 * Tests for the XML writer sink.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as AST from "@mathterm/core";
import { parseTerm } from "@mathterm/core";
import { XmlWriterSink } from "./xml-writer.js";
import { MarkupStructureError, replay } from "./tree-sink.js";
import { toMarkup, toXml } from "./index.js";

describe("XmlWriterSink", () => {
  it("writes an indented document", () => {
    assert.equal(
      toXml(parseTerm("x+1")),
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<apply xmlns="http://www.w3.org/1998/Math/MathML">',
        "  <plus/>",
        "  <ci>x</ci>",
        '  <cn type="integer">1</cn>',
        "</apply>",
        "",
      ].join("\n")
    );
  });

  it("writes one line without indentation", () => {
    assert.equal(
      toXml(parseTerm("x"), { indent: 0, declaration: false }),
      '<ci xmlns="http://www.w3.org/1998/Math/MathML">x</ci>'
    );
  });

  it("keeps number parts on one line", () => {
    assert.equal(
      toXml(parseTerm("{1/3r}"), { declaration: false }),
      [
        '<list xmlns="http://www.w3.org/1998/Math/MathML">',
        '  <cn type="rational">1<sep/>3</cn>',
        "</list>",
        "",
      ].join("\n")
    );
  });

  it("writes intervals with their closure", () => {
    assert.equal(
      toXml(parseTerm("(a, b]"), { indent: 0, declaration: false }),
      '<interval xmlns="http://www.w3.org/1998/Math/MathML" closure="open-closed"><ci>a</ci><ci>b</ci></interval>'
    );
  });

  it("escapes text", () => {
    assert.equal(
      toXml(AST.name("a<b&c>"), { indent: 0, declaration: false }),
      '<ci xmlns="http://www.w3.org/1998/Math/MathML">a&lt;b&amp;c&gt;</ci>'
    );
  });

  it("escapes attribute values", () => {
    const writer = new XmlWriterSink({ indent: 0, declaration: false });
    writer.startDocument();
    writer.open("x", { title: 'say "hi" & <go>' });
    writer.close("x");
    writer.endDocument();
    assert.equal(writer.toString(), '<x title="say &quot;hi&quot; &amp; &lt;go&gt;"/>');
  });

  it("rejects mismatched close events", () => {
    const writer = new XmlWriterSink();
    writer.startDocument();
    writer.open("apply", {});
    assert.throws(() => writer.close("ci"), MarkupStructureError);
  });

  it("writes the same text when replaying a built tree", () => {
    const ast = parseTerm("CASE WHEN x >= 0 THEN x ELSE -x END");
    const writer = new XmlWriterSink();
    replay(toMarkup(ast), writer);
    assert.equal(writer.toString(), toXml(ast));
  });
});
