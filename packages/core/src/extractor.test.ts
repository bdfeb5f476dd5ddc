/**
 * Tests for the markup-to-tree extractor, over a minimal element stand-in.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { extract } from "./extractor.js";
import type { MarkupView } from "./extractor.js";
import * as AST from "./ast.js";
import { complex, decimal, integer, rational } from "./numeric.js";
import { UnsupportedConstructError } from "./errors.js";

type Node = El | string;

class El implements MarkupView {
  constructor(
    private readonly kind: string,
    private readonly content: Node[] = [],
    private readonly attrs: Record<string, string> = {}
  ) {}

  elementKind(): string {
    return this.kind;
  }
  children(): El[] {
    return this.content.filter((n): n is El => typeof n !== "string");
  }
  textContent(): string {
    return this.content.map((n) => (typeof n === "string" ? n : n.textContent())).join("");
  }
  textParts(): string[] {
    const parts = [""];
    for (const n of this.content) {
      if (typeof n === "string") parts[parts.length - 1] += n;
      else parts.push("");
    }
    return parts;
  }
  attribute(name: string): string | undefined {
    return this.attrs[name];
  }
}

const el = (kind: string, ...content: Node[]) => new El(kind, content);
const cn = (type: string | undefined, ...content: Node[]) =>
  new El("cn", content, type === undefined ? {} : { type });
const ci = (text: string) => el("ci", text);
const int = (n: number) => AST.constant(integer(n));

function unsupported(message: string): (e: unknown) => boolean {
  return (e) => e instanceof UnsupportedConstructError && e.message === message;
}

describe("Extractor", () => {
  it("reads identifiers and trims their text", () => {
    assert.deepEqual(extract(ci(" x ")), AST.name("x"));
  });

  it("reads symbolic constants and booleans", () => {
    assert.deepEqual(extract(el("pi")), AST.name("pi"));
    assert.deepEqual(extract(el("exponentiale")), AST.name("e"));
    assert.deepEqual(extract(el("true")), AST.truth(true));
    assert.deepEqual(extract(el("false")), AST.truth(false));
  });

  it("reads numbers of every type", () => {
    assert.deepEqual(extract(cn("integer", "12")), int(12));
    assert.deepEqual(extract(cn(undefined, "2.5")), AST.constant(decimal("2.5")));
    assert.deepEqual(extract(cn("rational", "1", el("sep"), "3")), AST.constant(rational("1", "3")));
    assert.deepEqual(extract(cn("complex-cartesian", " 1 ", el("sep"), " 0.3 ")), AST.constant(complex("1", "0.3")));
  });

  it("rejects numbers with more than two parts", () => {
    assert.throws(
      () => extract(cn("rational", "1", el("sep"), "2", el("sep"), "3")),
      unsupported("cn element has 3 parts, at most 2 allowed")
    );
  });

  it("reads operator applications through the inverse table", () => {
    assert.deepEqual(
      extract(el("apply", el("neq"), ci("a"), cn("integer", "1"))),
      AST.apply("<>", [AST.name("a"), int(1)])
    );
  });

  it("reads a ci operator as a function name", () => {
    assert.deepEqual(extract(el("apply", ci("f"), ci("x"))), AST.apply("f", [AST.name("x")]));
  });

  it("rejects ci elements without an identifier", () => {
    assert.throws(() => extract(el("apply", el("ci"), cn(undefined, "1"))), unsupported("ci element has no identifier"));
    assert.throws(() => extract(ci("  ")), unsupported("ci element has no identifier"));
  });

  it("keeps unknown leaf operators under their element name", () => {
    assert.deepEqual(extract(el("apply", el("sin"), ci("x"))), AST.apply("sin", [AST.name("x")]));
  });

  it("rejects function composition", () => {
    assert.throws(
      () => extract(el("apply", el("apply", el("compose"), ci("f"), ci("g")), ci("x"))),
      unsupported("function composition is not supported")
    );
  });

  it("rejects applications without operator or operands", () => {
    assert.throws(() => extract(el("apply")), unsupported("apply element has no operator"));
    assert.throws(() => extract(el("apply", el("plus"))), unsupported("apply element has no operands"));
  });

  it("nests several pieces into single-clause cases", () => {
    const doc = el(
      "piecewise",
      el("piece", cn("integer", "1"), ci("a")),
      el("piece", cn("integer", "2"), ci("b")),
      el("otherwise", cn("integer", "3"))
    );
    assert.deepEqual(
      extract(doc),
      AST.caseOf(
        [{ condition: AST.name("a"), value: int(1) }],
        AST.caseOf([{ condition: AST.name("b"), value: int(2) }], int(3))
      )
    );
  });

  it("reduces a piecewise with only otherwise to its default", () => {
    assert.deepEqual(extract(el("piecewise", el("otherwise", ci("d")))), AST.name("d"));
  });

  it("rejects malformed piecewise content", () => {
    assert.throws(() => extract(el("piecewise")), unsupported("piecewise element is empty"));
    assert.throws(
      () => extract(el("piecewise", el("piece", ci("a"), ci("b"), ci("c")))),
      unsupported("piece element has 3 children, 2 allowed")
    );
    assert.throws(
      () => extract(el("piecewise", el("case", ci("a")))),
      unsupported("Unknown element in piecewise: case")
    );
    assert.throws(
      () => extract(el("piecewise", el("otherwise", ci("a")), el("otherwise", ci("b")))),
      unsupported("piecewise element has more than one otherwise element")
    );
  });

  it("reads lists and intervals, defaulting to a closed interval", () => {
    assert.deepEqual(extract(el("list")), AST.list([]));
    assert.deepEqual(
      extract(el("interval", cn("integer", "0"), ci("x"))),
      AST.interval("closed", [int(0), AST.name("x")])
    );
    assert.deepEqual(
      extract(new El("interval", [cn("integer", "0"), ci("x")], { closure: "open-closed" })),
      AST.interval("open-closed", [int(0), AST.name("x")])
    );
  });

  it("rejects intervals with the wrong arity or closure", () => {
    assert.throws(() => extract(el("interval", ci("x"))), unsupported("interval element has 1 children, 2 allowed"));
    assert.throws(
      () => extract(new El("interval", [ci("a"), ci("b")], { closure: "half" })),
      unsupported("interval closure 'half' is not supported")
    );
  });

  it("rejects elements outside the vocabulary", () => {
    assert.throws(() => extract(el("matrix")), unsupported("matrix elements are not supported"));
  });
});
