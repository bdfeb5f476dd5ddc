/**
 * Markup-to-tree extractor: rebuilds an AST from a content markup document.
 * Inverse of the emitter.
 */
import * as AST from "./ast.js";
import type { CaseClause, Expr } from "./ast.js";
import { UnsupportedConstructError } from "./errors.js";
import { fromMarkup } from "./numeric.js";
import { ELEMENT_CONSTANTS, ELEMENT_OPERATORS } from "./vocabulary.js";

/** Read-only view of one element of a markup document. */
export interface MarkupView {
  /** Local name of the element. */
  elementKind(): string;
  /** Element children, in document order. */
  children(): readonly MarkupView[];
  /** Concatenated text of the element and its descendants. */
  textContent(): string;
  /** Text runs directly inside the element, split at each child element. */
  textParts(): readonly string[];
  attribute(name: string): string | undefined;
}

export function extract(root: MarkupView): Expr {
  const kind = root.elementKind();

  const constant = ELEMENT_CONSTANTS.get(kind);
  if (constant) {
    if (constant === "true" || constant === "false") {
      return AST.truth(constant === "true");
    }
    return AST.name(constant);
  }

  switch (kind) {
    case "ci":
      return AST.name(identifierOf(root));
    case "cn":
      return AST.constant(fromMarkup(root.attribute("type"), numberParts(root)));
    case "apply":
      return extractApply(root);
    case "piecewise":
      return extractPiecewise(root);
    case "list":
      return AST.list(root.children().map(extract));
    case "interval":
      return extractInterval(root);
    default:
      throw new UnsupportedConstructError(`${kind} elements are not supported`);
  }
}

function identifierOf(ci: MarkupView): string {
  if (ci.children().length > 0) {
    throw new UnsupportedConstructError("ci elements with element content are not supported");
  }
  const identifier = ci.textContent().trim();
  if (!identifier) {
    throw new UnsupportedConstructError("ci element has no identifier");
  }
  return identifier;
}

function numberParts(cn: MarkupView): string[] {
  const children = cn.children();
  if (children.some((child) => child.elementKind() !== "sep")) {
    throw new UnsupportedConstructError("cn elements may only contain text and a single sep element");
  }
  if (children.length > 1) {
    throw new UnsupportedConstructError(`cn element has ${children.length + 1} parts, at most 2 allowed`);
  }
  const parts = cn.textParts().map((part) => part.trim());
  return children.length === 0 ? [parts.join("")] : parts;
}

function extractApply(element: MarkupView): Expr {
  const [operator, ...operands] = element.children();
  if (!operator) {
    throw new UnsupportedConstructError("apply element has no operator");
  }
  if (operands.length === 0) {
    throw new UnsupportedConstructError("apply element has no operands");
  }

  let name: string;
  const kind = operator.elementKind();
  if (kind === "ci") {
    name = identifierOf(operator);
  } else if (operator.children().length > 0) {
    throw new UnsupportedConstructError("function composition is not supported");
  } else {
    name = ELEMENT_OPERATORS.get(kind) ?? kind;
  }

  return AST.apply(name, operands.map(extract));
}

// piecewise(piece1, piece2, otherwise) -> Case(c1 -> v1, otherwise: Case(c2 -> v2, otherwise: d))
function extractPiecewise(element: MarkupView): Expr {
  const clauses: CaseClause[] = [];
  let otherwise: Expr | undefined;

  for (const child of element.children()) {
    const kind = child.elementKind();
    if (kind === "piece") {
      const parts = child.children();
      if (parts.length !== 2) {
        throw new UnsupportedConstructError(`piece element has ${parts.length} children, 2 allowed`);
      }
      const [value, condition] = parts.map(extract);
      clauses.push({ condition, value });
    } else if (kind === "otherwise") {
      if (otherwise) {
        throw new UnsupportedConstructError("piecewise element has more than one otherwise element");
      }
      const parts = child.children();
      if (parts.length !== 1) {
        throw new UnsupportedConstructError(`otherwise element has ${parts.length} children, 1 allowed`);
      }
      otherwise = extract(parts[0]);
    } else {
      throw new UnsupportedConstructError(`Unknown element in piecewise: ${kind}`);
    }
  }

  if (clauses.length === 0) {
    if (otherwise) return otherwise;
    throw new UnsupportedConstructError("piecewise element is empty");
  }

  let result = AST.caseOf([clauses[clauses.length - 1]], otherwise);
  for (let i = clauses.length - 2; i >= 0; i--) {
    result = AST.caseOf([clauses[i]], result);
  }
  return result;
}

function extractInterval(element: MarkupView): Expr {
  const closure = element.attribute("closure") ?? "closed";
  if (!AST.isClosure(closure)) {
    throw new UnsupportedConstructError(`interval closure '${closure}' is not supported`);
  }
  const items = element.children();
  if (items.length !== 2) {
    throw new UnsupportedConstructError(`interval element has ${items.length} children, 2 allowed`);
  }
  return AST.interval(closure, items.map(extract));
}
