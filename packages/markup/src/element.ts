/**
 * In-memory content markup document: a minimal element tree that the
 * extractor can read.
 */
import { MATHML_NAMESPACE_URI } from "@mathterm/core";
import type { Attributes, MarkupView } from "@mathterm/core";

export type MarkupNode = MarkupElement | string;

export class MarkupElement implements MarkupView {
  readonly localName: string;
  readonly namespaceUri: string;
  readonly attributes: ReadonlyMap<string, string>;
  private readonly content: MarkupNode[] = [];

  constructor(localName: string, attributes: Attributes = {}, namespaceUri: string = MATHML_NAMESPACE_URI) {
    this.localName = localName;
    this.namespaceUri = namespaceUri;
    this.attributes = new Map(Object.entries(attributes));
  }

  /** Append a child; adjacent text is merged into one run. */
  append(child: MarkupNode): void {
    const last = this.content[this.content.length - 1];
    if (typeof child === "string" && typeof last === "string") {
      this.content[this.content.length - 1] = last + child;
      return;
    }
    this.content.push(child);
  }

  nodes(): readonly MarkupNode[] {
    return this.content;
  }

  elementKind(): string {
    return this.localName;
  }

  children(): readonly MarkupElement[] {
    return this.content.filter((node): node is MarkupElement => typeof node !== "string");
  }

  textContent(): string {
    return this.content
      .map((node) => (typeof node === "string" ? node : node.textContent()))
      .join("");
  }

  textParts(): readonly string[] {
    const parts = [""];
    for (const node of this.content) {
      if (typeof node === "string") {
        parts[parts.length - 1] += node;
      } else {
        parts.push("");
      }
    }
    return parts;
  }

  attribute(name: string): string | undefined {
    return this.attributes.get(name);
  }
}

/** Build an element by hand: `element("apply", {}, [element("plus"), ...])`. */
export function element(
  localName: string,
  attributes: Attributes = {},
  children: readonly MarkupNode[] = []
): MarkupElement {
  const el = new MarkupElement(localName, attributes);
  for (const child of children) {
    el.append(child);
  }
  return el;
}
