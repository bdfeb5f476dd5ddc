/**
 * EventSink that assembles emitted events into a MarkupElement document.
 */
import { MATHML_NAMESPACE_URI, MathTermError } from "@mathterm/core";
import type { Attributes, EventSink } from "@mathterm/core";
import { MarkupElement } from "./element.js";

export class MarkupStructureError extends MathTermError {
  constructor(message: string) {
    super("E_MARKUP", message);
    this.name = "MarkupStructureError";
  }
}

export class TreeBuilderSink implements EventSink {
  private stack: MarkupElement[] = [];
  private root: MarkupElement | undefined;
  private namespaceUri = MATHML_NAMESPACE_URI;

  startDocument(): void {
    this.stack = [];
    this.root = undefined;
  }

  endDocument(): void {
    const open = this.stack[this.stack.length - 1];
    if (open) {
      throw new MarkupStructureError(`Document ended inside <${open.localName}>`);
    }
  }

  prefixDeclaration(namespaceUri: string): void {
    this.namespaceUri = namespaceUri;
  }

  open(name: string, attributes: Attributes): void {
    const el = new MarkupElement(name, attributes, this.namespaceUri);
    const parent = this.stack[this.stack.length - 1];
    if (parent) {
      parent.append(el);
    } else if (this.root) {
      throw new MarkupStructureError(`Second root element <${name}>`);
    } else {
      this.root = el;
    }
    this.stack.push(el);
  }

  text(content: string): void {
    const parent = this.stack[this.stack.length - 1];
    if (!parent) {
      throw new MarkupStructureError("Text outside the root element");
    }
    parent.append(content);
  }

  close(name: string): void {
    const top = this.stack.pop();
    if (!top || top.localName !== name) {
      throw new MarkupStructureError(
        `Closing </${name}> does not match ${top ? `<${top.localName}>` : "any open element"}`
      );
    }
  }

  /** The finished document's root element. */
  document(): MarkupElement {
    if (!this.root) {
      throw new MarkupStructureError("Document has no root element");
    }
    return this.root;
  }
}

/** Report an existing tree to another sink, e.g. to write it as XML. */
export function replay(root: MarkupElement, sink: EventSink): void {
  sink.startDocument();
  sink.prefixDeclaration(root.namespaceUri);
  replayElement(root, sink);
  sink.endDocument();
}

function replayElement(el: MarkupElement, sink: EventSink): void {
  sink.open(el.localName, Object.fromEntries(el.attributes));
  for (const node of el.nodes()) {
    if (typeof node === "string") {
      sink.text(node);
    } else {
      replayElement(node, sink);
    }
  }
  sink.close(el.localName);
}
