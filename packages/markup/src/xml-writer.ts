/**
 * EventSink that writes the emitted document as XML text.
 */
import type { Attributes, EventSink } from "@mathterm/core";
import { MarkupStructureError } from "./tree-sink.js";

export interface XmlWriterOptions {
  /** Spaces per nesting level; 0 writes everything on one line. */
  indent?: number;
  /** Write the `<?xml ...?>` declaration (default true). */
  declaration?: boolean;
}

interface Frame {
  name: string;
  hasChildren: boolean;
  // elements holding text keep their content on one line
  mixed: boolean;
}

function escapeText(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function escapeAttribute(value: string): string {
  return escapeText(value).replace(/"/g, "&quot;");
}

export class XmlWriterSink implements EventSink {
  private readonly indent: number;
  private readonly declaration: boolean;
  private out: string[] = [];
  private stack: Frame[] = [];
  private pendingStart = false;
  private namespaceUri: string | undefined;

  constructor(options: XmlWriterOptions = {}) {
    this.indent = options.indent ?? 2;
    this.declaration = options.declaration ?? true;
  }

  startDocument(): void {
    this.out = this.declaration ? ['<?xml version="1.0" encoding="UTF-8"?>'] : [];
    this.stack = [];
    this.pendingStart = false;
  }

  endDocument(): void {
    const open = this.stack[this.stack.length - 1];
    if (open) {
      throw new MarkupStructureError(`Document ended inside <${open.name}>`);
    }
    if (this.indent > 0) this.out.push("\n");
  }

  prefixDeclaration(namespaceUri: string): void {
    this.namespaceUri = namespaceUri;
  }

  open(name: string, attributes: Attributes): void {
    this.finishStartTag();
    const parent = this.stack[this.stack.length - 1];
    if (parent) parent.hasChildren = true;
    if (!parent?.mixed) this.newline(this.stack.length);

    let tag = `<${name}`;
    if (!parent && this.namespaceUri) {
      tag += ` xmlns="${escapeAttribute(this.namespaceUri)}"`;
    }
    for (const [key, value] of Object.entries(attributes)) {
      tag += ` ${key}="${escapeAttribute(value)}"`;
    }
    this.out.push(tag);
    this.pendingStart = true;
    this.stack.push({ name, hasChildren: false, mixed: false });
  }

  text(content: string): void {
    const frame = this.stack[this.stack.length - 1];
    if (!frame) {
      throw new MarkupStructureError("Text outside the root element");
    }
    this.finishStartTag();
    frame.mixed = true;
    this.out.push(escapeText(content));
  }

  close(name: string): void {
    const frame = this.stack.pop();
    if (!frame || frame.name !== name) {
      throw new MarkupStructureError(
        `Closing </${name}> does not match ${frame ? `<${frame.name}>` : "any open element"}`
      );
    }
    if (this.pendingStart) {
      this.out.push("/>");
      this.pendingStart = false;
      return;
    }
    if (frame.hasChildren && !frame.mixed) this.newline(this.stack.length);
    this.out.push(`</${name}>`);
  }

  toString(): string {
    return this.out.join("");
  }

  private finishStartTag(): void {
    if (this.pendingStart) {
      this.out.push(">");
      this.pendingStart = false;
    }
  }

  private newline(depth: number): void {
    if (this.indent > 0 && this.out.length > 0) {
      this.out.push("\n" + " ".repeat(this.indent * depth));
    }
  }
}
