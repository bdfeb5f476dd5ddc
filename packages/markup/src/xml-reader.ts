/**
 * Recursive-descent reader for XML text. Reports what it reads to an
 * EventSink, so the same events that build a document from a tree can
 * build one from text.
 *
 * Covers what content markup needs: elements, attributes, text, the
 * predefined and numeric entities, CDATA, comments and processing
 * instructions (skipped). No DTDs.
 */
import { MATHML_NAMESPACE_URI } from "@mathterm/core";
import type { EventSink } from "@mathterm/core";
import { MarkupStructureError } from "./tree-sink.js";

const NAME_PATTERN = /[A-Za-z_][\w.:-]*/y;
// &#123; or &#x7B;, nothing else
const CHAR_REFERENCE = /^#(?:x([0-9a-fA-F]+)|([0-9]+))$/;

const ENTITIES = new Map<string, string>([
  ["amp", "&"],
  ["lt", "<"],
  ["gt", ">"],
  ["quot", '"'],
  ["apos", "'"],
]);

function localName(qualified: string): string {
  const colon = qualified.indexOf(":");
  return colon === -1 ? qualified : qualified.slice(colon + 1);
}

class XmlReader {
  private pos = 0;

  constructor(
    private readonly xml: string,
    private readonly sink: EventSink
  ) {}

  document(): void {
    this.sink.startDocument();
    this.skipMisc();
    if (this.pos >= this.xml.length) {
      throw this.error("Document has no root element");
    }
    this.element(true);
    this.skipMisc();
    if (this.pos < this.xml.length) {
      throw this.error("Content after the root element");
    }
    this.sink.endDocument();
  }

  // whitespace, comments and processing instructions outside the root
  private skipMisc(): void {
    for (;;) {
      this.skipWs();
      if (this.xml.startsWith("<?", this.pos)) this.skipPast("?>");
      else if (this.xml.startsWith("<!--", this.pos)) this.skipPast("-->");
      else return;
    }
  }

  private element(isRoot: boolean): void {
    this.expect("<");
    const name = this.name();
    const attributes: Record<string, string> = {};
    let namespaceUri: string | undefined;

    for (;;) {
      this.skipWs();
      if (this.xml.startsWith(">", this.pos) || this.xml.startsWith("/>", this.pos)) break;
      const attr = this.name();
      this.skipWs();
      this.expect("=");
      this.skipWs();
      const value = this.attributeValue();
      if (attr === "xmlns" || attr.startsWith("xmlns:")) {
        namespaceUri ??= value;
      } else {
        attributes[localName(attr)] = value;
      }
    }

    if (isRoot) {
      this.sink.prefixDeclaration(namespaceUri ?? MATHML_NAMESPACE_URI);
    }
    const local = localName(name);
    this.sink.open(local, attributes);
    if (this.xml.startsWith("/>", this.pos)) {
      this.pos += 2;
    } else {
      this.pos += 1;
      this.content(name);
    }
    this.sink.close(local);
  }

  private content(name: string): void {
    for (;;) {
      if (this.pos >= this.xml.length) {
        throw this.error(`Unclosed <${name}>`);
      }
      if (this.xml.startsWith("</", this.pos)) {
        this.pos += 2;
        const closing = this.name();
        this.skipWs();
        this.expect(">");
        if (closing !== name) {
          throw this.error(`Closing </${closing}> does not match <${name}>`);
        }
        return;
      }
      if (this.xml.startsWith("<!--", this.pos)) {
        this.skipPast("-->");
      } else if (this.xml.startsWith("<![CDATA[", this.pos)) {
        const start = this.pos + 9;
        this.skipPast("]]>");
        this.sink.text(this.xml.slice(start, this.pos - 3));
      } else if (this.xml.startsWith("<?", this.pos)) {
        this.skipPast("?>");
      } else if (this.xml[this.pos] === "<") {
        this.element(false);
      } else {
        this.text();
      }
    }
  }

  // whitespace-only runs between elements are layout, not content
  private text(): void {
    const next = this.xml.indexOf("<", this.pos);
    const end = next === -1 ? this.xml.length : next;
    const raw = this.xml.slice(this.pos, end);
    const at = this.pos;
    this.pos = end;
    if (raw.trim()) {
      this.sink.text(this.decode(raw, at));
    }
  }

  private attributeValue(): string {
    const quote = this.xml[this.pos];
    if (quote !== '"' && quote !== "'") {
      throw this.error("Expected a quoted attribute value");
    }
    const end = this.xml.indexOf(quote, this.pos + 1);
    if (end === -1) {
      throw this.error("Unterminated attribute value");
    }
    const at = this.pos + 1;
    const raw = this.xml.slice(at, end);
    this.pos = end + 1;
    return this.decode(raw, at);
  }

  private decode(raw: string, at: number): string {
    return raw.replace(/&([^;&\s]*);/g, (match: string, ref: string, offset: number) => {
      if (ref.startsWith("#")) {
        const digits = CHAR_REFERENCE.exec(ref);
        const code = digits ? (digits[1] ? parseInt(digits[1], 16) : parseInt(digits[2], 10)) : NaN;
        if (Number.isNaN(code) || code > 0x10ffff) {
          this.pos = at + offset;
          throw this.error(`Invalid character reference '${match}'`);
        }
        return String.fromCodePoint(code);
      }
      const named = ENTITIES.get(ref);
      if (named === undefined) {
        this.pos = at + offset;
        throw this.error(`Unknown entity '${match}'`);
      }
      return named;
    });
  }

  private name(): string {
    NAME_PATTERN.lastIndex = this.pos;
    const match = NAME_PATTERN.exec(this.xml);
    if (!match) {
      throw this.error("Expected a name");
    }
    this.pos += match[0].length;
    return match[0];
  }

  private expect(token: string): void {
    if (!this.xml.startsWith(token, this.pos)) {
      throw this.error(`Expected '${token}'`);
    }
    this.pos += token.length;
  }

  private skipWs(): void {
    while (this.pos < this.xml.length && /\s/.test(this.xml[this.pos])) this.pos++;
  }

  private skipPast(token: string): void {
    const end = this.xml.indexOf(token, this.pos);
    if (end === -1) {
      throw this.error(`Missing '${token}'`);
    }
    this.pos = end + token.length;
  }

  private error(message: string): MarkupStructureError {
    const lines = this.xml.slice(0, this.pos).split("\n");
    const line = lines.length;
    const column = lines[lines.length - 1].length + 1;
    return new MarkupStructureError(`${message} at line ${line}, column ${column}`);
  }
}

/** Read XML text and report it to `sink` as one document. */
export function readXml(xml: string, sink: EventSink): void {
  new XmlReader(xml, sink).document();
}
