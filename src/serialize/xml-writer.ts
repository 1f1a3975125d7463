/**
 * Minimal XML emitter. Compact output has no whitespace between nodes; pretty output
 * puts every node on its own line, indented with tabs.
 */

import type { XmlAttribute } from "../flavors/types";
import { escapeXml } from "./escape";

type WriterState = "document-start" | "element-unclosed" | "element-closed";

export interface ElementOptions {
  /** Write `<tag></tag>` instead of a self-closing tag when the element has no content. */
  pair?: boolean;
}

export class XmlWriter {
  private out = "";
  private depth = 0;
  private state: WriterState = "document-start";

  constructor(readonly pretty = false) {}

  /**
   * Write an element. `content` writes the children; attributes must all be given up front.
   */
  element(tag: string, attributes: readonly XmlAttribute[], content?: () => void, options: ElementOptions = {}): void {
    this.beginNode();
    this.out += `<${tag}`;
    for (const attribute of attributes) {
      this.out += ` ${attribute.name}="${escapeXml(attribute.value)}"`;
    }
    this.state = "element-unclosed";

    this.depth += 1;
    content?.();
    this.depth -= 1;

    if (this.state === "element-unclosed") {
      if (options.pair) this.out += `></${tag}>`;
      else this.out += this.pretty ? " />" : "/>";
    } else {
      this.lineBreak();
      this.out += `</${tag}>`;
    }
    this.state = "element-closed";
  }

  /** Escaped character data. */
  text(value: string): void {
    this.beginNode();
    this.out += escapeXml(value);
    this.state = "element-closed";
  }

  /** Markup written verbatim. */
  raw(markup: string): void {
    this.beginNode();
    this.out += markup;
    this.state = "element-closed";
  }

  toString(): string {
    return this.out;
  }

  private beginNode(): void {
    if (this.state === "element-unclosed") this.out += ">";
    if (this.state !== "document-start") this.lineBreak();
  }

  private lineBreak(): void {
    if (this.pretty) this.out += `\n${"\t".repeat(this.depth)}`;
  }
}
