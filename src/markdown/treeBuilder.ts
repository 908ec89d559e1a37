import { Parser } from "htmlparser2";
import { createElement, createText, DOCUMENT_TAG, ElementNode } from "./nodes";

const WHITESPACE_ONLY_CONTAINERS = new Set([DOCUMENT_TAG, "ul", "ol", "body", "div", "blockquote", "tr", "table"]);
const PRESERVING_TAGS = new Set(["pre", "code"]);

function rewriteHref(href: string, baseUrl?: string): string | undefined {
  const trimmed = href.trim();
  if (trimmed.toLowerCase().startsWith("javascript:")) {
    return undefined;
  }
  if (trimmed === "") {
    return "";
  }
  if (trimmed.startsWith("#") || !baseUrl) {
    return href;
  }
  try {
    return new URL(trimmed, baseUrl).toString();
  } catch {
    return href;
  }
}

/**
 * Consumes tokenizer events and maintains the open-element stack. The
 * synthetic `#document` root never leaves the stack.
 */
export class TreeBuilder {
  readonly root: ElementNode = createElement(DOCUMENT_TAG);
  private readonly stack: ElementNode[] = [this.root];
  private pendingText = "";

  constructor(private readonly baseUrl?: string) {}

  openTag(tag: string, attributes: Record<string, string>): void {
    this.flushText();
    const attrs = { ...attributes };
    if (tag === "a" && attrs.href !== undefined) {
      const href = rewriteHref(attrs.href, this.baseUrl);
      if (href === undefined) {
        delete attrs.href;
      } else {
        attrs.href = href;
      }
    }

    const element = createElement(tag, attrs);
    this.current().children.push(element);
    this.stack.push(element);
  }

  text(data: string): void {
    this.pendingText += data;
  }

  closeTag(tag: string): void {
    this.flushText();
    for (let index = this.stack.length - 1; index > 0; index -= 1) {
      if (this.stack[index].tag === tag) {
        this.stack.length = index;
        return;
      }
    }
  }

  finish(): ElementNode {
    this.flushText();
    this.stack.length = 1;
    return this.root;
  }

  private current(): ElementNode {
    return this.stack[this.stack.length - 1];
  }

  private flushText(): void {
    if (this.pendingText === "") {
      return;
    }
    const content = this.pendingText;
    this.pendingText = "";

    if (this.stack.some((element) => PRESERVING_TAGS.has(element.tag))) {
      this.current().children.push(createText(content, true));
      return;
    }
    if (content.trim() === "" && WHITESPACE_ONLY_CONTAINERS.has(this.current().tag)) {
      return;
    }
    this.current().children.push(createText(content));
  }
}

export function buildTree(html: string | Buffer, baseUrl?: string): ElementNode {
  const builder = new TreeBuilder(baseUrl);
  const parser = new Parser(
    {
      onopentag: (name, attributes) => builder.openTag(name, attributes),
      ontext: (data) => builder.text(data),
      onclosetag: (name) => builder.closeTag(name),
    },
    { decodeEntities: true, lowerCaseTags: true, lowerCaseAttributeNames: true },
  );
  parser.write(typeof html === "string" ? html : html.toString("utf-8"));
  parser.end();
  return builder.finish();
}
