export interface ElementNode {
  readonly kind: "element";
  readonly tag: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: DomNode[];
}

export interface TextNode {
  readonly kind: "text";
  readonly content: string;
  /** Set for text inside a `pre` or `code` ancestor. */
  readonly preserveWhitespace: boolean;
}

export type DomNode = ElementNode | TextNode;

export const DOCUMENT_TAG = "#document";

export function createElement(tag: string, attributes: Record<string, string> = {}): ElementNode {
  return { kind: "element", tag, attributes, children: [] };
}

export function createText(content: string, preserveWhitespace = false): TextNode {
  return { kind: "text", content, preserveWhitespace };
}

export function isElement(node: DomNode): node is ElementNode {
  return node.kind === "element";
}

export function elementChildren(node: ElementNode): ElementNode[] {
  return node.children.filter(isElement);
}
