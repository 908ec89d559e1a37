import { DomNode, ElementNode, TextNode } from "./nodes";
import { buildTableRows, formatTable, normalizeCellContent } from "./table";
import { buildTree } from "./treeBuilder";

const SUPPRESSED_TAGS = new Set([
  "script",
  "style",
  "iframe",
  "nav",
  "meta",
  "link",
  "title",
  "select",
  "input",
  "button",
  "noscript",
  "footer",
]);

const BLOCK_TAGS = new Set([
  "p",
  "div",
  "ul",
  "ol",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "blockquote",
  "pre",
  "figure",
  "table",
  "noscript",
]);

const HEADING_LEVELS: Record<string, number> = { h1: 1, h2: 2, h3: 3, h4: 4, h5: 5, h6: 6 };

export function isBlockLevel(node: DomNode): boolean {
  return node.kind === "element" && BLOCK_TAGS.has(node.tag);
}

/** Pads `text` to end in a paragraph break; longer newline runs are left alone. */
export function ensureTwoTrailingNewlines(text: string): string {
  if (text === "") {
    return text;
  }
  if (text.endsWith("\n\n")) {
    return text;
  }
  return text.endsWith("\n") ? `${text}\n` : `${text}\n\n`;
}

function renderText(node: TextNode): string {
  if (node.preserveWhitespace) {
    return node.content;
  }
  const leading = node.content.startsWith(" ") ? " " : "";
  const trailing = node.content.endsWith(" ") ? " " : "";
  return leading + node.content.trim().replace(/\s+/g, " ") + trailing;
}

function wrapInline(content: string, marker: string): string {
  const trimmed = content.trim();
  if (trimmed === "") {
    return content;
  }
  const leading = /^\s+/.exec(content)?.[0] ?? "";
  const trailing = /\s+$/.exec(content)?.[0] ?? "";
  return `${leading}${marker}${trimmed}${marker}${trailing}`;
}

function renderChildren(element: ElementNode): string {
  return element.children.map(renderMarkdown).join("");
}

function renderContainer(element: ElementNode): string {
  let content = "";
  for (const child of element.children) {
    if (isBlockLevel(child)) {
      content = ensureTwoTrailingNewlines(content);
    }
    content += renderMarkdown(child);
  }
  return content.trim();
}

function renderLink(element: ElementNode): string {
  const href = element.attributes.href ?? "";
  const content = renderChildren(element).trim();
  if (href.startsWith("#")) {
    return content;
  }
  if (href !== "" && content !== "") {
    return `[${content}](${href})`;
  }
  return "";
}

function renderImage(element: ElementNode): string {
  const src = element.attributes.src ?? "";
  const alt = element.attributes.alt ?? "Image";
  if (src === "" || src.startsWith("data:")) {
    return "";
  }
  return `![${alt}](${src})`;
}

function renderList(element: ElementNode, ordered: boolean): string {
  let output = "";
  let index = 1;
  for (const child of element.children) {
    const text = renderMarkdown(child);
    if (text === "") {
      continue;
    }
    output += `${ordered ? `${index}.` : "-"} ${text}\n`;
    index += 1;
  }
  return output;
}

function renderBlockquote(element: ElementNode): string {
  const content = element.children.map((child) => renderMarkdown(child).trim()).join("\n");
  return `> ${content.replace(/\n/g, "\n> ")}`;
}

function renderPre(element: ElementNode): string {
  const [first] = element.children;
  const source =
    element.children.length === 1 && first.kind === "element" && first.tag === "code"
      ? renderChildren(first)
      : renderChildren(element);
  return "```\n" + source.replace(/^[\r\n]+|[\r\n]+$/g, "") + "\n```\n";
}

function renderTableRow(element: ElementNode): string {
  return `${element.children.map((cell) => renderMarkdown(cell).trim()).join(" | ")}\n`;
}

function renderElementBody(element: ElementNode): string {
  const level = HEADING_LEVELS[element.tag];
  if (level !== undefined) {
    return `${"#".repeat(level)} ${renderChildren(element)}`;
  }

  switch (element.tag) {
    case "p":
    case "div":
      return renderContainer(element);
    case "b":
    case "strong":
      return wrapInline(renderChildren(element), "**");
    case "i":
    case "em":
      return wrapInline(renderChildren(element), "*");
    case "code":
      return wrapInline(renderChildren(element), "`");
    case "a":
      return renderLink(element);
    case "img":
      return renderImage(element);
    case "figcaption":
      return `\n${renderChildren(element).trim()}`;
    case "br":
      return "\n";
    case "ul":
      return renderList(element, false);
    case "ol":
      return renderList(element, true);
    case "li":
      return renderChildren(element).trim();
    case "blockquote":
      return renderBlockquote(element);
    case "pre":
      return renderPre(element);
    case "table":
      return formatTable(buildTableRows(element, renderMarkdown));
    case "tr":
      return renderTableRow(element);
    case "th": {
      const content = normalizeCellContent(renderChildren(element).trim());
      return content === "" ? "" : `**${content}**`;
    }
    case "td":
      return normalizeCellContent(renderChildren(element).trim());
    default:
      return renderChildren(element);
  }
}

/** Renders a tree into Markdown. Pure; unknown tags contribute their children's text. */
export function renderMarkdown(node: DomNode): string {
  if (node.kind === "text") {
    return renderText(node);
  }
  if (SUPPRESSED_TAGS.has(node.tag)) {
    return "";
  }

  const body = renderElementBody(node);
  return BLOCK_TAGS.has(node.tag) ? ensureTwoTrailingNewlines(body) : body;
}

export function htmlToMarkdown(html: string | Buffer, baseUrl?: string): string {
  return renderMarkdown(buildTree(html, baseUrl)).trim();
}
