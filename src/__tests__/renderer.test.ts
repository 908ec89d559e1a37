import { describe, it, expect } from "vitest";
import { createElement, createText, ensureTwoTrailingNewlines, formatTable, htmlToMarkdown, renderMarkdown } from "../markdown";

const BASE_URL = "https://www.bricklink.com/catalogItemInv.asp?S=6000-1";

describe("text rendering", () => {
  it("collapses whitespace runs and trims paragraphs", () => {
    expect(htmlToMarkdown("<p>  Hello \n  world  </p>")).toBe("Hello world");
  });

  it("keeps one boundary space per side of a text node", () => {
    expect(renderMarkdown(createText("  spaced\t\tout  "))).toBe(" spaced out ");
    expect(renderMarkdown(createText(" "))).toBe("  ");
  });

  it("collapses internal runs without touching the edges", () => {
    expect(renderMarkdown(createText("a   \n  b"))).toBe("a b");
  });

  it("pads only for a literal boundary space", () => {
    expect(renderMarkdown(createText("\nline\n"))).toBe("line");
    expect(renderMarkdown(createText("\tline "))).toBe("line ");
  });

  it("returns preserved text verbatim", () => {
    expect(renderMarkdown(createText("  a\n   b ", true))).toBe("  a\n   b ");
  });
});

describe("inline elements", () => {
  it("moves boundary whitespace outside emphasis markers", () => {
    expect(htmlToMarkdown("<p>Buy<b> this </b>now</p>")).toBe("Buy **this** now");
    expect(htmlToMarkdown("<p><em>quiet</em> text</p>")).toBe("*quiet* text");
  });

  it("wraps inline code outside pre in backticks", () => {
    expect(htmlToMarkdown("<p>Use <code>npm ci</code> here</p>")).toBe("Use `npm ci` here");
  });

  it("keeps the outer spacing of wrapped content", () => {
    const bold = createElement("b");
    bold.children.push(createText(" foo "));

    expect(renderMarkdown(bold)).toBe(" **foo** ");
  });

  it("emits whitespace-only emphasis unchanged", () => {
    const bold = createElement("b");
    bold.children.push(createText(" "));

    expect(renderMarkdown(bold)).toBe("  ");
  });

  it("renders line breaks", () => {
    expect(htmlToMarkdown("<p>a<br>b</p>")).toBe("a\nb");
  });
});

describe("links and images", () => {
  it("renders a fragment-only link as its content", () => {
    expect(htmlToMarkdown('<p>See <a href="#notes">the notes</a>.</p>', BASE_URL)).toBe("See the notes.");
  });

  it("renders resolved links", () => {
    expect(htmlToMarkdown('<p><a href="/v2/catalog/catalogitem.page?P=3001">3001</a></p>', BASE_URL)).toBe(
      "[3001](https://www.bricklink.com/v2/catalog/catalogitem.page?P=3001)",
    );
  });

  it("drops links without content or href", () => {
    expect(htmlToMarkdown('<p>a<a href="/x"></a>b<a>c</a></p>', BASE_URL)).toBe("ab");
  });

  it("drops a link whose href is empty", () => {
    expect(htmlToMarkdown('<p><a href="">home</a></p>', BASE_URL)).toBe("");
    expect(htmlToMarkdown('<p>go <a href="  ">home</a></p>', BASE_URL)).toBe("go");
  });

  it("renders images with a default alt text and skips data uris", () => {
    expect(htmlToMarkdown('<p><img src="/img/a.png" alt="Brick"></p>')).toBe("![Brick](/img/a.png)");
    expect(htmlToMarkdown('<p><img src="b.png"></p>')).toBe("![Image](b.png)");
    expect(htmlToMarkdown('<p>x<img src="data:image/png;base64,AAAA"></p>')).toBe("x");
  });

  it("puts a figure caption on its own line", () => {
    expect(htmlToMarkdown('<figure><img src="a.png" alt="A"><figcaption> Caption </figcaption></figure>')).toBe(
      "![A](a.png)\nCaption",
    );
  });
});

describe("block elements", () => {
  it("separates block children of a div with a blank line", () => {
    expect(htmlToMarkdown("<div>Intro<p>Body</p>Tail</div>")).toBe("Intro\n\nBody\n\nTail");
  });

  it("renders headings", () => {
    expect(htmlToMarkdown("<h2>Title <em>x</em></h2>")).toBe("## Title *x*");
    expect(htmlToMarkdown("<h6>Small</h6>")).toBe("###### Small");
  });

  it("skips empty list items and numbers only rendered ones", () => {
    expect(htmlToMarkdown("<ul><li>One</li><li></li><li>Two</li></ul>")).toBe("- One\n- Two");
    expect(htmlToMarkdown("<ol><li>A</li><li> </li><li>B</li></ol>")).toBe("1. A\n2. B");
  });

  it("prefixes every blockquote line", () => {
    expect(htmlToMarkdown("<blockquote><p>Line one</p><p>Line two</p></blockquote>")).toBe("> Line one\n> Line two");
  });

  it("fences pre blocks and keeps inner indentation", () => {
    expect(htmlToMarkdown("<pre><code>\nconst a = 1;\n  return a;\n</code></pre>")).toBe(
      "```\nconst a = 1;\n  return a;\n```",
    );
  });

  it("suppresses non-content tags", () => {
    expect(htmlToMarkdown("<div><script>alert(1)</script><p>Kept</p><footer>f</footer><button>b</button></div>")).toBe(
      "Kept",
    );
  });
});

describe("ensureTwoTrailingNewlines", () => {
  it("pads to a paragraph break", () => {
    expect(ensureTwoTrailingNewlines("")).toBe("");
    expect(ensureTwoTrailingNewlines("a")).toBe("a\n\n");
    expect(ensureTwoTrailingNewlines("a\n")).toBe("a\n\n");
    expect(ensureTwoTrailingNewlines("a\n\n\n")).toBe("a\n\n\n");
  });
});

describe("tables", () => {
  it("aligns columns and splits multi-line cells over physical lines", () => {
    const html = `
      <table>
        <tr><th>Item</th><th>Qty</th></tr>
        <tr><td>Brick</td><td>12</td></tr>
        <tr><td>Plate<br>Round</td><td>3</td></tr>
      </table>`;

    expect(htmlToMarkdown(html)).toBe(
      [
        "| **Item** | **Qty** |",
        "| -------- | ------- |",
        "| Brick    | 12      |",
        "| Plate    | 3       |",
        "| Round    |         |",
      ].join("\n"),
    );
  });

  it("renders an empty header cell without markers", () => {
    expect(htmlToMarkdown("<table><tr><th></th><th>B</th></tr><tr><td>1</td><td>2</td></tr></table>")).toBe(
      ["|   | **B** |", "| --- | ----- |", "| 1 | 2     |"].join("\n"),
    );
  });

  it("collects rows from row groups", () => {
    expect(
      htmlToMarkdown("<table><thead><tr><th>A</th></tr></thead><tbody><tr><td>x</td></tr></tbody></table>"),
    ).toBe(["| **A** |", "| ----- |", "| x     |"].join("\n"));
  });

  it("collapses blank lines inside cells", () => {
    expect(htmlToMarkdown("<table><tr><td>a<br><br><br>b</td></tr></table>")).toBe(
      ["| a |", "| b |", "| --- |"].join("\n"),
    );
  });

  it("emits one separator and a pipe per column boundary for every row", () => {
    const rows = [
      ["h", "header two", "x"],
      ["a", "b", ""],
      ["longer cell", "c", "d"],
      ["e", "", "final"],
    ];
    const output = formatTable(rows.map((row) => [...row]));
    const lines = output.trimEnd().split("\n");
    const separators = lines.filter((line) => /^\| -+( \| -+)* \|$/.test(line));

    expect(separators).toEqual(["| ----------- | ---------- | ----- |"]);
    expect(lines[1]).toBe(separators[0]);
    for (const line of lines) {
      expect(line.split("|")).toHaveLength(rows[0].length + 2);
    }
  });

  it("pads cells to the column width", () => {
    expect(
      formatTable([
        ["a", "b"],
        ["c", ""],
      ]),
    ).toBe("| a | b |\n| --- | --- |\n| c |   |\n");
  });

  it("renders a stray row with pipe separators", () => {
    expect(htmlToMarkdown("<div><tr><td> a </td><td>b</td></tr></div>")).toBe("a | b");
  });
});
