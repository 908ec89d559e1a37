import { DomNode, ElementNode, isElement } from "./nodes";

const ROW_GROUP_TAGS = new Set(["thead", "tbody", "tfoot"]);
const MIN_SEPARATOR_WIDTH = 3;

function displayWidth(line: string): number {
  return [...line].length;
}

function padEnd(line: string, width: number): string {
  return line + " ".repeat(Math.max(0, width - displayWidth(line)));
}

function collectRows(table: ElementNode): ElementNode[] {
  const rows: ElementNode[] = [];
  for (const child of table.children) {
    if (!isElement(child)) {
      continue;
    }
    if (child.tag === "tr") {
      rows.push(child);
    } else if (ROW_GROUP_TAGS.has(child.tag)) {
      rows.push(...child.children.filter(isElement).filter((row) => row.tag === "tr"));
    }
  }
  return rows;
}

/**
 * Renders each `tr` into a row of trimmed cell texts, padded with empty cells
 * to the width of the widest row.
 */
export function buildTableRows(table: ElementNode, render: (node: DomNode) => string): string[][] {
  const rows = collectRows(table).map((row) => row.children.map((cell) => render(cell).trim()));
  const columnCount = rows.reduce((max, row) => Math.max(max, row.length), 0);
  for (const row of rows) {
    while (row.length < columnCount) {
      row.push("");
    }
  }
  return rows;
}

export function formatTable(rows: string[][]): string {
  if (rows.length === 0) {
    return "";
  }

  const widths = rows[0].map(() => 0);
  for (const row of rows) {
    row.forEach((cell, index) => {
      const longest = cell.split("\n").reduce((max, line) => Math.max(max, displayWidth(line)), 0);
      widths[index] = Math.max(widths[index], longest);
    });
  }

  let output = "";
  rows.forEach((row, rowIndex) => {
    const cellLines = row.map((cell) => cell.split("\n"));
    const lineCount = cellLines.reduce((max, lines) => Math.max(max, lines.length), 1);

    for (let lineIndex = 0; lineIndex < lineCount; lineIndex += 1) {
      let line = "|";
      cellLines.forEach((lines, column) => {
        line += ` ${padEnd(lines[lineIndex] ?? "", widths[column])} |`;
      });
      output += `${line}\n`;
    }

    if (rowIndex === 0) {
      const separator = widths.map((width) => "-".repeat(Math.max(width, MIN_SEPARATOR_WIDTH))).join(" | ");
      output += `| ${separator} |\n`;
    }
  });

  return output;
}

/** Collapses blank-line runs and trims every line of a cell. */
export function normalizeCellContent(content: string): string {
  const lines = content
    .replace(/\r\n/g, "\n")
    .replace(/\n{2,}/g, "\n")
    .split("\n")
    .map((line) => line.trim());

  while (lines.length > 0 && lines[0] === "") {
    lines.shift();
  }
  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.join("\n");
}
