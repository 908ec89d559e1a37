import { PartSection } from "../types";

export const TABLE_HEADER_MARKER = "| **Image**";

export const PART_LINK_PATTERN = /catalogitem\.page\?P=/i;
export const MINIFIGURE_LINK_PATTERN = /catalogitem\.page\?M=/i;

const SECTION_PATTERN = /^(regular|extras?|counterparts?|alternates?)(\s+items?)?$/;

/** A table row after continuation lines of multi-line cells were merged back in. */
export interface LogicalRow {
  cells: string[];
  lines: string[];
}

export function splitCells(line: string): string[] {
  let body = line.trim();
  if (body.startsWith("|")) {
    body = body.slice(1);
  }
  if (body.endsWith("|")) {
    body = body.slice(0, -1);
  }
  return body.split("|").map((cell) => cell.trim());
}

export function hasItemLink(text: string): boolean {
  return PART_LINK_PATTERN.test(text) || MINIFIGURE_LINK_PATTERN.test(text);
}

export function rowText(row: LogicalRow): string {
  return row.lines.join("\n");
}

export function groupLogicalRows(lines: readonly string[]): LogicalRow[] {
  const rows: LogicalRow[] = [];
  let current: LogicalRow | undefined;

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line.startsWith("|")) {
      current = undefined;
      continue;
    }

    const cells = splitCells(line);
    const startsRow =
      current === undefined || cells[0] !== "" || hasItemLink(line) || cells.length !== current.cells.length;

    if (startsRow || current === undefined) {
      current = { cells, lines: [line] };
      rows.push(current);
      continue;
    }

    const merged = current;
    merged.lines.push(line);
    cells.forEach((cell, index) => {
      if (cell === "") {
        return;
      }
      merged.cells[index] = merged.cells[index] === "" ? cell : `${merged.cells[index]}\n${cell}`;
    });
  }

  return rows;
}

function stripPunctuation(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function sectionMarker(row: LogicalRow): PartSection | undefined {
  if (hasItemLink(rowText(row))) {
    return undefined;
  }
  for (const cell of row.cells) {
    const match = SECTION_PATTERN.exec(stripPunctuation(cell));
    if (!match) {
      continue;
    }
    const word = match[1];
    if (word.startsWith("regular")) {
      return "regular";
    }
    if (word.startsWith("extra")) {
      return "extra";
    }
    if (word.startsWith("counterpart")) {
      return "counterpart";
    }
    return "alternate";
  }
  return undefined;
}

export function itemTypeMarker(row: LogicalRow): "parts" | "minifigures" | undefined {
  const text = rowText(row).toLowerCase();
  if (hasItemLink(text) || text.includes("[catalog]")) {
    return undefined;
  }
  if (text.includes("minifigures:")) {
    return "minifigures";
  }
  if (text.includes("parts:")) {
    return "parts";
  }
  return undefined;
}
