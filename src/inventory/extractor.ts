import { InventoryParseError } from "../core/errors";
import { Inventory, Minifigure, Part, PartSection } from "../types";
import {
  absolutizeImageUrl,
  findBold,
  findImageSources,
  findLinks,
  MarkdownLink,
  normalizeWhitespace,
  queryParam,
  resolveUrl,
} from "./links";
import { parseBreadcrumb, parseSetMetadata } from "./metadata";
import {
  groupLogicalRows,
  hasItemLink,
  itemTypeMarker,
  LogicalRow,
  MINIFIGURE_LINK_PATTERN,
  PART_LINK_PATTERN,
  rowText,
  sectionMarker,
  TABLE_HEADER_MARKER,
} from "./rows";

const PART_NAME_PATTERN = /Name:\s*(.*?)\]\(/;
const PART_INVENTORY_PATTERN = /catalogItemInv\.asp\?P=/i;
const QUANTITY_PATTERN = /^\d+$/;

type ItemType = "parts" | "minifigures";

interface TableContents {
  parts: Part[];
  minifigures: Minifigure[];
}

interface RowFields {
  identifier: string;
  catalogUrl?: string;
  name: string;
  description: string;
  imageUrl?: string;
  quantity: number;
  links: MarkdownLink[];
}

function findHeaderIndex(lines: readonly string[]): number {
  const index = lines.findIndex((line) => line.includes(TABLE_HEADER_MARKER));
  if (index < 0) {
    throw new InventoryParseError("table_not_found");
  }
  return index;
}

function readRowFields(row: LogicalRow, pattern: RegExp, baseUrl: string): RowFields {
  const text = rowText(row);
  const cells = row.cells;
  const imageCell = cells.find((cell) => cell.includes("!["));
  const linkCell =
    cells.find((cell) => pattern.test(cell) && !cell.includes("![")) ?? cells.find((cell) => pattern.test(cell));

  const itemLink = linkCell === undefined ? undefined : findLinks(linkCell).find((link) => pattern.test(link.href));
  const identifier = itemLink ? normalizeWhitespace(itemLink.text) : "";
  if (identifier === "") {
    throw new InventoryParseError("malformed_row", { line: text });
  }

  const nameMatch = imageCell === undefined ? null : PART_NAME_PATTERN.exec(imageCell);
  const imageName = nameMatch ? normalizeWhitespace(nameMatch[1]) : "";
  const descriptionCell = cells.find((cell) => cell !== imageCell && cell !== linkCell && findBold(cell) !== undefined);
  const description = descriptionCell === undefined ? "" : (findBold(descriptionCell) ?? "");
  const name = imageName || description;
  if (name === "") {
    throw new InventoryParseError("malformed_row", { line: text });
  }

  const imageSource = imageCell === undefined ? undefined : findImageSources(imageCell)[0];
  const quantityCell = cells.find((cell) => QUANTITY_PATTERN.test(cell));

  return {
    identifier,
    catalogUrl: itemLink ? resolveUrl(itemLink.href, baseUrl) : undefined,
    name,
    description,
    imageUrl: imageSource === undefined ? undefined : absolutizeImageUrl(imageSource),
    quantity: quantityCell === undefined ? 0 : Number.parseInt(quantityCell, 10),
    links: linkCell === undefined ? [] : findLinks(linkCell),
  };
}

function colorNameFor(name: string, description: string): string {
  const at = description.indexOf(name);
  if (name === "" || at < 0) {
    return description;
  }
  return description.slice(0, at).trim();
}

export function parsePartRow(row: LogicalRow, section: PartSection, baseUrl: string): Part {
  const fields = readRowFields(row, PART_LINK_PATTERN, baseUrl);
  const inventoryLink = findLinks(rowText(row)).find((link) => PART_INVENTORY_PATTERN.test(link.href));

  return {
    id: fields.identifier,
    canonicalUrl: fields.catalogUrl,
    name: fields.name,
    colorName: colorNameFor(fields.name, fields.description),
    colorId: fields.catalogUrl === undefined ? "" : (queryParam(fields.catalogUrl, "idColor") ?? ""),
    imageUrl: fields.imageUrl,
    quantity: fields.quantity,
    section,
    inventoryUrl: inventoryLink ? resolveUrl(inventoryLink.href, baseUrl) : undefined,
    subparts: [],
  };
}

export function parseMinifigureRow(row: LogicalRow, baseUrl: string): Minifigure {
  const fields = readRowFields(row, MINIFIGURE_LINK_PATTERN, baseUrl);
  const inventoryLink = fields.links[1];

  return {
    identifier: fields.identifier,
    name: fields.name,
    quantity: fields.quantity,
    imageUrl: fields.imageUrl,
    catalogUrl: fields.catalogUrl,
    inventoryUrl: inventoryLink ? resolveUrl(inventoryLink.href, baseUrl) : undefined,
    categories: parseBreadcrumb(rowText(row)),
    parts: [],
  };
}

function scanTable(lines: readonly string[], headerIndex: number, baseUrl: string, includeMinifigures: boolean): TableContents {
  const contents: TableContents = { parts: [], minifigures: [] };
  let section: PartSection = "regular";
  let itemType: ItemType = "parts";

  for (const row of groupLogicalRows(lines.slice(headerIndex + 2))) {
    const text = rowText(row);
    if (hasItemLink(text)) {
      if (itemType === "parts" && PART_LINK_PATTERN.test(text)) {
        contents.parts.push(parsePartRow(row, section, baseUrl));
      } else if (itemType === "minifigures" && MINIFIGURE_LINK_PATTERN.test(text) && includeMinifigures) {
        contents.minifigures.push(parseMinifigureRow(row, baseUrl));
      }
      continue;
    }

    const nextSection = sectionMarker(row);
    if (nextSection) {
      section = nextSection;
      continue;
    }

    itemType = itemTypeMarker(row) ?? itemType;
  }

  return contents;
}

/** Extracts a set inventory. Minifigures come back as stubs with empty `parts`. */
export function extractInventory(markdown: string, setNumber: string, baseUrl: string): Inventory {
  const lines = markdown.split(/\r?\n/);
  const headerIndex = findHeaderIndex(lines);
  const metadata = parseSetMetadata(lines, headerIndex);
  const contents = scanTable(lines, headerIndex, baseUrl, true);

  if (!metadata.name) {
    throw new InventoryParseError("missing_set_name");
  }

  return {
    setNumber,
    name: metadata.name,
    thumbnailUrl: metadata.thumbnailUrl,
    parts: contents.parts,
    categories: metadata.categories,
    minifigures: contents.minifigures,
  };
}

/** Parts-only extraction for minifigure and multipack inventory pages. */
export function extractParts(markdown: string, baseUrl: string): Part[] {
  const lines = markdown.split(/\r?\n/);
  return scanTable(lines, findHeaderIndex(lines), baseUrl, false).parts;
}
