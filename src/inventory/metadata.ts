import { Category } from "../types";
import { absolutizeImageUrl, findBold, findImageSources, findLinks, normalizeWhitespace, promoteToHighResolution } from "./links";

const SET_MARKER = "catalogItemPic.asp?S=";
const CATALOG_MARKER = "[Catalog]";
const SET_NAME_PATTERN = /Name:\s*([^)\]]+)/;
const HEADER_WORDS = ["image", "qty", "parts", "regular items", "mid"];
const BREADCRUMB_STOP_PATTERN = /catalogitem\.page|catalogItemInv\.asp|catalogItemPic\.asp|[?&]S=/i;

export interface SetMetadata {
  name?: string;
  thumbnailUrl?: string;
  categories: Category[];
}

function extractSetName(line: string): string | undefined {
  const match = SET_NAME_PATTERN.exec(line);
  if (match) {
    const name = normalizeWhitespace(match[1]);
    if (name !== "") {
      return name;
    }
  }

  const bold = findBold(line);
  if (bold && HEADER_WORDS.every((word) => !bold.toLowerCase().includes(word))) {
    return bold;
  }
  return undefined;
}

function extractThumbnail(lines: readonly string[]): string | undefined {
  const candidates = lines
    .filter((line) => line.includes(SET_MARKER))
    .flatMap(findImageSources)
    .map(absolutizeImageUrl)
    .filter((url): url is string => url !== undefined);

  const preferred = candidates.find((url) => url.includes("/S/")) ?? candidates[0];
  return preferred === undefined ? undefined : promoteToHighResolution(preferred);
}

/**
 * Reads a `Catalog: A: B: C` breadcrumb. Collection roots such as `Sets` carry
 * no `catString` and come back without an id; the first item- or set-scoped
 * link ends the trail.
 */
export function parseBreadcrumb(text: string): Category[] {
  const start = text.indexOf(CATALOG_MARKER);
  if (start < 0) {
    return [];
  }

  const categories: Category[] = [];
  for (const link of findLinks(text.slice(start))) {
    if (link.text.trim().toLowerCase() === "catalog") {
      continue;
    }
    if (BREADCRUMB_STOP_PATTERN.test(link.href)) {
      break;
    }
    const match = /[?&]catString=([^&#]+)/i.exec(link.href);
    categories.push({ id: match ? match[1].split(".").pop() : undefined, name: normalizeWhitespace(link.text) });
  }
  return categories;
}

export function parseSetMetadata(lines: readonly string[], headerIndex: number): SetMetadata {
  const name = lines
    .filter((line) => line.includes(SET_MARKER))
    .map((line) => extractSetName(line))
    .find((candidate) => candidate !== undefined);
  const breadcrumbLine = lines.slice(0, headerIndex).find((line) => line.includes(CATALOG_MARKER));

  return {
    name,
    thumbnailUrl: extractThumbnail(lines),
    categories: breadcrumbLine === undefined ? [] : parseBreadcrumb(breadcrumbLine),
  };
}
