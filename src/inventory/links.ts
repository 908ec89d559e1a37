export const IMAGE_BASE_URL = "https://www.bricklink.com";

const LINK_PATTERN = /(?<!!)\[(?!!)([^\]]+)\]\(([^)\s]+)\)/g;
const IMAGE_PATTERN = /!\[[^\]]*\]\(([^)\s]+)\)/g;
const BOLD_PATTERN = /\*\*([^*]+)\*\*/;

export interface MarkdownLink {
  text: string;
  href: string;
}

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Markdown links in document order, excluding image embeds. */
export function findLinks(text: string): MarkdownLink[] {
  return [...text.matchAll(LINK_PATTERN)].map((match) => ({ text: match[1], href: match[2] }));
}

export function findImageSources(text: string): string[] {
  return [...text.matchAll(IMAGE_PATTERN)].map((match) => match[1]);
}

export function findBold(text: string): string | undefined {
  const match = BOLD_PATTERN.exec(text);
  return match ? normalizeWhitespace(match[1]) : undefined;
}

export function resolveUrl(href: string, baseUrl: string): string | undefined {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
}

export function absolutizeImageUrl(src: string): string | undefined {
  return resolveUrl(src, IMAGE_BASE_URL);
}

export function queryParam(url: string, name: string): string | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return undefined;
  }
  const wanted = name.toLowerCase();
  for (const [key, value] of parsed.searchParams) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/** Swaps the small `/S/` thumbnail path for the `/SL/` variant on bricklink hosts. */
export function promoteToHighResolution(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  if (!parsed.hostname.includes("bricklink.com") || !parsed.pathname.includes("/S/")) {
    return url;
  }
  parsed.pathname = parsed.pathname.replace("/S/", "/SL/");
  return parsed.toString();
}
