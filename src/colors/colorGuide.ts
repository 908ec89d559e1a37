import { load } from "cheerio";
import { ColorGuideError } from "../core/errors";
import { ColorGuideEntry } from "../types";

const LEGO_COLOR_LABEL = "LEGO Color:";
const SWATCH_PROPERTY = "--bl-castor-table-swatch-with-image-background-color";
const MIN_CELLS = 8;

function cleanText(value: string): string {
  return value.replace(/\u00a0/g, " ").trim();
}

/** Splits `"<name> - <id>"` at the last hyphen; the id is dropped unless numeric. */
export function parseLegoColorDetails(text: string): { name?: string; id?: number } {
  if (!text.includes(LEGO_COLOR_LABEL)) {
    return {};
  }
  const content = cleanText(text.replace(LEGO_COLOR_LABEL, ""));
  const hyphen = content.lastIndexOf("-");
  if (hyphen < 0) {
    return content === "" ? {} : { name: content };
  }

  const name = content.slice(0, hyphen).trim();
  const rawId = content.slice(hyphen + 1).trim();
  return {
    name: name === "" ? undefined : name,
    id: /^\d+$/.test(rawId) ? Number.parseInt(rawId, 10) : undefined,
  };
}

export function parseSwatchHex(style: string | undefined): string | undefined {
  if (!style) {
    return undefined;
  }
  for (const declaration of style.split(";")) {
    const trimmed = declaration.trim();
    if (!trimmed.startsWith(`${SWATCH_PROPERTY}:`)) {
      continue;
    }
    const value = trimmed.slice(SWATCH_PROPERTY.length + 1).trim();
    if (value.startsWith("#")) {
      return value;
    }
  }
  return undefined;
}

export function parseColorGuide(html: string | Buffer): ColorGuideEntry[] {
  const $ = load(typeof html === "string" ? html : html.toString("utf-8"));
  const entries: ColorGuideEntry[] = [];

  $("tr").each((_, row) => {
    const cells = $(row).children("td");
    if (cells.length < MIN_CELLS) {
      return;
    }

    const nameCell = cells.eq(1);
    const legoInfo = nameCell
      .find("span")
      .filter((__, span) => $(span).text().includes(LEGO_COLOR_LABEL))
      .first();
    const nameElement = nameCell.find("p").first();
    if (legoInfo.length === 0 || nameElement.length === 0) {
      return;
    }

    const idText = cleanText(cells.last().text()).replace(/,/g, "");
    if (!/^\d+$/.test(idText)) {
      return;
    }

    const lego = parseLegoColorDetails(cleanText(legoInfo.text()));
    entries.push({
      brickLinkColorId: Number.parseInt(idText, 10),
      brickLinkName: cleanText(nameElement.text()),
      legoColorName: lego.name,
      legoColorId: lego.id,
      hexColor: parseSwatchHex(cells.eq(0).attr("style")),
    });
  });

  if (entries.length === 0) {
    throw new ColorGuideError("table_not_found");
  }
  return entries;
}
