import { AppConfig } from "../config";
import { ByteSource } from "../core/http";
import { Logger } from "../observability";
import { ColorGuideEntry } from "../types";
import { parseColorGuide } from "./colorGuide";

interface ColorGuideServiceDeps {
  config: AppConfig;
  logger: Logger;
  source: ByteSource;
}

export class ColorGuideService {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly source: ByteSource;

  constructor(deps: ColorGuideServiceDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.source = deps.source;
  }

  colorGuideUrl(locale = "en-us"): string {
    return new URL(`/${encodeURIComponent(locale.toLowerCase())}/catalog/color-guide`, this.config.colorGuideBaseUrl).toString();
  }

  async fetchColorGuide(locale = "en-us"): Promise<ColorGuideEntry[]> {
    const url = this.colorGuideUrl(locale);
    const body = await this.source.get(url);
    const entries = parseColorGuide(body);
    this.logger.info("color_guide_parsed", { url, colors: entries.length });
    return entries;
  }
}
