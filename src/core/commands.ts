import fs from "node:fs";
import path from "node:path";
import { FetchCache } from "../cache";
import { ColorGuideService } from "../colors";
import { AppConfig } from "../config";
import { aggregateInventory, InventoryService } from "../inventory";
import { htmlToMarkdown } from "../markdown";
import { Logger, MetricsRegistry } from "../observability";
import { InventoryStore } from "../store";
import { Inventory } from "../types";
import { ByteSource, HttpClient } from "./http";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: InventoryStore;
  logger: Logger;
  metrics: MetricsRegistry;
  http: HttpClient;
}

function writeFileAtomic(outputPath: string, data: Buffer | string): string {
  const absolutePath = path.resolve(outputPath);
  fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
  const tempPath = `${absolutePath}.part`;
  try {
    fs.writeFileSync(tempPath, data);
    fs.renameSync(tempPath, absolutePath);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.unlinkSync(tempPath);
    }
    throw error;
  }
  return absolutePath;
}

function pageSource(ctx: CommandContext): ByteSource {
  if (!ctx.config.cachePages) {
    return ctx.http;
  }
  return new FetchCache({
    config: ctx.config,
    logger: ctx.logger.child("page_cache"),
    metrics: ctx.metrics,
    http: ctx.http,
    directory: ctx.config.cacheDirs.pages,
    accept: "text/html,*/*",
  });
}

export async function runInventory(ctx: CommandContext, setNumber: string, dryRun: boolean): Promise<void> {
  ctx.logger.info("inventory_start", { setNumber, mode: dryRun ? "dry-run" : "normal" });
  const service = new InventoryService({
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    source: pageSource(ctx),
  });

  let inventory: Inventory;
  try {
    inventory = aggregateInventory(await service.fetchInventory(setNumber));
  } catch (error) {
    ctx.metrics.incrementCounter("inventories_failed");
    throw error;
  }
  ctx.metrics.incrementCounter("inventories_ok");

  if (!dryRun) {
    await ctx.store.saveInventory(inventory, new Date().toISOString());
  }

  ctx.logger.info("inventory_complete", {
    setNumber: inventory.setNumber,
    name: inventory.name,
    parts: inventory.parts.length,
    minifigures: inventory.minifigures.length,
    categories: inventory.categories.map((category) => category.name),
    saved: !dryRun,
  });
}

export async function runMarkdown(ctx: CommandContext, url: string, outputPath?: string): Promise<void> {
  ctx.logger.info("markdown_start", { url });
  const body = await ctx.http.get(url);
  const markdown = htmlToMarkdown(body, url);

  if (outputPath) {
    const written = writeFileAtomic(outputPath, `${markdown}\n`);
    ctx.logger.info("markdown_complete", { url, path: written, chars: markdown.length });
    return;
  }
  console.log(markdown);
  ctx.logger.info("markdown_complete", { url, chars: markdown.length });
}

export async function runThumbnail(
  ctx: CommandContext,
  url: string,
  options: { outputPath?: string; invalidate: boolean },
): Promise<void> {
  const cache = new FetchCache({
    config: ctx.config,
    logger: ctx.logger.child("thumbnail_cache"),
    metrics: ctx.metrics,
    http: ctx.http,
    directory: ctx.config.cacheDirs.thumbnails,
    accept: "image/*,*/*",
  });

  if (options.invalidate) {
    await cache.invalidate(url);
  }

  const data = await cache.get(url);
  const written = options.outputPath ? writeFileAtomic(options.outputPath, data) : undefined;
  ctx.logger.info("thumbnail_complete", { url, bytes: data.length, path: written });
}

export async function runColors(ctx: CommandContext, locale: string, dryRun: boolean): Promise<void> {
  ctx.logger.info("colors_start", { locale, mode: dryRun ? "dry-run" : "normal" });
  const service = new ColorGuideService({ config: ctx.config, logger: ctx.logger, source: ctx.http });
  const entries = await service.fetchColorGuide(locale);

  if (dryRun) {
    ctx.logger.info("colors_complete", { colors: entries.length, saved: false });
    return;
  }

  const summary = await ctx.store.replaceColors(entries);
  ctx.metrics.incrementCounter("colors_refreshed", entries.length);
  ctx.logger.info("colors_complete", { colors: entries.length, saved: true, ...summary });
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  ctx.logger.info("status_start");
  const stats = await ctx.store.getStats();
  const recent = await ctx.store.listInventories(10);
  ctx.logger.info("status_complete", { stats, recent });
}
