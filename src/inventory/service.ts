import { AppConfig } from "../config";
import { ByteSource } from "../core/http";
import { htmlToMarkdown } from "../markdown";
import { Logger, MetricsRegistry } from "../observability";
import { Inventory, Minifigure, Part } from "../types";
import { normalizeSetNumber } from "./aggregate";
import { resolveInOrder } from "./enrichment";
import { extractInventory, extractParts } from "./extractor";
import { minifigureInventoryUrl, setInventoryUrl } from "./urls";

interface InventoryServiceDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  source: ByteSource;
}

type VisitedPath = ReadonlySet<string>;

/**
 * Fetches a set inventory and resolves the nested inventories of its
 * minifigures and multipack parts. Nesting stops at `maxNestingDepth` and
 * never re-enters a URL already on the current path.
 */
export class InventoryService {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly source: ByteSource;

  constructor(deps: InventoryServiceDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.source = deps.source;
  }

  async fetchInventory(rawSetNumber: string): Promise<Inventory> {
    const setNumber = normalizeSetNumber(rawSetNumber);
    const url = setInventoryUrl(this.config.baseUrl, setNumber);
    const markdown = await this.fetchMarkdown(url, 0);

    const stopTimer = this.metrics.startTimer("extract_ms");
    const inventory = extractInventory(markdown, setNumber, url);
    stopTimer();
    this.logger.info("inventory_extracted", {
      setNumber,
      parts: inventory.parts.length,
      minifigures: inventory.minifigures.length,
    });

    const path: VisitedPath = new Set([url]);
    const [minifigures, parts] = await Promise.all([
      this.enrichMinifigures(inventory.minifigures, 1, path),
      this.enrichParts(inventory.parts, 1, path),
    ]);

    return { ...inventory, minifigures, parts };
  }

  async enrichMinifigures(stubs: readonly Minifigure[], depth = 1, path: VisitedPath = new Set()): Promise<Minifigure[]> {
    if (depth > this.config.maxNestingDepth) {
      return [...stubs];
    }

    return resolveInOrder(
      stubs,
      async (stub) => {
        const url = stub.inventoryUrl ?? minifigureInventoryUrl(this.config.baseUrl, stub.identifier);
        if (path.has(url)) {
          return stub;
        }
        const parts = await this.resolveParts(url, depth, path);
        this.metrics.incrementCounter("minifigures_enriched");
        return { ...stub, parts };
      },
      { concurrency: this.config.enrichConcurrency },
    );
  }

  async enrichParts(parts: readonly Part[], depth = 1, path: VisitedPath = new Set()): Promise<Part[]> {
    if (depth > this.config.maxNestingDepth || !parts.some((part) => part.inventoryUrl !== undefined)) {
      return [...parts];
    }

    return resolveInOrder(
      parts,
      async (part) => {
        const url = part.inventoryUrl;
        if (url === undefined || path.has(url)) {
          return part;
        }
        const subparts = await this.resolveParts(url, depth, path);
        this.metrics.incrementCounter("subinventories_resolved");
        return { ...part, subparts };
      },
      { concurrency: this.config.enrichConcurrency },
    );
  }

  private async resolveParts(url: string, depth: number, path: VisitedPath): Promise<Part[]> {
    const markdown = await this.fetchMarkdown(url, depth);
    const stopTimer = this.metrics.startTimer("extract_ms");
    const parts = extractParts(markdown, url);
    stopTimer();
    return this.enrichParts(parts, depth + 1, new Set([...path, url]));
  }

  private async fetchMarkdown(url: string, depth: number): Promise<string> {
    const stopTimer = this.metrics.startTimer("page_fetch_ms");
    const body = await this.source.get(url);
    const durationMs = stopTimer();
    this.metrics.incrementCounter("pages_fetched");
    this.logger.debug("inventory_page_fetched", { url, depth, bytes: body.length, durationMs });
    return htmlToMarkdown(body, url);
  }
}
