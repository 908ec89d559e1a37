import fs from "node:fs";
import path from "node:path";
import { LogLevel } from "../observability/types";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://www.bricklink.com",
  colorGuideBaseUrl: "https://v2.bricklink.com",
  userAgent: "brick-inventory/0.1 (+https://www.bricklink.com)",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  thumbnailTimeoutMs: 60_000,
  maxConcurrentDownloads: 4,
  memoryCacheLimit: 100,
  enrichConcurrency: 4,
  maxNestingDepth: 2,
  logLevel: "info",
  storeMode: "sqlite",
  storePath: "data/inventory.sqlite",
  cachePages: false,
  cacheDirs: {
    thumbnails: "data/cache/thumbnails",
    pages: "data/cache/pages",
  },
};

const LOG_LEVELS: ReadonlyArray<LogLevel | "silent"> = ["debug", "info", "warn", "error", "silent"];

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed as ConfigOverrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel | "silent"): LogLevel | "silent" {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

export function loadConfig(configPath?: string): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    cacheDirs: {
      ...DEFAULT_CONFIG.cacheDirs,
      ...(fileConfig.cacheDirs ?? {}),
    },
  };

  return {
    ...merged,
    baseUrl: process.env.BASE_URL ?? merged.baseUrl,
    colorGuideBaseUrl: process.env.COLOR_GUIDE_BASE_URL ?? merged.colorGuideBaseUrl,
    userAgent: process.env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(process.env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(process.env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    thumbnailTimeoutMs: toInt(process.env.THUMBNAIL_TIMEOUT_MS, merged.thumbnailTimeoutMs),
    maxConcurrentDownloads: Math.max(1, toInt(process.env.MAX_CONCURRENT_DOWNLOADS, merged.maxConcurrentDownloads)),
    memoryCacheLimit: Math.max(1, toInt(process.env.MEMORY_CACHE_LIMIT, merged.memoryCacheLimit)),
    enrichConcurrency: Math.max(1, toInt(process.env.ENRICH_CONCURRENCY, merged.enrichConcurrency)),
    maxNestingDepth: Math.max(0, toInt(process.env.MAX_NESTING_DEPTH, merged.maxNestingDepth)),
    logLevel: toLogLevel(process.env.LOG_LEVEL, merged.logLevel),
    storeMode:
      process.env.STORE_MODE === "sqlite" || process.env.STORE_MODE === "memory"
        ? process.env.STORE_MODE
        : merged.storeMode,
    storePath: process.env.STORE_PATH ?? merged.storePath,
    cachePages: toBool(process.env.CACHE_PAGES, merged.cachePages),
    cacheDirs: {
      thumbnails: process.env.THUMBNAIL_CACHE_DIR ?? merged.cacheDirs.thumbnails,
      pages: process.env.PAGE_CACHE_DIR ?? merged.cacheDirs.pages,
    },
  };
}

export { DEFAULT_CONFIG };
