import pLimit from "p-limit";
import { AppConfig } from "../config";
import { errorMessage } from "../core/errors";
import { ByteSource, GetOptions, HttpClient } from "../core/http";
import { Logger, MetricsRegistry } from "../observability";
import { DiskTier } from "./diskTier";
import { LruMap } from "./lruMap";

export interface FetchCacheStats {
  memoryEntries: number;
  inflight: number;
  activeDownloads: number;
  pendingDownloads: number;
}

interface FetchCacheDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  http: HttpClient;
  directory: string;
  accept?: string;
}

/** Settles with `promise`, or rejects early when this caller's `signal` aborts. */
function awaitWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal?.reason ?? new Error("aborted"));
    void promise.then(
      (value) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal?.removeEventListener("abort", onAbort);
        reject(error);
      },
    );

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }
  });
}

/**
 * Two-tier byte cache in front of the HTTP client. Concurrent callers for one
 * URL share a single download; downloads are bounded by
 * `maxConcurrentDownloads`. Map bookkeeping happens between awaits only.
 */
export class FetchCache implements ByteSource {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly http: HttpClient;
  private readonly accept: string;
  private readonly memory: LruMap<string, Buffer>;
  private readonly disk: DiskTier;
  private readonly inflight = new Map<string, Promise<Buffer>>();
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(deps: FetchCacheDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.http = deps.http;
    this.accept = deps.accept ?? "*/*";
    this.memory = new LruMap(Math.max(1, deps.config.memoryCacheLimit));
    this.disk = new DiskTier(deps.directory, deps.logger);
    this.limit = pLimit(Math.max(1, deps.config.maxConcurrentDownloads));
  }

  async get(url: string, options: GetOptions = {}): Promise<Buffer> {
    const cached = this.memory.get(url);
    if (cached) {
      this.metrics.incrementCounter("cache_memory_hits");
      return cached;
    }

    const stored = await this.disk.read(url);
    if (stored) {
      this.metrics.incrementCounter("cache_disk_hits");
      this.memory.set(url, stored);
      return stored;
    }

    const filled = this.memory.get(url);
    if (filled) {
      this.metrics.incrementCounter("cache_memory_hits");
      return filled;
    }

    let task = this.inflight.get(url);
    if (task) {
      this.metrics.incrementCounter("cache_shared_waits");
    } else {
      task = this.startDownload(url);
    }
    return awaitWithSignal(task, options.signal);
  }

  async invalidate(url: string): Promise<void> {
    this.memory.delete(url);
    await this.disk.remove(url);
    this.logger.debug("cache_invalidated", { url });
  }

  isInMemory(url: string): boolean {
    return this.memory.has(url);
  }

  stats(): FetchCacheStats {
    return {
      memoryEntries: this.memory.size,
      inflight: this.inflight.size,
      activeDownloads: this.limit.activeCount,
      pendingDownloads: this.limit.pendingCount,
    };
  }

  private startDownload(url: string): Promise<Buffer> {
    const task: Promise<Buffer> = this.limit(() => this.download(url)).finally(() => {
      if (this.inflight.get(url) === task) {
        this.inflight.delete(url);
      }
    });
    this.inflight.set(url, task);
    return task;
  }

  private async download(url: string): Promise<Buffer> {
    const stopTimer = this.metrics.startTimer("cache_fetch_ms");
    this.metrics.incrementCounter("cache_network_fetches");
    try {
      const body = await this.http.get(url, {
        timeoutMs: this.config.thumbnailTimeoutMs,
        accept: this.accept,
        noCache: true,
      });
      await this.disk.write(url, body);
      this.memory.set(url, body);
      return body;
    } catch (error) {
      this.metrics.incrementCounter("cache_fetch_failed");
      this.logger.warn("cache_fetch_failed", { url, error: errorMessage(error) });
      throw error;
    } finally {
      stopTimer();
    }
  }
}
