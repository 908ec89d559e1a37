import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { cacheKey, FetchCache } from "../cache";
import { AppConfig } from "../config";
import { EmptyResponseError, HttpStatusError } from "../core/errors";
import { FetchResponseLike, HttpClient, HttpRequestInit } from "../core/http";
import { MetricsRegistry } from "../observability";
import { createGate, response, silentLogger, testConfig } from "./helpers/context";

const URL_A = "https://img.bricklink.com/ItemImage/PN/5/3001.png";

type FetchHandler = (url: string, init: HttpRequestInit) => Promise<FetchResponseLike>;

describe("FetchCache", () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), "fetch-cache-"));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  function createCache(handler: FetchHandler, overrides: Partial<AppConfig> = {}) {
    const config = testConfig(overrides);
    const logger = silentLogger();
    const metrics = new MetricsRegistry();
    const fetchFn = vi.fn(handler);
    const http = new HttpClient({ config, logger, fetchFn });
    const cache = new FetchCache({ config, logger, metrics, http, directory });
    return { cache, metrics, fetchFn };
  }

  it("shares one download between concurrent callers", async () => {
    const gate = createGate();
    const { cache, metrics, fetchFn } = createCache(async (url) => {
      await gate.promise;
      return response(url, "png-bytes");
    });

    const pending = Array.from({ length: 10 }, () => cache.get(URL_A));
    await vi.waitFor(() => expect(fetchFn).toHaveBeenCalledTimes(1));
    gate.open();
    const results = await Promise.all(pending);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(results.map((body) => body.toString())).toEqual(Array(10).fill("png-bytes"));
    expect(metrics.getCounter("cache_network_fetches")).toBe(1);
    expect(cache.stats().inflight).toBe(0);
  });

  it("serves repeated requests from memory", async () => {
    const { cache, metrics, fetchFn } = createCache(async (url) => response(url, "png-bytes"));

    await cache.get(URL_A);
    const second = await cache.get(URL_A);

    expect(second.toString()).toBe("png-bytes");
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(metrics.getCounter("cache_memory_hits")).toBe(1);
    expect(fs.readFileSync(path.join(directory, cacheKey(URL_A)), "utf8")).toBe("png-bytes");
  });

  it("falls back to disk after memory eviction", async () => {
    const { cache, metrics, fetchFn } = createCache(async (url) => response(url, `body:${url}`));
    const urls = Array.from({ length: 101 }, (_, index) => `https://img.bricklink.com/ItemImage/PN/0/${index}.png`);

    for (const url of urls) {
      await cache.get(url);
    }

    expect(cache.isInMemory(urls[0])).toBe(false);
    expect(cache.isInMemory(urls[100])).toBe(true);
    expect(cache.stats().memoryEntries).toBe(100);

    const body = await cache.get(urls[0]);

    expect(body.toString()).toBe(`body:${urls[0]}`);
    expect(fetchFn).toHaveBeenCalledTimes(101);
    expect(metrics.getCounter("cache_disk_hits")).toBe(1);
    expect(cache.isInMemory(urls[0])).toBe(true);
  });

  it("bounds concurrent downloads", async () => {
    const gate = createGate();
    let active = 0;
    let peak = 0;
    const { cache } = createCache(
      async (url) => {
        active += 1;
        peak = Math.max(peak, active);
        await gate.promise;
        active -= 1;
        return response(url, url);
      },
      { maxConcurrentDownloads: 2 },
    );
    const urls = Array.from({ length: 6 }, (_, index) => `https://img.bricklink.com/ItemImage/PN/0/${index}.png`);

    const pending = urls.map((url) => cache.get(url));
    await vi.waitFor(() =>
      expect(cache.stats()).toEqual({ memoryEntries: 0, inflight: 6, activeDownloads: 2, pendingDownloads: 4 }),
    );
    gate.open();
    const results = await Promise.all(pending);

    expect(results.map((body) => body.toString())).toEqual(urls);
    expect(peak).toBe(2);
    expect(cache.stats()).toEqual({ memoryEntries: 6, inflight: 0, activeDownloads: 0, pendingDownloads: 0 });
  });

  it("does not cache a failed download", async () => {
    let calls = 0;
    const { cache, metrics, fetchFn } = createCache(async (url) => {
      calls += 1;
      return calls === 1 ? response(url, "not found", 404) : response(url, "png-bytes");
    });

    await expect(cache.get(URL_A)).rejects.toMatchObject({ name: "HttpStatusError", status: 404 });
    const body = await cache.get(URL_A);

    expect(body.toString()).toBe("png-bytes");
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(metrics.getCounter("cache_fetch_failed")).toBe(1);
  });

  it("rejects an empty body without writing it", async () => {
    const { cache } = createCache(async (url) => response(url, ""));

    await expect(cache.get(URL_A)).rejects.toBeInstanceOf(EmptyResponseError);
    expect(fs.existsSync(path.join(directory, cacheKey(URL_A)))).toBe(false);
    expect(cache.isInMemory(URL_A)).toBe(false);
  });

  it("lets one caller cancel without failing the shared download", async () => {
    const gate = createGate();
    const { cache, metrics, fetchFn } = createCache(async (url) => {
      await gate.promise;
      return response(url, "png-bytes");
    });
    const controller = new AbortController();
    const reason = new Error("caller gave up");

    const cancelled = cache.get(URL_A, { signal: controller.signal });
    const shared = cache.get(URL_A);
    await vi.waitFor(() => expect(metrics.getCounter("cache_shared_waits")).toBe(1));
    controller.abort(reason);

    await expect(cancelled).rejects.toBe(reason);
    gate.open();
    await expect(shared).resolves.toEqual(Buffer.from("png-bytes"));
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(cache.isInMemory(URL_A)).toBe(true);
  });

  it("replaces an empty cache file with a fresh download", async () => {
    fs.writeFileSync(path.join(directory, cacheKey(URL_A)), "");
    const { cache, fetchFn } = createCache(async (url) => response(url, "png-bytes"));

    const body = await cache.get(URL_A);

    expect(body.toString()).toBe("png-bytes");
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fs.readFileSync(path.join(directory, cacheKey(URL_A)), "utf8")).toBe("png-bytes");
  });

  it("recovers when a directory occupies the cache path", async () => {
    fs.mkdirSync(path.join(directory, cacheKey(URL_A)));
    const { cache } = createCache(async (url) => response(url, "png-bytes"));

    const body = await cache.get(URL_A);

    expect(body.toString()).toBe("png-bytes");
    expect(fs.statSync(path.join(directory, cacheKey(URL_A))).isFile()).toBe(true);
  });

  it("drops both tiers on invalidate", async () => {
    const { cache, fetchFn } = createCache(async (url) => response(url, "png-bytes"));

    await cache.get(URL_A);
    await cache.invalidate(URL_A);

    expect(cache.isInMemory(URL_A)).toBe(false);
    expect(fs.existsSync(path.join(directory, cacheKey(URL_A)))).toBe(false);

    await cache.get(URL_A);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("surfaces http status errors from the client", async () => {
    const { cache } = createCache(async (url) => response(url, "gone", 410));

    await expect(cache.get(URL_A)).rejects.toBeInstanceOf(HttpStatusError);
  });
});
