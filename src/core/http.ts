import { Agent, fetch, Dispatcher } from "undici";
import { AppConfig } from "../config";
import { Logger } from "../observability";
import { EmptyResponseError, errorMessage, HttpStatusError } from "./errors";

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  url: string;
  body?: { cancel(): Promise<void> } | null;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HttpRequestInit {
  method: "GET";
  headers: Record<string, string>;
  signal: AbortSignal;
  redirect: "follow";
  dispatcher?: Dispatcher;
}

export type FetchFn = (url: string, init: HttpRequestInit) => Promise<FetchResponseLike>;

export interface GetOptions {
  signal?: AbortSignal;
}

/** Anything that turns a URL into response bytes. */
export interface ByteSource {
  get(url: string, options?: GetOptions): Promise<Buffer>;
}

export interface HttpGetOptions extends GetOptions {
  timeoutMs?: number;
  accept?: string;
  noCache?: boolean;
}

interface HttpClientDeps {
  config: AppConfig;
  logger: Logger;
  fetchFn?: FetchFn;
}

const defaultFetch: FetchFn = (url, init) => fetch(url, init);

export class HttpClient implements ByteSource {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;
  private readonly dispatcher?: Agent;

  constructor(deps: HttpClientDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.fetchFn = deps.fetchFn ?? defaultFetch;
    this.dispatcher = deps.config.ignoreHttpsErrors
      ? new Agent({ connect: { rejectUnauthorized: false } })
      : undefined;
  }

  async get(url: string, options: HttpGetOptions = {}): Promise<Buffer> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? this.config.requestTimeoutMs);
    const onAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    const headers: Record<string, string> = {
      "user-agent": this.config.userAgent,
      accept: options.accept ?? "text/html,*/*",
    };
    if (options.noCache) {
      headers["cache-control"] = "no-cache";
      headers.pragma = "no-cache";
    }

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers,
        signal: controller.signal,
        redirect: "follow",
        dispatcher: this.dispatcher,
      });

      if (!response.ok) {
        // Release the connection; the body of an error page is never read.
        await response.body?.cancel().catch((error: unknown) => {
          this.logger.debug("http_body_cancel_failed", { url, error: errorMessage(error) });
        });
        throw new HttpStatusError(response.status, url);
      }

      const body = Buffer.from(await response.arrayBuffer());
      if (body.length === 0) {
        throw new EmptyResponseError(url);
      }

      this.logger.debug("http_get_ok", { url, status: response.status, bytes: body.length });
      return body;
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }
}
