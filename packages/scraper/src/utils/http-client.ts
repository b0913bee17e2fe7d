import { InvalidResponseError } from "../errors.js";
import { fetchWithRetry, type FetchOptions, type FetchResult } from "./fetch.js";

export type HttpRequest = {
  url: string;
  method: "GET" | "POST";
  body?: unknown;
  headers?: Record<string, string>;
};

/**
 * What providers and the runner need from the network
 */
export interface HttpClient {
  requestJson(request: HttpRequest): Promise<unknown>;
}

export type HttpClientOptions = {
  retries?: number;
  timeoutMs?: number;
  proxies?: string[];
  rotateUserAgent?: boolean;
  random?: () => number;
};

type Fetcher = (url: string, options: FetchOptions) => Promise<FetchResult>;

export function parseJsonBody(url: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new InvalidResponseError(url, "Response body is not valid JSON", text);
  }
}

/**
 * HttpClient on top of fetchWithRetry. Picks one of the configured proxies
 * per request and rotates the user agent when asked to.
 */
export class FetchHttpClient implements HttpClient {
  private readonly random: () => number;

  constructor(
    private readonly options: HttpClientOptions = {},
    private readonly fetcher: Fetcher = fetchWithRetry
  ) {
    this.random = options.random ?? Math.random;
  }

  async requestJson(request: HttpRequest): Promise<unknown> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      ...request.headers,
    };

    let body: string | undefined;
    if (request.body !== undefined) {
      body = JSON.stringify(request.body);
      headers["Content-Type"] = "application/json";
    }

    const result = await this.fetcher(request.url, {
      method: request.method,
      body,
      headers,
      retries: this.options.retries,
      timeoutMs: this.options.timeoutMs,
      useRandomUserAgent: this.options.rotateUserAgent,
      proxyUrl: this.pickProxy(),
    });

    return parseJsonBody(request.url, result.content.toString("utf-8"));
  }

  private pickProxy(): string | undefined {
    const proxies = this.options.proxies ?? [];
    if (proxies.length === 0) return undefined;
    return proxies[Math.floor(this.random() * proxies.length)];
  }
}
