import pRetry, { AbortError } from "p-retry";
import { ProxyAgent, fetch } from "undici";
import { HttpError } from "../errors.js";
import { DEFAULT_USER_AGENT, randomUserAgent } from "./user-agents.js";

export type FetchResult = {
  content: Buffer;
  contentType: string;
  statusCode: number;
};

export type FetchOptions = {
  method?: "GET" | "POST";
  body?: string;
  retries?: number;
  timeoutMs?: number;
  /** Base delay between retries, doubled per attempt */
  minRetryDelayMs?: number;
  headers?: Record<string, string>;
  useRandomUserAgent?: boolean;
  proxyUrl?: string;
};

const proxyAgents = new Map<string, ProxyAgent>();

function getProxyDispatcher(proxyUrl: string | undefined): ProxyAgent | undefined {
  if (!proxyUrl) return undefined;
  let agent = proxyAgents.get(proxyUrl);
  if (!agent) {
    agent = new ProxyAgent(proxyUrl);
    proxyAgents.set(proxyUrl, agent);
  }
  return agent;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Fetches a URL with retries and returns the body with metadata.
 * 429 and 5xx answers and network failures are retried, other non-2xx
 * answers fail straight away with an HttpError.
 */
export async function fetchWithRetry(url: string, options: FetchOptions = {}): Promise<FetchResult> {
  const {
    method = "GET",
    body,
    retries = 3,
    timeoutMs = 30000,
    minRetryDelayMs = 1000,
    headers = {},
    useRandomUserAgent = false,
    proxyUrl,
  } = options;

  const dispatcher = getProxyDispatcher(proxyUrl);

  return await pRetry(
    async () => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const response = await fetch(url, {
          method,
          body,
          signal: controller.signal,
          dispatcher,
          headers: {
            "User-Agent": useRandomUserAgent ? randomUserAgent() : DEFAULT_USER_AGENT,
            ...headers,
          },
        });

        const content = Buffer.from(await response.arrayBuffer());

        if (!response.ok) {
          const error = new HttpError(
            url,
            response.status,
            response.statusText,
            content.toString("utf-8")
          );
          if (isRetryableStatus(response.status)) {
            throw error;
          }
          throw new AbortError(error);
        }

        return {
          content,
          contentType: response.headers.get("content-type") || "unknown",
          statusCode: response.status,
        };
      } finally {
        clearTimeout(timeoutId);
      }
    },
    {
      retries,
      minTimeout: minRetryDelayMs,
      onFailedAttempt: (error) => {
        console.warn(`Fetch attempt ${error.attemptNumber} failed for ${url}: ${error.message}`);
      },
    }
  );
}
