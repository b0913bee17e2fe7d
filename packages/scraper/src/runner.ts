import { ProviderNames, toFlatRecord, type ProviderId } from "@bolanekoll/core";
import type { ScraperConfig } from "./config.js";
import { ProviderBlockedError, errorBody } from "./errors.js";
import type { MortgageProvider, ProviderRequest } from "./providers/index.js";
import type { RecordSink } from "./sinks/index.js";
import { delay, type HttpClient } from "./utils/index.js";

const PROGRESS_EVERY = 100;

export type ScrapeSummary = {
  provider: ProviderId;
  planned: number;
  succeeded: number;
  failed: number;
  records: number;
  blocked: boolean;
  failedUrls: string[];
};

export type RunOptions = {
  http: HttpClient;
  sinks: RecordSink[];
  config: ScraperConfig;
  sleep?: (ms: number) => Promise<void>;
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Sends a provider's planned requests one at a time and writes every parsed
 * record to every sink.
 *
 * A failing request is logged and counted, never fatal. A provider that
 * signals a block ends the job early. Sinks are closed in every case.
 */
export async function runScrapingJob(
  provider: MortgageProvider,
  options: RunOptions
): Promise<ScrapeSummary> {
  const { http, sinks, config, sleep = delay } = options;
  const name = ProviderNames[provider.providerId];
  const pauseMs = Math.max(config.delayMs, provider.minDelayMs ?? 0);

  const summary: ScrapeSummary = {
    provider: provider.providerId,
    planned: 0,
    succeeded: 0,
    failed: 0,
    records: 0,
    blocked: false,
    failedUrls: [],
  };

  try {
    const requests = await provider.planRequests();
    summary.planned = requests.length;
    console.log(`${name} (${provider.sourceUrl}): scraping ${requests.length} urls...`);

    for (const [index, request] of requests.entries()) {
      await sleep(pauseMs);

      try {
        const written = await sendRequest(provider, request, http, sinks);
        summary.succeeded++;
        summary.records += written;
        if (config.debug) {
          console.debug(`${name}: ${request.url} -> ${written} records`);
        }
      } catch (error) {
        if (error instanceof ProviderBlockedError) {
          summary.blocked = true;
          console.error(`${name}: ${error.message}, stopping after ${index} requests`);
          break;
        }
        summary.failed++;
        summary.failedUrls.push(request.url);
        console.warn(`${name}: request failed, skipping ${request.url}: ${describeError(error)}`);
      }

      if ((index + 1) % PROGRESS_EVERY === 0) {
        console.log(`${name}: ${index + 1}/${requests.length} requests done`);
      }
    }
  } finally {
    for (const sink of sinks) {
      await sink.close();
    }
  }

  console.log(
    `${name}: finished, ${summary.succeeded} of ${summary.planned} requests succeeded, ` +
      `${summary.records} records written`
  );
  return summary;
}

async function sendRequest(
  provider: MortgageProvider,
  request: ProviderRequest,
  http: HttpClient,
  sinks: RecordSink[]
): Promise<number> {
  const authHeaders = provider.requestHeaders ? await provider.requestHeaders() : {};

  let payload: unknown;
  try {
    payload = await http.requestJson({
      url: request.url,
      method: request.method,
      body: request.body,
      headers: { ...request.headers, ...authHeaders },
    });
  } catch (error) {
    const body = errorBody(error);
    if (body !== undefined && provider.isBlocked?.(body)) {
      throw new ProviderBlockedError(ProviderNames[provider.providerId]);
    }
    throw error;
  }

  const records = provider.parseResponse(payload, request);
  for (const record of records) {
    const flat = toFlatRecord(record);
    for (const sink of sinks) {
      await sink.write(flat);
    }
  }
  return records.length;
}
