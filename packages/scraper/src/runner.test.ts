import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from "vitest";
import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import {
  ProviderId,
  createScrapeRecord,
  generateSegments,
  type FlatRecord,
} from "@bolanekoll/core";
import { loadScraperConfig } from "./config.js";
import { HttpError } from "./errors.js";
import { SbabProvider, type MortgageProvider, type ProviderRequest } from "./providers/index.js";
import { runScrapingJob } from "./runner.js";
import type { RecordSink } from "./sinks/index.js";
import type { HttpClient, HttpRequest } from "./utils/index.js";

const FIXTURES_DIR = fileURLToPath(new URL("../../../fixtures/", import.meta.url));

// ltv axis [0.5] -> asset values [200k, 400k] -> 4 segments
const config = loadScraperConfig(
  { ltvGranularity: 0.5, customLoanVolumeBins: [100_000, 200_000] },
  {}
);

class MemorySink implements RecordSink {
  readonly name = "memory";
  records: FlatRecord[] = [];
  closed = false;

  async write(record: FlatRecord): Promise<void> {
    this.records.push(record);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class StubHttpClient implements HttpClient {
  readonly requests: HttpRequest[] = [];

  constructor(private respond: (request: HttpRequest) => unknown) {}

  async requestJson(request: HttpRequest): Promise<unknown> {
    this.requests.push(request);
    return this.respond(request);
  }
}

function stubProvider(overrides: Partial<MortgageProvider> = {}): MortgageProvider {
  return {
    providerId: ProviderId.SKANDIA,
    sourceUrl: "https://rates.test",
    async planRequests() {
      return generateSegments(config).map(
        (segment): ProviderRequest => ({
          url: `https://rates.test/${segment.loan_amount}/${segment.asset_value}`,
          method: "GET",
          segment,
        })
      );
    },
    parseResponse(_payload, request) {
      return [
        createScrapeRecord({
          provider: ProviderId.SKANDIA,
          url: request.url,
          segment: request.segment,
        }),
      ];
    },
    ...overrides,
  };
}

describe("runScrapingJob", () => {
  let sbabRates: unknown;
  const sleep = vi.fn(async (_ms: number) => {});

  beforeAll(async () => {
    sbabRates = JSON.parse(await readFile(`${FIXTURES_DIR}sbab/rates.json`, "utf-8"));
  });

  beforeEach(() => {
    sleep.mockClear();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write every record to every sink", async () => {
    const http = new StubHttpClient(() => sbabRates);
    const sinks = [new MemorySink(), new MemorySink()];

    const summary = await runScrapingJob(new SbabProvider({ http, config }), {
      http,
      sinks,
      config,
      sleep,
    });

    expect(summary).toEqual({
      provider: ProviderId.SBAB,
      planned: 4,
      succeeded: 4,
      failed: 0,
      records: 12,
      blocked: false,
      failedUrls: [],
    });
    expect(http.requests).toHaveLength(4);
    for (const sink of sinks) {
      expect(sink.records).toHaveLength(12);
      expect(sink.closed).toBe(true);
    }
    expect(Object.keys(sinks[0].records[0])).toEqual([
      "provider",
      "url",
      "scraped_at",
      "loan_amount",
      "asset_value",
      "ltv",
      "period",
      "offered_interest_rate",
      "effective_interest_rate",
      "LoptidText",
    ]);
    expect(console.log).toHaveBeenCalledWith("SBAB (https://www.sbab.se): scraping 4 urls...");
  });

  it("should pause before every request", async () => {
    const http = new StubHttpClient(() => ({}));

    await runScrapingJob(stubProvider(), {
      http,
      sinks: [],
      config: { ...config, delayMs: 250 },
      sleep,
    });

    expect(sleep).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it("should never pause less than the provider asks for", async () => {
    const http = new StubHttpClient(() => ({}));

    await runScrapingJob(stubProvider({ minDelayMs: 1000 }), {
      http,
      sinks: [],
      config: { ...config, delayMs: 250 },
      sleep,
    });

    expect(sleep).toHaveBeenCalledWith(1000);
    expect(sleep).not.toHaveBeenCalledWith(250);
  });

  it("should send provider headers with every request", async () => {
    const http = new StubHttpClient(() => ({}));
    const requestHeaders = vi.fn(async () => ({ Authorization: "Bearer test-token" }));

    await runScrapingJob(stubProvider({ requestHeaders }), { http, sinks: [], config, sleep });

    expect(requestHeaders).toHaveBeenCalledTimes(4);
    expect(http.requests[0].headers).toEqual({ Authorization: "Bearer test-token" });
  });

  it("should skip failed requests and carry on", async () => {
    const failingUrl = "https://rates.test/100000/400000";
    const http = new StubHttpClient((request) => {
      if (request.url === failingUrl) {
        throw new HttpError(request.url, 500, "Internal Server Error", "oops");
      }
      return {};
    });
    const sink = new MemorySink();

    const summary = await runScrapingJob(stubProvider(), { http, sinks: [sink], config, sleep });

    expect(summary).toMatchObject({
      planned: 4,
      succeeded: 3,
      failed: 1,
      records: 3,
      blocked: false,
      failedUrls: [failingUrl],
    });
    expect(sink.records).toHaveLength(3);
    expect(console.warn).toHaveBeenCalledWith(
      `Skandia: request failed, skipping ${failingUrl}: HTTP 500: Internal Server Error (${failingUrl})`
    );
  });

  it("should stop when the provider reports a block", async () => {
    const http = new StubHttpClient((request) => {
      throw new HttpError(request.url, 403, "Forbidden", "<p>Vi har stoppat detta anrop</p>");
    });
    const sink = new MemorySink();
    const provider = stubProvider({
      isBlocked: (body) => body.includes("Vi har stoppat detta anrop"),
    });

    const summary = await runScrapingJob(provider, { http, sinks: [sink], config, sleep });

    expect(summary).toMatchObject({ planned: 4, succeeded: 0, failed: 0, blocked: true });
    expect(http.requests).toHaveLength(1);
    expect(sink.closed).toBe(true);
    expect(console.error).toHaveBeenCalledWith(
      "Skandia: Skandia is blocking requests from this client, stopping after 0 requests"
    );
  });

  it("should close the sinks when planning fails", async () => {
    const sink = new MemorySink();
    const provider = stubProvider({
      planRequests: async () => {
        throw new Error("rate list unavailable");
      },
    });

    await expect(
      runScrapingJob(provider, { http: new StubHttpClient(() => ({})), sinks: [sink], config, sleep })
    ).rejects.toThrow("rate list unavailable");
    expect(sink.closed).toBe(true);
  });
});
