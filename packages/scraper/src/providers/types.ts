import type { MarketSegment, ProviderId, ScrapeRecord } from "@bolanekoll/core";
import type { ScraperConfig } from "../config.js";
import type { HttpClient, HttpRequest } from "../utils/index.js";

/**
 * One outbound pricing request and the segment it was built from
 */
export type ProviderRequest = HttpRequest & {
  segment: MarketSegment;
};

/**
 * Adapter between the shared segment grid and one lender's API
 */
export interface MortgageProvider {
  providerId: ProviderId;
  sourceUrl: string;

  /** Lower bound on the pause between two requests, for providers that rate limit hard */
  minDelayMs?: number;

  /**
   * Maps generated segments to requests. May call the provider first,
   * e.g. to discover its binding periods.
   */
  planRequests(): Promise<ProviderRequest[]>;

  /** Headers for the next request, refreshed as needed (auth tokens) */
  requestHeaders?(): Promise<Record<string, string>>;

  /** Validates a response body and maps it into records */
  parseResponse(payload: unknown, request: ProviderRequest): ScrapeRecord[];

  /** Whether a failed response body means the provider is blocking us */
  isBlocked?(body: string): boolean;
}

/**
 * What every provider is constructed with
 */
export type ProviderContext = {
  http: HttpClient;
  config: ScraperConfig;
  now?: () => Date;
};
