import { z } from "zod";
import {
  ProviderId,
  ProviderUrls,
  createScrapeRecord,
  generateSegments,
  type ScrapeRecord,
} from "@bolanekoll/core";
import { toInteger } from "../utils/index.js";
import { parsePayload } from "./shared.js";
import type { MortgageProvider, ProviderContext, ProviderRequest } from "./types.js";

const BASE_URL = "https://www.sbab.se/www-open-rest-api";

// One entry per binding period offered for the requested loan
const SbabRatesSchema = z.array(
  z.object({
    LoptidText: z.string(),
    Rantesats: z.number(),
    Rantebindningstid: z.number(),
    EffektivRantesats: z.number(),
  })
);

export class SbabProvider implements MortgageProvider {
  providerId = ProviderId.SBAB;
  sourceUrl = ProviderUrls[ProviderId.SBAB];

  constructor(private context: ProviderContext) {}

  static ratesUrl(loanAmount: number, assetValue: number): string {
    return (
      `${BASE_URL}/resources/rantor/bolan/hamtaprisdiffaderantor` +
      `/${toInteger(assetValue)}/${toInteger(loanAmount)}`
    );
  }

  async planRequests(): Promise<ProviderRequest[]> {
    return generateSegments(this.context.config).map(
      (segment): ProviderRequest => ({
        url: SbabProvider.ratesUrl(segment.loan_amount, segment.asset_value),
        method: "GET",
        segment,
      })
    );
  }

  parseResponse(payload: unknown, request: ProviderRequest): ScrapeRecord[] {
    const rates = parsePayload(SbabRatesSchema, payload, request.url);
    const scrapedAt = this.context.now?.() ?? new Date();

    return rates.map((rate) =>
      createScrapeRecord({
        provider: this.providerId,
        url: request.url,
        segment: request.segment,
        scrapedAt,
        period: String(rate.Rantebindningstid),
        offeredInterestRate: rate.Rantesats,
        effectiveInterestRate: rate.EffektivRantesats,
        extra: { LoptidText: rate.LoptidText },
      })
    );
  }
}
