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

const BASE_URL = "https://api.hypoteket.com/api/v1";

/** Hypoteket names its binding periods; records carry them as months */
export const INTEREST_TERM_MONTHS: Record<string, string> = {
  threeMonth: "3",
  oneYear: "12",
  twoYear: "24",
  threeYear: "36",
  fourYear: "48",
  fiveYear: "60",
  sevenYear: "84",
  tenYear: "120",
};

const HypoteketRatesSchema = z.array(
  z.object({
    interestTerm: z.string(),
    rate: z.number(),
    effectiveInterestRate: z.number(),
    validFrom: z.string(),
    id: z.number(),
    order: z.number(),
    codeInterestRate: z.number().nullable(),
    codeEffectiveInterestRate: z.number().nullable(),
    code: z.string().nullable(),
  })
);

export class HypoteketProvider implements MortgageProvider {
  providerId = ProviderId.HYPOTEKET;
  sourceUrl = ProviderUrls[ProviderId.HYPOTEKET];

  constructor(private context: ProviderContext) {}

  static ratesUrl(loanAmount: number, assetValue: number): string {
    const params = new URLSearchParams({
      propertyValue: String(toInteger(assetValue)),
      loanSize: String(toInteger(loanAmount)),
    });
    return `${BASE_URL}/loans/interestRates?${params.toString()}`;
  }

  async planRequests(): Promise<ProviderRequest[]> {
    return generateSegments(this.context.config).map(
      (segment): ProviderRequest => ({
        url: HypoteketProvider.ratesUrl(segment.loan_amount, segment.asset_value),
        method: "GET",
        segment,
      })
    );
  }

  parseResponse(payload: unknown, request: ProviderRequest): ScrapeRecord[] {
    const rates = parsePayload(HypoteketRatesSchema, payload, request.url);
    const scrapedAt = this.context.now?.() ?? new Date();

    return rates.map(({ interestTerm, rate, effectiveInterestRate, ...extra }) =>
      createScrapeRecord({
        provider: this.providerId,
        url: request.url,
        segment: request.segment,
        scrapedAt,
        period: INTEREST_TERM_MONTHS[interestTerm] ?? interestTerm,
        offeredInterestRate: rate,
        effectiveInterestRate,
        extra: { interestTerm, ...extra },
      })
    );
  }
}
