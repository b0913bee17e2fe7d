import { z } from "zod";
import {
  ProviderId,
  ProviderUrls,
  createScrapeRecord,
  generateSegmentsForPeriods,
  type ScrapeRecord,
} from "@bolanekoll/core";
import { parseSwedishNumber, toInteger } from "../utils/index.js";
import { parsePayload } from "./shared.js";
import type { MortgageProvider, ProviderContext, ProviderRequest } from "./types.js";

const RATE_LIST_URL = "https://www.skandia.se/epi-api/interests/mortgage";
const DISCOUNTS_URL = "https://www.skandia.se/papi/mortgage/v2.0/discounts";

const BLOCKED_MARKER = "Vi har stoppat detta anrop";

// e.g. { id: "3;4,41", text: "Ordinarie ränta (3 mån): 4,41%" }
const RateListSchema = z.array(
  z.object({
    id: z.string().regex(/^\d+;/, "expected '<binding period>;<rate>'"),
    text: z.string(),
  })
);

const DiscountSchema = z.object({
  AmortizePercentage: z.number(),
  AmortizeAmount: z.number(),
  Discount: z.number(),
  Interest: z.number(),
  BaseDicount: z.number(),
  EffectiveInterestRate: z.number(),
  YearlyDiscount: z.number(),
  MonthlyDiscount: z.number(),
  MonthlyInterestCost: z.number(),
  MonthlyInterestTaxDeduction: z.number(),
  AdditonalDiscounts: z.record(z.unknown()).nullable(),
});

export type SkandiaDiscountBody = {
  bindingPeriod: number;
  housingInterest: number;
  loanVolume: number;
  price: number;
};

export type SkandiaRateListEntry = {
  bindingPeriod: string;
  housingInterest: number;
};

export function parseRateListEntry(id: string): SkandiaRateListEntry {
  const parts = id.split(";");
  return {
    bindingPeriod: parts[0],
    housingInterest: parseSwedishNumber(parts[parts.length - 1]),
  };
}

/**
 * Skandia quotes through a POST per (period, loan, price). The list rate for
 * each binding period has to be fetched first and echoed back in the body.
 */
export class SkandiaProvider implements MortgageProvider {
  providerId = ProviderId.SKANDIA;
  sourceUrl = ProviderUrls[ProviderId.SKANDIA];
  minDelayMs = 1000;

  private housingInterestByPeriod = new Map<string, number>();

  constructor(private context: ProviderContext) {}

  async fetchRateList(): Promise<SkandiaRateListEntry[]> {
    const payload = await this.context.http.requestJson({ url: RATE_LIST_URL, method: "GET" });
    return parsePayload(RateListSchema, payload, RATE_LIST_URL).map((entry) =>
      parseRateListEntry(entry.id)
    );
  }

  async planRequests(): Promise<ProviderRequest[]> {
    this.housingInterestByPeriod.clear();
    for (const entry of await this.fetchRateList()) {
      if (!this.housingInterestByPeriod.has(entry.bindingPeriod)) {
        this.housingInterestByPeriod.set(entry.bindingPeriod, entry.housingInterest);
      }
    }

    const periods = [...this.housingInterestByPeriod.keys()];
    const segments = generateSegmentsForPeriods(this.context.config, periods);

    return segments.map((segment): ProviderRequest => {
      const period = segment.period ?? "";
      const body: SkandiaDiscountBody = {
        bindingPeriod: Number(period),
        housingInterest: this.housingInterestByPeriod.get(period) ?? 0,
        loanVolume: toInteger(segment.loan_amount),
        price: toInteger(segment.asset_value),
      };
      return { url: DISCOUNTS_URL, method: "POST", body, segment };
    });
  }

  parseResponse(payload: unknown, request: ProviderRequest): ScrapeRecord[] {
    const discount = parsePayload(DiscountSchema, payload, request.url);
    const { Interest, EffectiveInterestRate, AdditonalDiscounts, ...extra } = discount;
    const period = request.segment.period ?? "";

    return [
      createScrapeRecord({
        provider: this.providerId,
        url: request.url,
        segment: request.segment,
        scrapedAt: this.context.now?.() ?? new Date(),
        offeredInterestRate: Interest,
        effectiveInterestRate: EffectiveInterestRate,
        extra: {
          ...extra,
          housingInterest: this.housingInterestByPeriod.get(period) ?? null,
          AdditonalDiscounts: AdditonalDiscounts === null ? null : JSON.stringify(AdditonalDiscounts),
        },
      }),
    ];
  }

  isBlocked(body: string): boolean {
    return body.includes(BLOCKED_MARKER);
  }
}
