import { z } from "zod";
import {
  ProviderId,
  ProviderUrls,
  createScrapeRecord,
  generateSegmentsForPeriods,
  type ScrapeRecord,
} from "@bolanekoll/core";
import { toInteger } from "../utils/index.js";
import { parsePayload } from "./shared.js";
import type { MortgageProvider, ProviderContext, ProviderRequest } from "./types.js";

const TOKEN_URL = "https://www.icabanken.se/api/token/public";
const PROPOSAL_URL =
  "https://apimgw-pub.ica.se/t/public.tenant/ica/bank/ac39/mortgage/1.0.0/interestproposal_v2_0";

// Binding periods in months; the proposal endpoint takes one per request
export const ICA_PERIODS = ["3", "12", "36", "60"] as const;

// Tokens are refreshed after two minutes even when the server grants longer
const TOKEN_LIFETIME_MS = 2 * 60 * 1000;

const AccessTokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
});

const IcaProposalSchema = z.object({
  response: z.object({
    list_interest_rate: z.number(),
    list_amount: z.number(),
    risk_discount_interest_rate: z.number(),
    risk_discount_amount: z.number(),
    loyalty_discount_interest_rate: z.number(),
    loyalty_discount_amount: z.number(),
    category_discount_interest_rate: z.number(),
    category_discount_amount: z.number(),
    offered_interest_rate: z.number(),
    offered_amount: z.number(),
    effective_interest_rate: z.number(),
    loan_to_value_interest_rate: z.number(),
  }),
});

export class IcaProvider implements MortgageProvider {
  providerId = ProviderId.ICA;
  sourceUrl = ProviderUrls[ProviderId.ICA];

  private accessToken: string | null = null;
  private tokenExpiresAt = 0;
  private readonly now: () => Date;

  constructor(private context: ProviderContext) {
    this.now = context.now ?? (() => new Date());
  }

  static proposalUrl(period: string, loanAmount: number, assetValue: number): string {
    const params = new URLSearchParams({
      type_of_mortgage: "BL",
      period_of_commitment: String(toInteger(Number(period))),
      loan_amount: String(toInteger(loanAmount)),
      value_of_the_estate: String(toInteger(assetValue)),
      ica_spend_amount: "0",
    });
    return `${PROPOSAL_URL}?${params.toString()}`;
  }

  async planRequests(): Promise<ProviderRequest[]> {
    const segments = generateSegmentsForPeriods(this.context.config, ICA_PERIODS);
    return segments.map((segment): ProviderRequest => ({
      url: IcaProvider.proposalUrl(segment.period ?? "", segment.loan_amount, segment.asset_value),
      method: "GET",
      segment,
    }));
  }

  async requestHeaders(): Promise<Record<string, string>> {
    if (this.accessToken === null || this.now().getTime() >= this.tokenExpiresAt) {
      await this.refreshAccessToken();
    }
    return { Authorization: `Bearer ${this.accessToken}` };
  }

  parseResponse(payload: unknown, request: ProviderRequest): ScrapeRecord[] {
    const { response } = parsePayload(IcaProposalSchema, payload, request.url);
    const { offered_interest_rate, effective_interest_rate, ...extra } = response;

    return [
      createScrapeRecord({
        provider: this.providerId,
        url: request.url,
        segment: request.segment,
        scrapedAt: this.now(),
        offeredInterestRate: offered_interest_rate,
        effectiveInterestRate: effective_interest_rate,
        extra,
      }),
    ];
  }

  private async refreshAccessToken(): Promise<void> {
    const payload = await this.context.http.requestJson({ url: TOKEN_URL, method: "GET" });
    const token = parsePayload(AccessTokenSchema, payload, TOKEN_URL);
    const lifetimeMs = Math.min(token.expires_in * 1000, TOKEN_LIFETIME_MS);

    this.accessToken = token.access_token;
    this.tokenExpiresAt = this.now().getTime() + lifetimeMs;
    if (this.context.config.debug) {
      console.debug(`ICA Banken: refreshed access token, valid for ${lifetimeMs / 1000}s`);
    }
  }
}
