import type { MarketSegment, FlatRecord, ScrapeRecord } from "./types.js";
import type { ProviderId } from "./enums.js";

type RecordFields = {
  provider: ProviderId;
  url: string;
  segment: MarketSegment;
  scrapedAt?: Date;
  period?: string | null;
  offeredInterestRate?: number | null;
  effectiveInterestRate?: number | null;
  extra?: ScrapeRecord["extra"];
};

/**
 * Merges a segment and a parsed provider response into a record.
 * A period reported by the provider overrides the segment's.
 */
export function createScrapeRecord(fields: RecordFields): ScrapeRecord {
  const { segment } = fields;
  return {
    provider: fields.provider,
    url: fields.url,
    scraped_at: (fields.scrapedAt ?? new Date()).toISOString(),
    loan_amount: segment.loan_amount,
    asset_value: segment.asset_value,
    ltv: segment.ltv,
    period: fields.period !== undefined ? fields.period : segment.period,
    offered_interest_rate: fields.offeredInterestRate ?? null,
    effective_interest_rate: fields.effectiveInterestRate ?? null,
    extra: fields.extra ?? {},
  };
}

/**
 * Core columns first, then provider extras. Extras never shadow a core column.
 */
export function toFlatRecord(record: ScrapeRecord): FlatRecord {
  const { extra, ...core } = record;
  const flat: FlatRecord = { ...core };
  for (const [key, value] of Object.entries(extra)) {
    if (!Object.hasOwn(flat, key)) {
      flat[key] = value;
    }
  }
  return flat;
}
