import type { z } from "zod";
import type { ProviderId } from "./enums.js";
import type { ExtraValueSchema, SegmentConfigSchema } from "./schemas.js";

/**
 * One pricing query point. Frozen on creation; ltv is always
 * loan_amount / asset_value.
 */
export type MarketSegment = Readonly<{
  asset_value: number;
  loan_amount: number;
  period: string | null;
  ltv: number;
}>;

/** Segment generation settings after defaults have been applied */
export type SegmentConfig = z.output<typeof SegmentConfigSchema>;
export type SegmentConfigInput = z.input<typeof SegmentConfigSchema>;

export type ExtraValue = z.infer<typeof ExtraValueSchema>;

/**
 * A scraped price point: the known columns every provider fills plus
 * a bag of provider-specific fields.
 */
export type ScrapeRecord = {
  provider: ProviderId;
  url: string;
  scraped_at: string;
  loan_amount: number;
  asset_value: number;
  ltv: number;
  period: string | null;
  offered_interest_rate: number | null;
  effective_interest_rate: number | null;
  extra: Record<string, ExtraValue>;
};

export type FlatRecord = Record<string, ExtraValue>;
