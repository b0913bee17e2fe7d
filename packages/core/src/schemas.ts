import { z } from "zod";
import { ProviderId, SinkKind } from "./enums.js";
import { DEFAULT_LTV_GRANULARITY, DEFAULT_SEED } from "./constants.js";

export const ProviderIdSchema = z.nativeEnum(ProviderId);
export const SinkKindSchema = z.nativeEnum(SinkKind);

export const SegmentConfigSchema = z.object({
  ltvGranularity: z
    .number()
    .finite()
    .positive("ltv granularity must be greater than 0")
    .default(DEFAULT_LTV_GRANULARITY),
  customLoanVolumeBins: z
    .array(z.number().finite().positive("loan volume bins must be greater than 0"))
    .optional(),
  urlsLimit: z.number().int().nonnegative().optional(),
  randomizeOrder: z.boolean().default(false),
  // mulberry32 state is 32 bits wide
  seed: z.number().int().min(0).max(0xffffffff).default(DEFAULT_SEED),
});

export const ExtraValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ScrapeRecordSchema = z.object({
  provider: ProviderIdSchema,
  url: z.string(),
  scraped_at: z.string().datetime(),
  loan_amount: z.number().positive(),
  asset_value: z.number().positive(),
  ltv: z.number().positive(),
  period: z.string().nullable(),
  offered_interest_rate: z.number().nullable(),
  effective_interest_rate: z.number().nullable(),
  extra: z.record(ExtraValueSchema),
});
