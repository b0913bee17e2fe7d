// Enums
export { ProviderId, ProviderNames, ProviderUrls, SinkKind } from "./enums.js";

// Types
export type {
  MarketSegment,
  SegmentConfig,
  SegmentConfigInput,
  ExtraValue,
  ScrapeRecord,
  FlatRecord,
} from "./types.js";

// Zod Schemas
export {
  ProviderIdSchema,
  SinkKindSchema,
  SegmentConfigSchema,
  ExtraValueSchema,
  ScrapeRecordSchema,
} from "./schemas.js";

// Errors
export { InvalidConfigurationError } from "./errors.js";

// Segment generation
export {
  DEFAULT_LTV_GRANULARITY,
  DEFAULT_SEED,
  LTV_AXIS_START,
  LTV_AXIS_STOP,
  MAX_SEGMENTS_PER_PASS,
} from "./constants.js";
export {
  DEFAULT_LOAN_VOLUME_BINS,
  createMarketSegment,
  loanVolumeAxis,
  ltvAxis,
  assetValueAxis,
  countSegments,
  generateSegments,
  generateSegmentsForPeriods,
} from "./segments.js";
export { parseSegmentConfig, parseLoanVolumeBins, formatZodIssues } from "./config.js";
export { arange } from "./ranges.js";
export { mulberry32, seededShuffle } from "./random.js";
export { createScrapeRecord, toFlatRecord } from "./records.js";
