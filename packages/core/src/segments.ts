import { parseSegmentConfig } from "./config.js";
import { LTV_AXIS_START, LTV_AXIS_STOP } from "./constants.js";
import { arange } from "./ranges.js";
import { seededShuffle } from "./random.js";
import type { MarketSegment, SegmentConfig, SegmentConfigInput } from "./types.js";

/**
 * Default loan volume axis, coarser the larger the loan:
 * 50k-2M step 50k, 2M-5M step 100k, 5M-10M step 250k (89 bins).
 */
export const DEFAULT_LOAN_VOLUME_BINS: readonly number[] = Object.freeze([
  ...arange(50_000, 2_000_000, 50_000),
  ...arange(2_000_000, 5_000_000, 100_000),
  ...arange(5_000_000, 10_000_000, 250_000),
]);

export function createMarketSegment(
  assetValue: number,
  loanAmount: number,
  period: string | null = null
): MarketSegment {
  return Object.freeze({
    asset_value: assetValue,
    loan_amount: loanAmount,
    period,
    ltv: loanAmount / assetValue,
  });
}

export function loanVolumeAxis(config: SegmentConfig): readonly number[] {
  const custom = config.customLoanVolumeBins;
  return custom && custom.length > 0 ? custom : DEFAULT_LOAN_VOLUME_BINS;
}

export function ltvAxis(config: SegmentConfig): number[] {
  return arange(LTV_AXIS_START, LTV_AXIS_STOP, config.ltvGranularity);
}

/**
 * Asset values implied by every (ltv, loan volume) pair, ltv-major:
 * asset_value = loan_amount / ltv
 */
export function assetValueAxis(config: SegmentConfig): number[] {
  const volumes = loanVolumeAxis(config);
  const assetValues: number[] = [];
  for (const ltv of ltvAxis(config)) {
    for (const volume of volumes) {
      assetValues.push(volume / ltv);
    }
  }
  return assetValues;
}

/**
 * Number of segments one generation pass yields, before truncation
 */
export function countSegments(input: SegmentConfigInput = {}): number {
  const config = parseSegmentConfig(input);
  const volumes = loanVolumeAxis(config).length;
  return volumes * ltvAxis(config).length * volumes;
}

/**
 * Every loan volume crossed with every derived asset value, in natural order
 * (volume outer, asset value inner).
 *
 * The asset values are not restricted to the ones derived from the same
 * volume: providers take loan amount and asset value directly, so the full
 * cross product covers more of the (loan, asset) plane.
 */
function buildSegmentGrid(config: SegmentConfig, period: string | null): MarketSegment[] {
  const assetValues = assetValueAxis(config);
  const segments: MarketSegment[] = [];
  for (const loanAmount of loanVolumeAxis(config)) {
    for (const assetValue of assetValues) {
      segments.push(createMarketSegment(assetValue, loanAmount, period));
    }
  }
  return segments;
}

function arrangeSegments(segments: MarketSegment[], config: SegmentConfig): MarketSegment[] {
  const ordered = config.randomizeOrder ? seededShuffle(segments, config.seed) : segments;
  return config.urlsLimit === undefined ? ordered : ordered.slice(0, config.urlsLimit);
}

/**
 * Builds the market segments for one scraping run.
 *
 * Validates the configuration first and throws InvalidConfigurationError
 * before producing anything.
 */
export function generateSegments(
  input: SegmentConfigInput = {},
  period?: string | null
): MarketSegment[] {
  const config = parseSegmentConfig(input);
  return arrangeSegments(buildSegmentGrid(config, period ?? null), config);
}

/**
 * One grid pass per period, concatenated in period order, then shuffled and
 * truncated as a whole. For providers whose rate table is keyed by period.
 */
export function generateSegmentsForPeriods(
  input: SegmentConfigInput,
  periods: readonly string[]
): MarketSegment[] {
  const config = parseSegmentConfig(input);
  const segments = periods.flatMap((period) => buildSegmentGrid(config, period));
  return arrangeSegments(segments, config);
}
