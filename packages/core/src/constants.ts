export const DEFAULT_LTV_GRANULARITY = 0.01;
export const DEFAULT_SEED = 42;

// LTV axis is sampled on [0.5, 1.0)
export const LTV_AXIS_START = 0.5;
export const LTV_AXIS_STOP = 1.0;

/**
 * Upper bound the default bins are chosen to stay under for a single
 * generation pass (loan volumes × LTV steps × loan volumes).
 */
export const MAX_SEGMENTS_PER_PASS = 1_000_000;
