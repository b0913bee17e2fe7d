import type { ZodError } from "zod";
import { InvalidConfigurationError } from "./errors.js";
import { SegmentConfigSchema } from "./schemas.js";
import { arange } from "./ranges.js";
import type { SegmentConfig } from "./types.js";

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validates segment settings and fills in defaults
 */
export function parseSegmentConfig(input: unknown = {}): SegmentConfig {
  const result = SegmentConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new InvalidConfigurationError(
      `Invalid segment configuration: ${issues.join("; ")}`,
      issues
    );
  }
  return result.data;
}

/**
 * Parses a loan volume range written as "start, stop, step" and expands it.
 *
 * Accepts brackets, whitespace and digit separators, e.g.
 * "[50_000, 2_000_000, 100_000]" or "50000.0,2000000.0,100000.0".
 */
export function parseLoanVolumeBins(raw: string): number[] {
  const parts = raw
    .replace(/[[\]\s_]/g, "")
    .split(",")
    .filter((p) => p.length > 0);

  if (parts.length !== 3) {
    throw new InvalidConfigurationError(
      `Loan volume bins must be given as "start,stop,step", got "${raw}"`
    );
  }

  const [start, stop, step] = parts.map((p) => Number(p));
  if (![start, stop, step].every(Number.isFinite)) {
    throw new InvalidConfigurationError(`Loan volume bins contain a non-numeric value: "${raw}"`);
  }
  if (start <= 0 || step <= 0 || stop <= start) {
    throw new InvalidConfigurationError(
      `Loan volume bins need 0 < start < stop and step > 0, got "${raw}"`
    );
  }

  return arange(start, stop, step);
}
