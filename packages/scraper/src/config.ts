import { z } from "zod";
import {
  InvalidConfigurationError,
  SegmentConfigSchema,
  formatZodIssues,
} from "@bolanekoll/core";

export const ScraperConfigSchema = SegmentConfigSchema.extend({
  /** Pause before every request */
  delayMs: z.number().finite().nonnegative().default(0),
  proxies: z.array(z.string().url()).default([]),
  rotateUserAgent: z.boolean().default(false),
  debug: z.boolean().default(false),
  dataDir: z.string().min(1).default("data"),
  retries: z.number().int().nonnegative().default(3),
  timeoutMs: z.number().int().positive().default(30000),
});

export type ScraperConfig = z.output<typeof ScraperConfigSchema>;
export type ScraperConfigInput = z.input<typeof ScraperConfigSchema>;

/**
 * Proxies from the PROXY environment variable, comma separated
 */
export function proxiesFromEnv(env: NodeJS.ProcessEnv = process.env): string[] {
  return (env.PROXY ?? "")
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Validates scraper settings and fills in defaults. Proxies fall back to the
 * environment when none are given.
 */
export function loadScraperConfig(
  input: ScraperConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ScraperConfig {
  const withProxies =
    input.proxies === undefined ? { ...input, proxies: proxiesFromEnv(env) } : input;
  const result = ScraperConfigSchema.safeParse(withProxies);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new InvalidConfigurationError(
      `Invalid scraper configuration: ${issues.join("; ")}`,
      issues
    );
  }
  return result.data;
}
