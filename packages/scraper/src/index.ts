export { loadScraperConfig, proxiesFromEnv, ScraperConfigSchema } from "./config.js";
export type { ScraperConfig, ScraperConfigInput } from "./config.js";
export { HttpError, InvalidResponseError, ProviderBlockedError } from "./errors.js";
export * from "./providers/index.js";
export * from "./sinks/index.js";
export { runScrapingJob, type ScrapeSummary, type RunOptions } from "./runner.js";
export { main, parseCliArgs, VERSION, USAGE, type CliCommand } from "./cli.js";
export * from "./utils/index.js";
