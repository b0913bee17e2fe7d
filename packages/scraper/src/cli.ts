import { parseArgs } from "util";
import {
  InvalidConfigurationError,
  ProviderId,
  ProviderIdSchema,
  SinkKind,
  SinkKindSchema,
  parseLoanVolumeBins,
} from "@bolanekoll/core";
import { loadScraperConfig, type ScraperConfig, type ScraperConfigInput } from "./config.js";
import { createProvider } from "./providers/index.js";
import { runScrapingJob } from "./runner.js";
import { createSink } from "./sinks/index.js";
import { FetchHttpClient, type HttpClient } from "./utils/index.js";

export const VERSION = "bolanekoll v1.0.0";

const VALID_TARGETS = Object.values(ProviderId);
const VALID_SINKS = Object.values(SinkKind);

export const USAGE = `Usage: bolanekoll --target <${VALID_TARGETS.join("|")}> --sink <${VALID_SINKS.join("|")}> [options]

Samples Swedish mortgage providers for their pricing across loan amounts and LTVs.

Options:
  -t, --target <names>          providers to scrape, repeatable or comma separated
  -s, --sink <names>            where to store records, repeatable or comma separated
  -u, --urls-limit <n>          only send the first n requests per provider
  -w, --delay <seconds>         pause before every request
  -r, --randomize               send requests in a seeded random order
  -e, --seed <n>                seed for --randomize (default 42)
  -g, --ltv-granularity <step>  LTV axis step on [0.5, 1.0) (default 0.01)
  -b, --loan-volume-bins <s>    custom loan volumes as "start,stop,step"
  -p, --proxies <urls>          proxies to pick from, repeatable or comma separated
  -a, --rotate-user-agent       random browser user agent per request
  -o, --data-dir <dir>          directory for CSV files (default data)
  -d, --debug                   verbose logging
  -v, --version                 print the version
  -h, --help                    print this help`;

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "run"; targets: ProviderId[]; sinks: SinkKind[]; config: ScraperConfig };

function splitList(values: string[] | undefined): string[] {
  return (values ?? [])
    .flatMap((v) => v.split(","))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function splitNames(values: string[] | undefined): string[] {
  return splitList(values).map((v) => v.toLowerCase());
}

/**
 * Keeps the valid names in the order given, warns about the rest and fails
 * when nothing valid is left.
 */
function selectNames<T extends string>(
  values: string[] | undefined,
  parse: (value: string) => T | undefined,
  label: string,
  valid: readonly string[]
): T[] {
  const selected: T[] = [];
  for (const value of splitNames(values)) {
    const parsed = parse(value);
    if (parsed === undefined) {
      console.warn(`Ignoring unknown ${label} "${value}"`);
    } else if (!selected.includes(parsed)) {
      selected.push(parsed);
    }
  }
  if (selected.length === 0) {
    throw new InvalidConfigurationError(
      `Please provide one or many valid ${label}s out of: ${valid.join(", ")}`
    );
  }
  return selected;
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        target: { type: "string", short: "t", multiple: true },
        sink: { type: "string", short: "s", multiple: true },
        "urls-limit": { type: "string", short: "u" },
        delay: { type: "string", short: "w" },
        randomize: { type: "boolean", short: "r" },
        seed: { type: "string", short: "e" },
        "ltv-granularity": { type: "string", short: "g" },
        "loan-volume-bins": { type: "string", short: "b" },
        proxies: { type: "string", short: "p", multiple: true },
        "rotate-user-agent": { type: "boolean", short: "a" },
        "data-dir": { type: "string", short: "o" },
        debug: { type: "boolean", short: "d" },
        version: { type: "boolean", short: "v" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw new InvalidConfigurationError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Turns command line arguments into a command. Throws
 * InvalidConfigurationError for anything unusable.
 */
export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliCommand {
  const { values } = parseRawArgs(argv);

  if (values.help) return { kind: "help" };
  if (values.version) return { kind: "version" };

  const targets = selectNames(
    values.target,
    (v) => {
      const result = ProviderIdSchema.safeParse(v);
      return result.success ? result.data : undefined;
    },
    "target",
    VALID_TARGETS
  );
  const sinks = selectNames(
    values.sink,
    (v) => {
      const result = SinkKindSchema.safeParse(v);
      return result.success ? result.data : undefined;
    },
    "sink",
    VALID_SINKS
  );

  const delaySeconds = toNumber(values.delay);
  const proxies = splitList(values.proxies);
  const input: ScraperConfigInput = {
    urlsLimit: toNumber(values["urls-limit"]),
    delayMs: delaySeconds === undefined ? undefined : Math.round(delaySeconds * 1000),
    randomizeOrder: values.randomize ?? false,
    seed: toNumber(values.seed),
    ltvGranularity: toNumber(values["ltv-granularity"]),
    customLoanVolumeBins:
      values["loan-volume-bins"] === undefined
        ? undefined
        : parseLoanVolumeBins(values["loan-volume-bins"]),
    proxies: proxies.length > 0 ? proxies : undefined,
    rotateUserAgent: values["rotate-user-agent"] ?? false,
    dataDir: values["data-dir"],
    debug: values.debug ?? false,
  };

  return { kind: "run", targets, sinks, config: loadScraperConfig(input, env) };
}

export type MainDeps = {
  http?: HttpClient;
  sleep?: (ms: number) => Promise<void>;
  env?: NodeJS.ProcessEnv;
};

/**
 * CLI entrypoint. Resolves to the process exit code:
 * 0 done, 1 a provider job failed, 2 bad arguments or configuration.
 */
export async function main(argv: string[], deps: MainDeps = {}): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv, deps.env);
  } catch (error) {
    if (error instanceof InvalidConfigurationError) {
      console.error(error.message);
      console.error(USAGE);
      return 2;
    }
    throw error;
  }

  if (command.kind === "help") {
    console.log(USAGE);
    return 0;
  }
  if (command.kind === "version") {
    console.log(VERSION);
    return 0;
  }

  const { targets, sinks, config } = command;
  const http =
    deps.http ??
    new FetchHttpClient({
      retries: config.retries,
      timeoutMs: config.timeoutMs,
      proxies: config.proxies,
      rotateUserAgent: config.rotateUserAgent,
    });

  console.log(`Selected data sinks: ${sinks.join(", ")}`);
  console.log(`Selected scraping targets: ${targets.join(", ")}`);
  console.log("Beginning scraping job...");

  let failedJobs = 0;
  for (const target of targets) {
    const provider = createProvider(target, { http, config });
    const targetSinks = sinks.map((kind) =>
      createSink(kind, { namespace: target, dataDir: config.dataDir, debug: config.debug })
    );

    try {
      await runScrapingJob(provider, { http, sinks: targetSinks, config, sleep: deps.sleep });
    } catch (error) {
      failedJobs++;
      console.error(`${target}: scraping job failed:`, error);
    }
  }

  console.log("Completed jobs, exiting...");
  return failedJobs > 0 ? 1 : 0;
}
