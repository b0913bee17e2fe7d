import { describe, it, expect, beforeAll } from "vitest";
import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import { ProviderId } from "@bolanekoll/core";
import { SkandiaProvider, parseRateListEntry } from "./skandia.js";
import type { ProviderRequest } from "./types.js";
import { loadScraperConfig } from "../config.js";
import { FixtureHttpClient } from "../utils/index.js";

const FIXTURES_DIR = fileURLToPath(new URL("../../../../fixtures/", import.meta.url));
const DISCOUNTS_URL = "https://www.skandia.se/papi/mortgage/v2.0/discounts";

const config = loadScraperConfig(
  { ltvGranularity: 0.25, customLoanVolumeBins: [100_000, 200_000] },
  {}
);

describe("parseRateListEntry", () => {
  it("should split binding period and list rate", () => {
    expect(parseRateListEntry("3;4,41")).toEqual({ bindingPeriod: "3", housingInterest: 4.41 });
  });
});

describe("SkandiaProvider", () => {
  let http: FixtureHttpClient;
  let provider: SkandiaProvider;
  let requests: ProviderRequest[];

  beforeAll(async () => {
    http = new FixtureHttpClient(
      [
        {
          prefix: "https://www.skandia.se/epi-api/interests/mortgage",
          method: "GET",
          fixture: "skandia/rate-list.json",
        },
      ],
      FIXTURES_DIR
    );
    provider = new SkandiaProvider({
      http,
      config,
      now: () => new Date("2024-03-01T12:00:00.000Z"),
    });
    requests = await provider.planRequests();
  });

  it("should discover binding periods before planning", () => {
    expect(http.requests).toHaveLength(1);
    expect(http.requests[0].url).toBe("https://www.skandia.se/epi-api/interests/mortgage");
  });

  it("should plan one POST per segment and binding period", () => {
    expect(requests).toHaveLength(24);
    expect(requests.every((r) => r.method === "POST" && r.url === DISCOUNTS_URL)).toBe(true);
  });

  it("should echo the list rate of the period in the body", () => {
    expect(requests[0].body).toEqual({
      bindingPeriod: 3,
      housingInterest: 4.41,
      loanVolume: 100_000,
      price: 200_000,
    });
    expect(requests[8].body).toEqual({
      bindingPeriod: 12,
      housingInterest: 4.19,
      loanVolume: 100_000,
      price: 200_000,
    });
    expect(requests[18].body).toEqual({
      bindingPeriod: 36,
      housingInterest: 3.99,
      loanVolume: 100_000,
      price: 133_333,
    });
  });

  it("should ask for at least a second between requests", () => {
    expect(provider.minDelayMs).toBe(1000);
  });

  it("should map the discount response into a record", async () => {
    const payload = JSON.parse(await readFile(`${FIXTURES_DIR}skandia/discounts.json`, "utf-8"));
    const [record] = provider.parseResponse(payload, requests[0]);

    expect(record).toMatchObject({
      provider: ProviderId.SKANDIA,
      url: DISCOUNTS_URL,
      period: "3",
      loan_amount: 100_000,
      asset_value: 200_000,
      offered_interest_rate: 4.06,
      effective_interest_rate: 4.14,
    });
    expect(record.extra.housingInterest).toBe(4.41);
    expect(record.extra.Discount).toBe(0.35);
    expect(record.extra.AdditonalDiscounts).toBe('{"greenLoan":0.1}');
  });

  it("should recognise the block page", () => {
    expect(provider.isBlocked("<html>Vi har stoppat detta anrop</html>")).toBe(true);
    expect(provider.isBlocked('{"message":"Internal error"}')).toBe(false);
  });
});
