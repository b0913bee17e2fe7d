import { describe, it, expect, vi } from "vitest";
import { FetchHttpClient } from "./http-client.js";
import type { FetchOptions, FetchResult } from "./fetch.js";
import { InvalidResponseError } from "../errors.js";

function fakeFetcher(body: string) {
  return vi.fn(
    async (_url: string, _options: FetchOptions): Promise<FetchResult> => ({
      content: Buffer.from(body),
      contentType: "application/json",
      statusCode: 200,
    })
  );
}

describe("FetchHttpClient", () => {
  it("should ask for JSON and parse the answer", async () => {
    const fetcher = fakeFetcher('[{"rate":4.2}]');
    const client = new FetchHttpClient({ retries: 1, timeoutMs: 500 }, fetcher);

    const payload = await client.requestJson({ url: "https://rates.test/a", method: "GET" });

    expect(payload).toEqual([{ rate: 4.2 }]);
    expect(fetcher).toHaveBeenCalledWith("https://rates.test/a", {
      method: "GET",
      body: undefined,
      headers: { Accept: "application/json" },
      retries: 1,
      timeoutMs: 500,
      useRandomUserAgent: undefined,
      proxyUrl: undefined,
    });
  });

  it("should serialise request bodies as JSON", async () => {
    const fetcher = fakeFetcher("{}");
    const client = new FetchHttpClient({}, fetcher);

    await client.requestJson({
      url: "https://rates.test/b",
      method: "POST",
      body: { loanVolume: 100_000 },
      headers: { Authorization: "Bearer test-token" },
    });

    expect(fetcher).toHaveBeenCalledWith(
      "https://rates.test/b",
      expect.objectContaining({
        method: "POST",
        body: '{"loanVolume":100000}',
        headers: {
          Accept: "application/json",
          Authorization: "Bearer test-token",
          "Content-Type": "application/json",
        },
      })
    );
  });

  it("should pick a proxy with the given random source", async () => {
    const fetcher = fakeFetcher("{}");
    const client = new FetchHttpClient(
      { proxies: ["http://a.test:1", "http://b.test:2"], rotateUserAgent: true, random: () => 0.75 },
      fetcher
    );

    await client.requestJson({ url: "https://rates.test/c", method: "GET" });

    expect(fetcher).toHaveBeenCalledWith(
      "https://rates.test/c",
      expect.objectContaining({ proxyUrl: "http://b.test:2", useRandomUserAgent: true })
    );
  });

  it("should reject a body that is not JSON", async () => {
    const client = new FetchHttpClient({}, fakeFetcher("<html>maintenance</html>"));

    const error = await client
      .requestJson({ url: "https://rates.test/d", method: "GET" })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidResponseError);
    expect(error).toMatchObject({
      message: "Response body is not valid JSON (https://rates.test/d)",
      body: "<html>maintenance</html>",
    });
  });
});
