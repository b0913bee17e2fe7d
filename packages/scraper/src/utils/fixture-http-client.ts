import { readFile } from "fs/promises";
import { isAbsolute, join } from "path";
import { parseJsonBody, type HttpClient, type HttpRequest } from "./http-client.js";

export type FixtureRoute = {
  /** Matched against the start of the request URL */
  prefix: string;
  method?: HttpRequest["method"];
  fixture: string;
};

/**
 * Answers requests from local JSON files instead of the network. Keeps every
 * request it was sent, in order.
 */
export class FixtureHttpClient implements HttpClient {
  readonly requests: HttpRequest[] = [];

  constructor(
    private readonly routes: FixtureRoute[],
    private readonly rootDir: string = process.cwd()
  ) {}

  async requestJson(request: HttpRequest): Promise<unknown> {
    this.requests.push(request);

    const route = this.routes.find(
      (r) => request.url.startsWith(r.prefix) && (!r.method || r.method === request.method)
    );
    if (!route) {
      throw new Error(`No fixture registered for ${request.method} ${request.url}`);
    }

    const filePath = isAbsolute(route.fixture) ? route.fixture : join(this.rootDir, route.fixture);
    return parseJsonBody(request.url, await readFile(filePath, "utf-8"));
  }
}
