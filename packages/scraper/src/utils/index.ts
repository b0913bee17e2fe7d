export { parseSwedishNumber, toInteger } from "./numbers.js";
export { delay } from "./delay.js";
export { fetchWithRetry, type FetchResult, type FetchOptions } from "./fetch.js";
export {
  FetchHttpClient,
  parseJsonBody,
  type HttpClient,
  type HttpClientOptions,
  type HttpRequest,
} from "./http-client.js";
export { USER_AGENTS, DEFAULT_USER_AGENT, randomUserAgent } from "./user-agents.js";
export { FixtureHttpClient, type FixtureRoute } from "./fixture-http-client.js";
