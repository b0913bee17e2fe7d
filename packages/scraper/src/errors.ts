/**
 * Non-2xx answer from a provider
 */
export class HttpError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly statusText: string,
    readonly body: string
  ) {
    super(`HTTP ${status}: ${statusText} (${url})`);
    this.name = "HttpError";
  }
}

/**
 * Body that is not JSON, or JSON in a shape the provider adapter does not know
 */
export class InvalidResponseError extends Error {
  constructor(
    readonly url: string,
    message: string,
    readonly body: string
  ) {
    super(`${message} (${url})`);
    this.name = "InvalidResponseError";
  }
}

/**
 * The provider has stopped answering this client; continuing would only
 * extend the block.
 */
export class ProviderBlockedError extends Error {
  constructor(readonly provider: string) {
    super(`${provider} is blocking requests from this client`);
    this.name = "ProviderBlockedError";
  }
}

/** Response body carried by an error, if any */
export function errorBody(error: unknown): string | undefined {
  if (error instanceof HttpError || error instanceof InvalidResponseError) {
    return error.body;
  }
  return undefined;
}
