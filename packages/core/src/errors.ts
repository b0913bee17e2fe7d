/**
 * Raised when a segment or scraper configuration cannot be used.
 * Always fatal: it reflects a bad input, not a transient condition.
 */
export class InvalidConfigurationError extends Error {
  readonly kind = "InvalidConfiguration" as const;

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = "InvalidConfigurationError";
  }
}
