import type { z } from "zod";
import { formatZodIssues } from "@bolanekoll/core";
import { InvalidResponseError } from "../errors.js";

/**
 * Validates a provider payload against its schema, raising InvalidResponseError
 * with the zod issues when the shape has drifted.
 */
export function parsePayload<T extends z.ZodTypeAny>(
  schema: T,
  payload: unknown,
  url: string
): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = formatZodIssues(result.error).join("; ");
    throw new InvalidResponseError(url, `Unexpected response shape: ${issues}`, JSON.stringify(payload));
  }
  return result.data;
}
