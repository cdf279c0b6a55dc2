import type { z } from "zod";

import { ConfigurationError } from "./errors.js";

/**
 * Validates the supplied payload against the provided schema.
 *
 * @param schema - Zod schema used for validation.
 * @param value - Candidate payload to validate.
 * @param label - Descriptive label for error reporting.
 * @returns The parsed payload, with schema defaults applied.
 * @throws ConfigurationError when validation fails.
 */
export function assertValid<Schema extends z.ZodTypeAny>(
  schema: Schema,
  value: unknown,
  label = "payload",
): z.infer<Schema> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".") || "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new ConfigurationError(`Invalid ${label}: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}
