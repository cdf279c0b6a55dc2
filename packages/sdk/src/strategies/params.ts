import type { z } from "zod";

import { assertValid } from "../validation.js";

/**
 * Parses strategy parameters eagerly so that a bad configuration fails at
 * construction time with a ConfigurationError.
 */
export const parseStrategyParams = <Schema extends z.ZodTypeAny>(
  schema: Schema,
  params: unknown,
  strategyName: string,
): z.infer<Schema> => {
  return assertValid(schema, params, `${strategyName} params`);
};
