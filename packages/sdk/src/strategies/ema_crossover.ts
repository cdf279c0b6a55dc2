import { z } from "zod";

import { emaSeries } from "@kline-lab/indicators";

import type { Bar, Signal } from "../index.js";
import { parseStrategyParams } from "./params.js";
import { crossoverSignals } from "./signals.js";
import type { StrategyFactory } from "./types.js";

export const name = "ema_crossover" as const;

export const schema = z
  .object({
    fastWindow: z.number().int().min(1),
    slowWindow: z.number().int().min(1),
  })
  .superRefine((value, ctx) => {
    if (value.fastWindow >= value.slowWindow) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "fastWindow must be less than slowWindow",
        path: ["fastWindow"],
      });
    }
  });

export type EmaCrossoverParams = z.infer<typeof schema>;

export const factory: StrategyFactory = (input) => {
  const params = parseStrategyParams(schema, input, name);

  return {
    name,
    params,
    generateSignals(bars: ReadonlyArray<Bar>): Signal[] {
      const closes = bars.map((bar) => bar.close);
      return crossoverSignals(
        emaSeries(closes, params.fastWindow),
        emaSeries(closes, params.slowWindow),
      );
    },
  };
};
