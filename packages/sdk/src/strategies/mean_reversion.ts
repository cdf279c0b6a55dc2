import { z } from "zod";

import { rsiSeries } from "@kline-lab/indicators";

import type { Bar, Signal } from "../index.js";
import { parseStrategyParams } from "./params.js";
import { thresholdCrossSignals } from "./signals.js";
import type { StrategyFactory } from "./types.js";

export const name = "mean_reversion" as const;

export const schema = z
  .object({
    window: z.number().int().min(1),
    oversold: z.number().min(0).max(100),
    overbought: z.number().min(0).max(100),
  })
  .superRefine((value, ctx) => {
    if (value.oversold >= value.overbought) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "oversold must be less than overbought",
        path: ["oversold"],
      });
    }
  });

export type MeanReversionParams = z.infer<typeof schema>;

/**
 * RSI mean reversion: buys the recovery out of oversold territory and sells
 * the roll-over out of overbought territory.
 */
export const factory: StrategyFactory = (input) => {
  const params = parseStrategyParams(schema, input, name);

  return {
    name,
    params,
    generateSignals(bars: ReadonlyArray<Bar>): Signal[] {
      const rsi = rsiSeries(
        bars.map((bar) => bar.close),
        params.window,
      );
      return thresholdCrossSignals(rsi, params.oversold, params.overbought);
    },
  };
};
