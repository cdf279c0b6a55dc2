import { z } from "zod";

import { bollingerSeries, rsiSeries } from "@kline-lab/indicators";

import type { Bar, Signal } from "../index.js";
import { parseStrategyParams } from "./params.js";
import type { StrategyFactory } from "./types.js";

export const name = "bollinger_reversion" as const;

export const schema = z
  .object({
    window: z.number().int().min(1),
    stdDev: z.number().finite().positive(),
    useRsi: z.boolean(),
    rsiWindow: z.number().int().min(1),
    rsiLower: z.number().min(0).max(100),
    rsiUpper: z.number().min(0).max(100),
  })
  .superRefine((value, ctx) => {
    if (value.rsiLower >= value.rsiUpper) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "rsiLower must be less than rsiUpper",
        path: ["rsiLower"],
      });
    }
  });

export type BollingerReversionParams = z.infer<typeof schema>;

/**
 * Bollinger band reversion. Enters while the close sits below the lower band
 * and exits while it sits above the upper band. With `useRsi` an entry also
 * needs RSI below `rsiLower`, and RSI above `rsiUpper` exits on its own.
 * Exits win when both fire on the same bar.
 */
export const factory: StrategyFactory = (input) => {
  const params = parseStrategyParams(schema, input, name);

  return {
    name,
    params,
    generateSignals(bars: ReadonlyArray<Bar>): Signal[] {
      const closes = bars.map((bar) => bar.close);
      const bands = bollingerSeries(closes, params.window, params.stdDev);
      const rsi = params.useRsi ? rsiSeries(closes, params.rsiWindow) : null;

      return closes.map((close, index): Signal => {
        const band = bands[index];
        if (!band) {
          return "hold";
        }
        if (!rsi) {
          if (close > band.upper) {
            return "exit";
          }
          return close < band.lower ? "enter" : "hold";
        }

        const strength = rsi[index];
        if (strength === null || strength === undefined) {
          return "hold";
        }
        if (close > band.upper || strength > params.rsiUpper) {
          return "exit";
        }
        return close < band.lower && strength < params.rsiLower ? "enter" : "hold";
      });
    },
  };
};
