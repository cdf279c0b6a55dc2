import { z } from "zod";

import { supertrendSeries } from "@kline-lab/indicators";

import type { Bar, Signal } from "../index.js";
import { parseStrategyParams } from "./params.js";
import type { StrategyFactory } from "./types.js";

export const name = "supertrend" as const;

export const schema = z.object({
  window: z.number().int().min(1),
  multiplier: z.number().finite().positive(),
});

export type SuperTrendParams = z.infer<typeof schema>;

/** Enters when the SuperTrend turns up and exits when it turns down. */
export const factory: StrategyFactory = (input) => {
  const params = parseStrategyParams(schema, input, name);

  return {
    name,
    params,
    generateSignals(bars: ReadonlyArray<Bar>): Signal[] {
      const trend = supertrendSeries(bars, params.window, params.multiplier);
      return trend.map((point, index): Signal => {
        const prev = trend[index - 1];
        if (!point || !prev) {
          return "hold";
        }
        if (prev.direction === -1 && point.direction === 1) {
          return "enter";
        }
        if (prev.direction === 1 && point.direction === -1) {
          return "exit";
        }
        return "hold";
      });
    },
  };
};
