import { z } from "zod";

import { priorRangeSeries } from "@kline-lab/indicators";

import type { Bar, Signal } from "../index.js";
import { parseStrategyParams } from "./params.js";
import type { StrategyFactory } from "./types.js";

export const name = "donchian_breakout" as const;

export const schema = z.object({
  window: z.number().int().min(1),
});

export type DonchianBreakoutParams = z.infer<typeof schema>;

export const factory: StrategyFactory = (input) => {
  const params = parseStrategyParams(schema, input, name);

  return {
    name,
    params,
    generateSignals(bars: ReadonlyArray<Bar>): Signal[] {
      const ranges = priorRangeSeries(bars, params.window);
      return bars.map((bar, index): Signal => {
        const range = ranges[index];
        if (!range) {
          return "hold";
        }
        if (bar.close > range.high) {
          return "enter";
        }
        if (bar.close < range.low) {
          return "exit";
        }
        return "hold";
      });
    },
  };
};
