import { z } from "zod";

import type { Bar, Signal } from "../index.js";
import { parseStrategyParams } from "./params.js";
import type { StrategyFactory } from "./types.js";

export const name = "buy_and_hold" as const;

export const schema = z.object({});

export type BuyAndHoldParams = z.infer<typeof schema>;

/** Benchmark: asks to be long on every bar. */
export const factory: StrategyFactory = (input) => {
  const params = parseStrategyParams(schema, input, name);

  return {
    name,
    params,
    generateSignals(bars: ReadonlyArray<Bar>): Signal[] {
      return bars.map((): Signal => "enter");
    },
  };
};
