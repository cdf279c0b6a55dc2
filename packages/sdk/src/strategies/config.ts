import type { z } from "zod";

import * as bollingerReversion from "./bollinger_reversion.js";
import * as buyAndHold from "./buy_and_hold.js";
import * as donchianBreakout from "./donchian_breakout.js";
import * as emaCrossover from "./ema_crossover.js";
import * as macdCrossover from "./macd_crossover.js";
import * as meanReversion from "./mean_reversion.js";
import * as smaCrossover from "./sma_crossover.js";
import * as supertrend from "./supertrend.js";

export type StrategyKey =
  | typeof smaCrossover.name
  | typeof emaCrossover.name
  | typeof macdCrossover.name
  | typeof meanReversion.name
  | typeof bollingerReversion.name
  | typeof donchianBreakout.name
  | typeof supertrend.name
  | typeof buyAndHold.name;

export interface StrategyConfig {
  readonly key: StrategyKey;
  readonly defaults: Readonly<Record<string, number | boolean>>;
  readonly schema: z.ZodTypeAny;
}

export const strategyConfigs: Record<StrategyKey, StrategyConfig> = {
  [smaCrossover.name]: {
    key: smaCrossover.name,
    defaults: { fastWindow: 50, slowWindow: 200 },
    schema: smaCrossover.schema,
  },
  [emaCrossover.name]: {
    key: emaCrossover.name,
    defaults: { fastWindow: 50, slowWindow: 200 },
    schema: emaCrossover.schema,
  },
  [macdCrossover.name]: {
    key: macdCrossover.name,
    defaults: { fastWindow: 12, slowWindow: 26, signalWindow: 9 },
    schema: macdCrossover.schema,
  },
  [meanReversion.name]: {
    key: meanReversion.name,
    defaults: { window: 14, oversold: 30, overbought: 70 },
    schema: meanReversion.schema,
  },
  [bollingerReversion.name]: {
    key: bollingerReversion.name,
    defaults: {
      window: 20,
      stdDev: 2,
      useRsi: true,
      rsiWindow: 14,
      rsiLower: 30,
      rsiUpper: 70,
    },
    schema: bollingerReversion.schema,
  },
  [donchianBreakout.name]: {
    key: donchianBreakout.name,
    defaults: { window: 20 },
    schema: donchianBreakout.schema,
  },
  [supertrend.name]: {
    key: supertrend.name,
    defaults: { window: 10, multiplier: 3 },
    schema: supertrend.schema,
  },
  [buyAndHold.name]: {
    key: buyAndHold.name,
    defaults: {},
    schema: buyAndHold.schema,
  },
};
