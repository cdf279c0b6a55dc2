import { ConfigurationError } from "../errors.js";
import * as bollingerReversion from "./bollinger_reversion.js";
import * as buyAndHold from "./buy_and_hold.js";
import { strategyConfigs, type StrategyKey } from "./config.js";
import * as donchianBreakout from "./donchian_breakout.js";
import * as emaCrossover from "./ema_crossover.js";
import * as macdCrossover from "./macd_crossover.js";
import * as meanReversion from "./mean_reversion.js";
import * as smaCrossover from "./sma_crossover.js";
import * as supertrend from "./supertrend.js";
import type { Strategy, StrategyFactory } from "./types.js";

const STRATEGY_REGISTRY: Record<StrategyKey, StrategyFactory> = {
  [smaCrossover.name]: smaCrossover.factory,
  [emaCrossover.name]: emaCrossover.factory,
  [macdCrossover.name]: macdCrossover.factory,
  [meanReversion.name]: meanReversion.factory,
  [bollingerReversion.name]: bollingerReversion.factory,
  [donchianBreakout.name]: donchianBreakout.factory,
  [supertrend.name]: supertrend.factory,
  [buyAndHold.name]: buyAndHold.factory,
};

export const strategyKeys = Object.keys(STRATEGY_REGISTRY).filter(isStrategyKey);

export function isStrategyKey(value: string): value is StrategyKey {
  return Object.prototype.hasOwnProperty.call(strategyConfigs, value);
}

/**
 * Builds a registered strategy. Parameters default to the registry defaults.
 *
 * @throws ConfigurationError for an unknown key or invalid parameters.
 */
export const createStrategy = (key: string, params?: unknown): Strategy => {
  if (!isStrategyKey(key)) {
    throw new ConfigurationError(`Unknown strategy "${key}"`, { key });
  }
  const factory = STRATEGY_REGISTRY[key];
  return factory(params ?? strategyConfigs[key].defaults);
};
