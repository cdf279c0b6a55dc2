export * as smaCrossover from "./sma_crossover.js";
export * as emaCrossover from "./ema_crossover.js";
export * as macdCrossover from "./macd_crossover.js";
export * as meanReversion from "./mean_reversion.js";
export * as bollingerReversion from "./bollinger_reversion.js";
export * as donchianBreakout from "./donchian_breakout.js";
export * as supertrend from "./supertrend.js";
export * as buyAndHold from "./buy_and_hold.js";
