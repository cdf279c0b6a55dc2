import { strict as assert } from "node:assert";
import test from "node:test";

import { ConfigurationError, createStrategy, strategies, type Bar } from "../src/index.js";

const buildBars = (prices: number[]): Bar[] =>
  prices.map((price, idx) => ({
    timestamp: new Date(Date.UTC(2024, 0, idx + 1)).toISOString(),
    open: price,
    high: price,
    low: price,
    close: price,
    volume: 1_000 + idx,
  }));

test("sma crossover enters on the upward cross and flags the downward cross", () => {
  const strategy = strategies.smaCrossover.factory({ fastWindow: 1, slowWindow: 2 });
  const signals = strategy.generateSignals(buildBars([10, 11, 9, 8, 12, 15]));
  assert.deepEqual(signals, ["hold", "hold", "exit", "hold", "enter", "hold"]);
});

test("sma crossover holds while either average is undefined", () => {
  const strategy = strategies.smaCrossover.factory({ fastWindow: 3, slowWindow: 5 });
  const signals = strategy.generateSignals(buildBars([5, 1, 9, 2, 8]));
  assert.deepEqual(signals, ["hold", "hold", "hold", "hold", "hold"]);
});

test("sma crossover treats touching the slow average from below as an entry", () => {
  const strategy = strategies.smaCrossover.factory({ fastWindow: 1, slowWindow: 3 });
  // slow at index 3 = (8 + 6 + 7) / 3 = 7, fast = 7
  const signals = strategy.generateSignals(buildBars([8, 8, 6, 7]));
  assert.deepEqual(signals, ["hold", "hold", "hold", "enter"]);
});

test("sma crossover rejects fastWindow >= slowWindow before generating anything", () => {
  assert.throws(
    () => strategies.smaCrossover.factory({ fastWindow: 5, slowWindow: 3 }),
    (error: unknown) =>
      error instanceof ConfigurationError &&
      /fastWindow must be less than slowWindow/.test(error.message),
  );
  assert.throws(() => strategies.smaCrossover.factory({ fastWindow: 4, slowWindow: 4 }), ConfigurationError);
});

test("sma crossover rejects windows below 1", () => {
  assert.throws(() => strategies.smaCrossover.factory({ fastWindow: 0, slowWindow: 3 }), ConfigurationError);
});

test("ema crossover follows the same crossing rules", () => {
  const strategy = strategies.emaCrossover.factory({ fastWindow: 1, slowWindow: 2 });
  const signals = strategy.generateSignals(buildBars([10, 11, 9, 8, 12, 15]));
  assert.deepEqual(signals, ["hold", "hold", "exit", "hold", "enter", "hold"]);
});

test("mean reversion enters out of oversold and exits out of overbought", () => {
  const strategy = strategies.meanReversion.factory({ window: 2, oversold: 30, overbought: 70 });
  const signals = strategy.generateSignals(buildBars([10, 9, 8, 9, 10, 11, 10]));
  assert.deepEqual(signals, ["hold", "hold", "hold", "enter", "hold", "hold", "exit"]);
});

test("mean reversion rejects oversold >= overbought", () => {
  assert.throws(
    () => strategies.meanReversion.factory({ window: 14, oversold: 70, overbought: 30 }),
    /oversold must be less than overbought/,
  );
  assert.throws(
    () => strategies.meanReversion.factory({ window: 0, oversold: 30, overbought: 70 }),
    ConfigurationError,
  );
});

test("donchian breakout reacts to closes outside the prior channel", () => {
  const strategy = strategies.donchianBreakout.factory({ window: 3 });
  const signals = strategy.generateSignals(buildBars([100, 101, 102, 99, 98, 97, 103, 96]));
  assert.deepEqual(signals, ["hold", "hold", "hold", "exit", "exit", "exit", "enter", "exit"]);
});

test("bollinger reversion trades closes outside the bands", () => {
  const strategy = strategies.bollingerReversion.factory({
    window: 3,
    stdDev: 1,
    useRsi: false,
    rsiWindow: 14,
    rsiLower: 30,
    rsiUpper: 70,
  });
  // index 3: mean 8, deviation sqrt(8), close 4 below; index 6: mean 12, close 16 above
  const signals = strategy.generateSignals(buildBars([10, 10, 10, 4, 10, 10, 16]));
  assert.deepEqual(signals, ["hold", "hold", "hold", "enter", "hold", "hold", "exit"]);
});

test("bollinger reversion with the RSI filter needs both conditions to enter", () => {
  const withFilter = (rsiLower: number, rsiUpper: number) =>
    strategies.bollingerReversion.factory({
      window: 3,
      stdDev: 1,
      useRsi: true,
      rsiWindow: 2,
      rsiLower,
      rsiUpper,
    });
  const bars = buildBars([10, 10, 10, 4, 10, 10, 16]);
  // RSI(2): [-, -, 50, 0, 66.7, 66.7, 90.9]
  assert.deepEqual(withFilter(30, 70).generateSignals(bars), [
    "hold", "hold", "hold", "enter", "hold", "hold", "exit",
  ]);
  assert.deepEqual(withFilter(0, 70).generateSignals(bars), [
    "hold", "hold", "hold", "hold", "hold", "hold", "exit",
  ]);
  // RSI above the upper level exits even inside the bands
  assert.deepEqual(withFilter(30, 60).generateSignals(bars), [
    "hold", "hold", "hold", "enter", "exit", "exit", "exit",
  ]);
});

test("bollinger reversion holds through the band and RSI warm-up", () => {
  const strategy = strategies.bollingerReversion.factory({
    window: 3,
    stdDev: 0.5,
    useRsi: true,
    rsiWindow: 4,
    rsiLower: 45,
    rsiUpper: 55,
  });
  const signals = strategy.generateSignals(buildBars([10, 1, 20, 2, 30, 3]));
  assert.deepEqual(signals.slice(0, 4), ["hold", "hold", "hold", "hold"]);
});

test("bollinger reversion rejects bad bands and inverted RSI levels", () => {
  const valid = { window: 20, stdDev: 2, useRsi: true, rsiWindow: 14, rsiLower: 30, rsiUpper: 70 };
  assert.throws(() => strategies.bollingerReversion.factory({ ...valid, stdDev: 0 }), ConfigurationError);
  assert.throws(() => strategies.bollingerReversion.factory({ ...valid, window: 0 }), ConfigurationError);
  assert.throws(
    () => strategies.bollingerReversion.factory({ ...valid, rsiLower: 70, rsiUpper: 30 }),
    (error: unknown) =>
      error instanceof ConfigurationError && /rsiLower must be less than rsiUpper/.test(error.message),
  );
  assert.throws(() => strategies.bollingerReversion.factory({ window: 20, stdDev: 2 }), ConfigurationError);
});

test("macd crossover enters and exits on crosses of the signal line", () => {
  const strategy = strategies.macdCrossover.factory({ fastWindow: 1, slowWindow: 2, signalWindow: 2 });
  // macd: [-, 0, 0, -1, 0.67, 1.22, -0.59, -1.20]; signal: [-, -, 0, -0.67, 0.22, 0.89, -0.10, -0.83]
  const signals = strategy.generateSignals(buildBars([10, 10, 10, 7, 10, 13, 10, 7]));
  assert.deepEqual(signals, ["hold", "hold", "hold", "hold", "enter", "hold", "exit", "hold"]);
});

test("macd crossover holds until the signal line has a previous value", () => {
  const strategy = strategies.macdCrossover.factory({ fastWindow: 2, slowWindow: 3, signalWindow: 2 });
  assert.deepEqual(strategy.generateSignals(buildBars([1, 5, 1, 5])), ["hold", "hold", "hold", "hold"]);
});

test("macd crossover rejects fastWindow >= slowWindow and empty windows", () => {
  assert.throws(
    () => strategies.macdCrossover.factory({ fastWindow: 26, slowWindow: 12, signalWindow: 9 }),
    /fastWindow must be less than slowWindow/,
  );
  assert.throws(
    () => strategies.macdCrossover.factory({ fastWindow: 12, slowWindow: 26, signalWindow: 0 }),
    ConfigurationError,
  );
});

test("supertrend enters on an upturn and exits on a downturn", () => {
  const strategy = strategies.supertrend.factory({ window: 1, multiplier: 1 });
  // directions: [-, up, up, up, down, down, up, up]
  const signals = strategy.generateSignals(buildBars([10, 11, 12, 13, 9, 8, 12, 14]));
  assert.deepEqual(signals, ["hold", "hold", "hold", "hold", "exit", "hold", "enter", "hold"]);
});

test("supertrend holds until the trend has a previous value", () => {
  const strategy = strategies.supertrend.factory({ window: 3, multiplier: 1 });
  assert.deepEqual(strategy.generateSignals(buildBars([10, 20, 5, 30])), ["hold", "hold", "hold", "hold"]);
});

test("supertrend rejects a non-positive multiplier or window", () => {
  assert.throws(() => strategies.supertrend.factory({ window: 10, multiplier: 0 }), ConfigurationError);
  assert.throws(() => strategies.supertrend.factory({ window: 0, multiplier: 3 }), ConfigurationError);
  assert.throws(() => strategies.supertrend.factory({ window: 10, multiplier: "3" }), ConfigurationError);
});

test("buy and hold asks to be long on every bar", () => {
  const strategy = strategies.buyAndHold.factory({});
  assert.deepEqual(strategy.generateSignals(buildBars([1, 2, 3])), ["enter", "enter", "enter"]);
});

test("every strategy returns one signal per bar and handles degenerate series", () => {
  const built = [
    strategies.smaCrossover.factory({ fastWindow: 2, slowWindow: 4 }),
    strategies.emaCrossover.factory({ fastWindow: 2, slowWindow: 4 }),
    strategies.meanReversion.factory({ window: 3, oversold: 30, overbought: 70 }),
    strategies.donchianBreakout.factory({ window: 2 }),
    strategies.macdCrossover.factory({ fastWindow: 2, slowWindow: 3, signalWindow: 2 }),
    strategies.bollingerReversion.factory({
      window: 3,
      stdDev: 2,
      useRsi: true,
      rsiWindow: 2,
      rsiLower: 30,
      rsiUpper: 70,
    }),
    strategies.supertrend.factory({ window: 2, multiplier: 3 }),
    strategies.buyAndHold.factory({}),
  ];
  for (const strategy of built) {
    assert.deepEqual(strategy.generateSignals([]), [], `${strategy.name} on empty series`);
    assert.equal(strategy.generateSignals(buildBars([100])).length, 1, `${strategy.name} on one bar`);
    assert.equal(strategy.generateSignals(buildBars([1, 3, 2, 5, 4, 6, 2])).length, 7);
  }
});

test("generateSignals is deterministic and leaves its input untouched", () => {
  const bars = Object.freeze(buildBars([100, 98, 97, 101, 104, 102, 99, 103, 108, 101]));
  const strategy = strategies.meanReversion.factory({ window: 3, oversold: 40, overbought: 60 });
  const first = strategy.generateSignals(bars);
  const second = strategy.generateSignals(bars);
  assert.deepEqual(first, second);
  assert.equal(bars[0]?.close, 100);
});

test("signals on a prefix match the full-series signals for the same bars", () => {
  const bars = buildBars([100, 98, 97, 101, 104, 102, 99, 103, 108, 101, 95, 99, 104]);
  const strategy = createStrategy("sma_crossover", { fastWindow: 2, slowWindow: 3 });
  const full = strategy.generateSignals(bars);
  for (let k = 0; k <= bars.length; k += 1) {
    assert.deepEqual(strategy.generateSignals(bars.slice(0, k)), full.slice(0, k), `prefix ${k}`);
  }
});

test("createStrategy uses registry defaults and rejects unknown keys", () => {
  const strategy = createStrategy("mean_reversion");
  assert.equal(strategy.name, "mean_reversion");
  assert.deepEqual(strategy.params, { window: 14, oversold: 30, overbought: 70 });
  assert.throws(() => createStrategy("martingale"), /Unknown strategy "martingale"/);
});

test("createStrategy validates explicit params", () => {
  assert.throws(
    () => createStrategy("sma_crossover", { fastWindow: 5, slowWindow: 3 }),
    ConfigurationError,
  );
});
