import {
  ConfigurationError,
  DataIntegrityError,
  type Bar,
  type BacktestOptions,
  type ISODate,
  type Signal,
  type Strategy,
} from "@kline-lab/sdk";

import { runBacktest } from "./engine.js";
import type { BacktestResult } from "./types.js";
import { validatePriceSeries } from "./validation.js";

export interface StrategyBacktestOptions extends BacktestOptions {
  /** Inclusive start of the simulated window; earlier bars only warm up indicators. */
  readonly simulationStart?: ISODate;
  /** Inclusive end of the simulated window. */
  readonly simulationEnd?: ISODate;
}

export interface StrategyBacktestResult extends BacktestResult {
  readonly strategy: string;
  readonly params: Readonly<Record<string, unknown>>;
  /** Signals for the simulated bars only. */
  readonly signals: ReadonlyArray<Signal>;
  /** Index in the full series of the first simulated bar. */
  readonly offset: number;
  /** Bars that were simulated. Trade indices refer to this slice. */
  readonly bars: ReadonlyArray<Bar>;
}

const parseBound = (value: ISODate | undefined, label: string): number | null => {
  if (value === undefined) {
    return null;
  }
  const epoch = Date.parse(value);
  if (Number.isNaN(epoch)) {
    throw new ConfigurationError(`${label} "${value}" is not an ISO-8601 date`, { [label]: value });
  }
  return epoch;
};

/**
 * Generates signals over the whole series, then simulates only the bars inside
 * the optional window. Signals depend on history alone, so the slice sees the
 * same decisions it would see inside the full run.
 */
export const runStrategyBacktest = (
  bars: ReadonlyArray<Bar>,
  strategy: Strategy,
  options: StrategyBacktestOptions = {},
): StrategyBacktestResult => {
  const { simulationStart, simulationEnd, ...backtestOptions } = options;
  const startEpoch = parseBound(simulationStart, "simulationStart");
  const endEpoch = parseBound(simulationEnd, "simulationEnd");
  if (startEpoch !== null && endEpoch !== null && startEpoch > endEpoch) {
    throw new ConfigurationError("simulationStart must not be after simulationEnd", {
      simulationStart,
      simulationEnd,
    });
  }

  validatePriceSeries(bars);
  const signals = strategy.generateSignals(bars);
  if (signals.length !== bars.length) {
    throw new DataIntegrityError(
      `Strategy ${strategy.name} produced ${signals.length} signals for ${bars.length} bars`,
      { strategy: strategy.name, bars: bars.length, signals: signals.length },
    );
  }

  let first = 0;
  while (first < bars.length && startEpoch !== null && Date.parse(bars[first]?.timestamp ?? "") < startEpoch) {
    first += 1;
  }
  let end = bars.length;
  while (end > first && endEpoch !== null && Date.parse(bars[end - 1]?.timestamp ?? "") > endEpoch) {
    end -= 1;
  }

  const windowBars = bars.slice(first, end);
  const windowSignals = signals.slice(first, end);
  const result = runBacktest(windowBars, windowSignals, backtestOptions);

  return {
    ...result,
    strategy: strategy.name,
    params: strategy.params,
    signals: windowSignals,
    offset: first,
    bars: windowBars,
  };
};
