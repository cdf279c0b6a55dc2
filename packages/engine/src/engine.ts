import { buildPerformanceReport, inferPeriodsPerYear } from "@kline-lab/metrics";
import {
  BacktestOptionsSchema,
  ComputationError,
  assertValid,
  type Bar,
  type BacktestOptions,
  type ExitReason,
  type ResolvedBacktestOptions,
  type Signal,
  type Trade,
} from "@kline-lab/sdk";

import type { BacktestResult, EquityPoint, PendingOrder, PositionState } from "./types.js";
import { validateRunInputs } from "./validation.js";

const FLAT: PositionState = { state: "flat" };

/**
 * Return of one round trip after a flat fee on each side.
 *
 * @throws ComputationError when the entry price is not positive or the result
 * is not finite.
 */
export const computeReturnPct = (entryPrice: number, exitPrice: number, feeRate = 0): number => {
  if (!(entryPrice > 0)) {
    throw new ComputationError(`Cannot compute a return from entry price ${entryPrice}`, {
      entryPrice,
      exitPrice,
    });
  }
  const effectiveEntry = entryPrice * (1 + feeRate);
  const effectiveExit = exitPrice * (1 - feeRate);
  const returnPct = (effectiveExit - effectiveEntry) / effectiveEntry;
  if (!Number.isFinite(returnPct)) {
    throw new ComputationError(`Return for ${entryPrice} -> ${exitPrice} is not finite`, {
      entryPrice,
      exitPrice,
      feeRate,
    });
  }
  return returnPct;
};

/**
 * Replays `signals` over `bars` with a single long-only position and returns
 * the trade list, the per-bar equity curve and the performance report.
 *
 * Inputs are validated before the first bar is simulated; a position still open
 * after the last bar is closed at that bar's close.
 */
export function runBacktest(
  bars: ReadonlyArray<Bar>,
  signals: ReadonlyArray<Signal>,
  options: BacktestOptions = {},
): BacktestResult {
  const resolved = assertValid(BacktestOptionsSchema, options, "BacktestOptions");
  const checkedSignals = validateRunInputs(bars, signals);

  const simulation = simulate(bars, checkedSignals, resolved);
  const report = buildPerformanceReport(
    simulation.trades,
    simulation.equityCurve,
    resolved.initialCapital,
    inferPeriodsPerYear(bars.map((bar) => bar.timestamp)),
  );

  return {
    trades: simulation.trades,
    report,
    equityCurve: simulation.equityCurve,
  };
}

interface SimulationResult {
  readonly trades: Trade[];
  readonly equityCurve: EquityPoint[];
}

const decide = (position: PositionState, signal: Signal): PendingOrder | null => {
  if (position.state === "flat" && signal === "enter") {
    return "enter";
  }
  if (position.state === "long" && signal === "exit") {
    return "exit";
  }
  return null;
};

const simulate = (
  bars: ReadonlyArray<Bar>,
  signals: ReadonlyArray<Signal>,
  options: ResolvedBacktestOptions,
): SimulationResult => {
  const trades: Trade[] = [];
  const equityCurve: EquityPoint[] = [];
  const lastIndex = bars.length - 1;
  let position: PositionState = FLAT;
  let capital = options.initialCapital;
  let pending: PendingOrder | null = null;

  const fill = (order: PendingOrder, index: number, bar: Bar, price: number, reason: ExitReason) => {
    if (order === "enter") {
      // No later bar remains to exit on.
      if (position.state !== "flat" || index >= lastIndex) {
        return;
      }
      position = {
        state: "long",
        entryPrice: price,
        entryIndex: index,
        entryTimestamp: bar.timestamp,
        size: 1,
      };
      return;
    }

    if (position.state !== "long") {
      return;
    }
    const returnPct = computeReturnPct(position.entryPrice, price, options.feeRate);
    trades.push({
      entryIndex: position.entryIndex,
      exitIndex: index,
      entryTimestamp: position.entryTimestamp,
      exitTimestamp: bar.timestamp,
      entryPrice: position.entryPrice,
      exitPrice: price,
      returnPct,
      exitReason: reason,
    });
    capital *= 1 + returnPct;
    position = FLAT;
  };

  for (let index = 0; index < bars.length; index += 1) {
    const bar = bars[index];
    const signal = signals[index];
    if (!bar || !signal) {
      continue;
    }

    if (pending) {
      fill(pending, index, bar, bar.open, "signal");
      pending = null;
    }

    const order = decide(position, signal);
    if (order) {
      if (options.execution === "signal_close") {
        fill(order, index, bar, bar.close, "signal");
      } else {
        pending = order;
      }
    }

    equityCurve.push({ timestamp: bar.timestamp, equity: markToMarket(position, capital, bar.close) });
  }

  const lastBar = bars[lastIndex];
  if (position.state === "long" && lastBar) {
    fill("exit", lastIndex, lastBar, lastBar.close, "end_of_series");
    equityCurve[lastIndex] = { timestamp: lastBar.timestamp, equity: capital };
  }

  return { trades, equityCurve };
};

const markToMarket = (position: PositionState, capital: number, price: number): number => {
  if (position.state === "flat") {
    return capital;
  }
  return (capital * price) / position.entryPrice;
};
