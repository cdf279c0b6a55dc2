import type { PerformanceReport, Trade } from "@kline-lab/sdk";

export interface EquityPoint {
  readonly timestamp: string;
  readonly equity: number;
}

// Crypto markets trade every day.
const PERIODS_PER_YEAR = 365;
const MS_PER_YEAR = PERIODS_PER_YEAR * 24 * 60 * 60 * 1000;

/** -----------------------------------------------------------------------
 *  Trade-list metrics
 *  -------------------------------------------------------------------- */

/** Compounded return across trades: product of (1 + r) minus 1. */
export const calculateTotalReturn = (trades: ReadonlyArray<Pick<Trade, "returnPct">>): number => {
  const growth = trades.reduce((acc, trade) => acc * (1 + trade.returnPct), 1);
  return growth - 1;
};

export const calculateWinRate = (trades: ReadonlyArray<Pick<Trade, "returnPct">>): number => {
  if (trades.length === 0) {
    return 0;
  }
  const winners = trades.filter((trade) => trade.returnPct > 0).length;
  return winners / trades.length;
};

export const calculateAverageReturn = (trades: ReadonlyArray<Pick<Trade, "returnPct">>): number => {
  return mean(trades.map((trade) => trade.returnPct));
};

/** -----------------------------------------------------------------------
 *  Equity-curve metrics
 *  -------------------------------------------------------------------- */

export const calculateReturns = (points: ReadonlyArray<EquityPoint>): number[] => {
  const returns: number[] = [];
  for (let i = 1; i < points.length; i += 1) {
    const prev = points[i - 1];
    const current = points[i];
    if (!prev || !current || prev.equity <= 0) {
      continue;
    }
    returns.push((current.equity - prev.equity) / prev.equity);
  }
  return returns;
};

const mean = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return 0;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
};

const standardDeviation = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return 0;
  }
  const avg = mean(values);
  const variance =
    values.reduce((acc, value) => {
      const diff = value - avg;
      return acc + diff * diff;
    }, 0) / values.length;
  return Math.sqrt(variance);
};

/**
 * Bars per year implied by the median spacing of consecutive timestamps, so
 * daily bars give 365 and hourly bars 8760. Falls back to 365 when no positive
 * spacing can be measured.
 */
export const inferPeriodsPerYear = (timestamps: ReadonlyArray<string>): number => {
  const gaps: number[] = [];
  for (let i = 1; i < timestamps.length; i += 1) {
    const gap = Date.parse(timestamps[i] ?? "") - Date.parse(timestamps[i - 1] ?? "");
    if (Number.isFinite(gap) && gap > 0) {
      gaps.push(gap);
    }
  }
  if (gaps.length === 0) {
    return PERIODS_PER_YEAR;
  }
  gaps.sort((a, b) => a - b);
  const mid = Math.floor(gaps.length / 2);
  const median =
    gaps.length % 2 === 1 ? (gaps[mid] ?? 0) : ((gaps[mid - 1] ?? 0) + (gaps[mid] ?? 0)) / 2;
  return MS_PER_YEAR / median;
};

export const calculateSharpe = (
  points: ReadonlyArray<EquityPoint>,
  riskFreeRate = 0,
  periodsPerYear = PERIODS_PER_YEAR,
): number => {
  const returns = calculateReturns(points);
  if (returns.length === 0) {
    return 0;
  }
  const excessReturns = returns.map((value) => value - riskFreeRate / periodsPerYear);
  const std = standardDeviation(excessReturns);
  if (std === 0) {
    return 0;
  }
  return (mean(excessReturns) / std) * Math.sqrt(periodsPerYear);
};

export const calculateMaxDrawdown = (points: ReadonlyArray<EquityPoint>): number => {
  const first = points[0];
  if (!first) {
    return 0;
  }
  let peak = first.equity;
  let maxDrawdown = 0;
  for (const point of points) {
    if (point.equity > peak) {
      peak = point.equity;
    }
    if (peak > 0) {
      const drawdown = (point.equity - peak) / peak;
      if (drawdown < maxDrawdown) {
        maxDrawdown = drawdown;
      }
    }
  }
  return maxDrawdown;
};

/** -----------------------------------------------------------------------
 *  Report
 *  -------------------------------------------------------------------- */

/**
 * Summarises a finished run. Called once with the final trade list so that
 * no running figure can drift from the reported one. Sharpe is annualised with
 * `periodsPerYear`, by default the bar frequency of the equity curve.
 */
export const buildPerformanceReport = (
  trades: ReadonlyArray<Trade>,
  equityCurve: ReadonlyArray<EquityPoint>,
  initialCapital: number,
  periodsPerYear = inferPeriodsPerYear(equityCurve.map((point) => point.timestamp)),
): PerformanceReport => {
  const totalReturnPct = calculateTotalReturn(trades);
  return {
    totalReturnPct,
    numTrades: trades.length,
    winRate: calculateWinRate(trades),
    averageReturnPct: calculateAverageReturn(trades),
    initialCapital,
    finalCapital: initialCapital * (1 + totalReturnPct),
    maxDrawdownPct: calculateMaxDrawdown(equityCurve),
    sharpe: calculateSharpe(equityCurve, 0, periodsPerYear),
  };
};
