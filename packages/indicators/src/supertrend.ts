export interface HighLowClose {
  readonly high: number;
  readonly low: number;
  readonly close: number;
}

export type TrendDirection = 1 | -1;

export interface SuperTrendPoint {
  readonly direction: TrendDirection;
  /** Trailing stop: the lower band in an uptrend, the upper band in a downtrend. */
  readonly line: number;
  readonly upper: number;
  readonly lower: number;
}

/**
 * Wilder average true range. True range needs the previous close, so the first
 * value appears at index `period`; earlier entries are `null`.
 */
export function atrSeries(bars: ReadonlyArray<HighLowClose>, period = 14): Array<number | null> {
  if (!Number.isInteger(period) || period <= 0) {
    throw new Error("ATR period must be a positive integer");
  }

  const result: Array<number | null> = bars.map(() => null);
  let atr: number | null = null;
  let seedSum = 0;

  for (let i = 1; i < bars.length; i += 1) {
    const bar = bars[i];
    const prev = bars[i - 1];
    if (!bar || !prev) {
      continue;
    }
    const trueRange = Math.max(
      bar.high - bar.low,
      Math.abs(bar.high - prev.close),
      Math.abs(bar.low - prev.close),
    );
    if (atr === null) {
      seedSum += trueRange;
      if (i === period) {
        atr = seedSum / period;
        result[i] = atr;
      }
      continue;
    }
    atr = (atr * (period - 1) + trueRange) / period;
    result[i] = atr;
  }

  return result;
}

/**
 * SuperTrend over `period` bars of ATR. Bands sit `multiplier` ATRs around the
 * bar midpoint; the trend flips up when the close clears the previous upper
 * band and down when it breaks the previous lower band. While the trend holds,
 * the trailing band only moves in its favour. Starts in an uptrend.
 */
export function supertrendSeries(
  bars: ReadonlyArray<HighLowClose>,
  period = 10,
  multiplier = 3,
): Array<SuperTrendPoint | null> {
  if (!Number.isFinite(multiplier) || multiplier <= 0) {
    throw new Error("SuperTrend multiplier must be a positive number");
  }

  const atr = atrSeries(bars, period);
  const result: Array<SuperTrendPoint | null> = [];
  let prev: SuperTrendPoint | null = null;

  for (let i = 0; i < bars.length; i += 1) {
    const bar = bars[i];
    const range = atr[i];
    if (!bar || range === null || range === undefined) {
      result.push(null);
      continue;
    }

    const mid = (bar.high + bar.low) / 2;
    let upper = mid + multiplier * range;
    let lower = mid - multiplier * range;
    let direction: TrendDirection = 1;

    if (prev) {
      if (bar.close > prev.upper) {
        direction = 1;
      } else if (bar.close < prev.lower) {
        direction = -1;
      } else {
        direction = prev.direction;
        if (direction === 1 && lower < prev.lower) {
          lower = prev.lower;
        }
        if (direction === -1 && upper > prev.upper) {
          upper = prev.upper;
        }
      }
    }

    const point: SuperTrendPoint = {
      direction,
      line: direction === 1 ? lower : upper,
      upper,
      lower,
    };
    result.push(point);
    prev = point;
  }

  return result;
}
