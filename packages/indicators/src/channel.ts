export interface PriceRange {
  readonly high: number;
  readonly low: number;
}

/**
 * Highest high and lowest low of the `lookback` bars strictly before each index.
 * `null` until `lookback` earlier bars exist.
 */
export function priorRangeSeries(
  bars: ReadonlyArray<PriceRange>,
  lookback: number,
): Array<PriceRange | null> {
  if (!Number.isInteger(lookback) || lookback <= 0) {
    throw new Error("Channel lookback must be a positive integer");
  }

  // Monotonic queues of indices: highs decreasing, lows increasing.
  const highs: number[] = [];
  const lows: number[] = [];
  let highHead = 0;
  let lowHead = 0;
  const result: Array<PriceRange | null> = [];

  for (let index = 0; index < bars.length; index += 1) {
    const windowStart = index - lookback;
    while (highHead < highs.length && (highs[highHead] ?? 0) < windowStart) {
      highHead += 1;
    }
    while (lowHead < lows.length && (lows[lowHead] ?? 0) < windowStart) {
      lowHead += 1;
    }

    const highIndex = highs[highHead];
    const lowIndex = lows[lowHead];
    const high = highIndex === undefined ? undefined : bars[highIndex]?.high;
    const low = lowIndex === undefined ? undefined : bars[lowIndex]?.low;
    result.push(windowStart >= 0 && high !== undefined && low !== undefined ? { high, low } : null);

    const bar = bars[index];
    if (!bar) {
      continue;
    }
    while (highs.length > highHead && (bars[highs[highs.length - 1] ?? 0]?.high ?? 0) <= bar.high) {
      highs.pop();
    }
    highs.push(index);
    while (lows.length > lowHead && (bars[lows[lows.length - 1] ?? 0]?.low ?? 0) >= bar.low) {
      lows.pop();
    }
    lows.push(index);
  }

  return result;
}
