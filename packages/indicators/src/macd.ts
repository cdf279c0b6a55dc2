import { emaSeries } from "./ema.js";

export interface MacdSeries {
  /** Fast EMA minus slow EMA; defined from index `slow - 1`. */
  readonly macd: Array<number | null>;
  /** EMA of the MACD line over `signal` values. */
  readonly signal: Array<number | null>;
  readonly histogram: Array<number | null>;
}

export function macdSeries(
  values: ReadonlyArray<number>,
  fast = 12,
  slow = 26,
  signal = 9,
): MacdSeries {
  if (!Number.isInteger(signal) || signal <= 0) {
    throw new Error("MACD signal length must be a positive integer");
  }
  if (fast >= slow) {
    throw new Error("MACD fast length must be less than slow length");
  }

  const fastEma = emaSeries(values, fast);
  const slowEma = emaSeries(values, slow);
  const macd = values.map((_value, index) => {
    const fastValue = fastEma[index];
    const slowValue = slowEma[index];
    if (fastValue === null || fastValue === undefined || slowValue === null || slowValue === undefined) {
      return null;
    }
    return fastValue - slowValue;
  });

  const offset = slow - 1;
  const defined = macd.slice(offset).filter((value): value is number => value !== null);
  const smoothed = emaSeries(defined, signal);
  const signalLine = values.map((_value, index) =>
    index < offset ? null : (smoothed[index - offset] ?? null),
  );
  const histogram = macd.map((value, index) => {
    const line = signalLine[index];
    return value === null || line === null || line === undefined ? null : value - line;
  });

  return { macd, signal: signalLine, histogram };
}
