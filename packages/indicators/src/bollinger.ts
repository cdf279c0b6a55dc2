import { average } from "./sma.js";

export interface BollingerBand {
  readonly middle: number;
  readonly upper: number;
  readonly lower: number;
}

/**
 * Bollinger bands: SMA of the last `period` values plus and minus `deviations`
 * population standard deviations. `null` until `period` values exist.
 */
export function bollingerSeries(
  values: ReadonlyArray<number>,
  period: number,
  deviations = 2,
): Array<BollingerBand | null> {
  if (!Number.isInteger(period) || period <= 0) {
    throw new Error("Bollinger period must be a positive integer");
  }
  if (!Number.isFinite(deviations) || deviations <= 0) {
    throw new Error("Bollinger deviations must be a positive number");
  }

  return values.map((_value, index) => {
    if (index + 1 < period) {
      return null;
    }
    const window = values.slice(index + 1 - period, index + 1);
    const middle = average(window);
    const variance = average(window.map((value) => (value - middle) ** 2));
    const width = deviations * Math.sqrt(variance);
    return { middle, upper: middle + width, lower: middle - width };
  });
}
