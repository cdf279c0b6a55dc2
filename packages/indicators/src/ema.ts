import { average } from "./sma.js";

/**
 * Exponential moving average seeded with the SMA of the first `length` values.
 * Entries before the seed are `null`.
 */
export function emaSeries(values: ReadonlyArray<number>, length: number): Array<number | null> {
  if (!Number.isInteger(length) || length <= 0) {
    throw new Error("EMA length must be a positive integer");
  }

  const result: Array<number | null> = [];
  const multiplier = 2 / (length + 1);
  let emaValue: number | null = null;

  for (let i = 0; i < values.length; i += 1) {
    const value = values[i] ?? 0;
    if (i + 1 < length) {
      result.push(null);
      continue;
    }
    if (emaValue === null) {
      emaValue = average(values.slice(0, length));
    } else {
      emaValue = (value - emaValue) * multiplier + emaValue;
    }
    result.push(emaValue);
  }

  return result;
}
