/**
 * Simple moving average aligned to the input: entry `i` averages
 * `values[i - period + 1..i]`, or is `null` until `period` values exist.
 */
export function smaSeries(values: ReadonlyArray<number>, period: number): Array<number | null> {
  if (!Number.isInteger(period) || period <= 0) {
    throw new Error("SMA period must be a positive integer");
  }

  return values.map((_value, index) => {
    if (index + 1 < period) {
      return null;
    }
    const window = values.slice(index + 1 - period, index + 1);
    return average(window);
  });
}

export const average = (nums: ReadonlyArray<number>): number => {
  const sum = nums.reduce((acc, value) => acc + value, 0);
  return sum / nums.length;
};
