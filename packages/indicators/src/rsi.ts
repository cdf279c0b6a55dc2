const NEUTRAL_RSI = 50;

/**
 * Wilder RSI aligned to the input. The first value appears at index `period`,
 * once `period` price changes are available; earlier entries are `null`.
 * A window with neither gains nor losses reads 50.
 */
export function rsiSeries(values: ReadonlyArray<number>, period = 14): Array<number | null> {
  if (!Number.isInteger(period) || period <= 0) {
    throw new Error("RSI period must be a positive integer");
  }

  const result: Array<number | null> = values.map(() => null);
  if (values.length <= period) {
    return result;
  }

  let gains = 0;
  let losses = 0;
  for (let i = 1; i <= period; i += 1) {
    const change = (values[i] ?? 0) - (values[i - 1] ?? 0);
    if (change >= 0) {
      gains += change;
    } else {
      losses -= change;
    }
  }

  let avgGain = gains / period;
  let avgLoss = losses / period;
  result[period] = toRsi(avgGain, avgLoss);

  for (let i = period + 1; i < values.length; i += 1) {
    const change = (values[i] ?? 0) - (values[i - 1] ?? 0);
    const gain = Math.max(change, 0);
    const loss = Math.max(-change, 0);
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
    result[i] = toRsi(avgGain, avgLoss);
  }

  return result;
}

const toRsi = (avgGain: number, avgLoss: number): number => {
  if (avgGain === 0 && avgLoss === 0) {
    return NEUTRAL_RSI;
  }
  if (avgLoss === 0) {
    return 100;
  }
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
};
