import { DataIntegrityError, isSignal, type Bar, type Signal } from "@kline-lab/sdk";

const PRICE_FIELDS = ["open", "high", "low", "close"] as const;

/**
 * Rejects series the engine cannot simulate: unparsable, duplicate or
 * out-of-order timestamps, non-positive or non-finite prices, negative volume.
 */
export const validatePriceSeries = (bars: ReadonlyArray<Bar>): void => {
  let previousEpoch: number | null = null;

  for (let index = 0; index < bars.length; index += 1) {
    const bar = bars[index];
    if (!bar) {
      throw new DataIntegrityError(`Bar ${index} is missing`, { index });
    }

    const epoch = Date.parse(bar.timestamp);
    if (Number.isNaN(epoch)) {
      throw new DataIntegrityError(`Bar ${index} has an unparsable timestamp "${bar.timestamp}"`, {
        index,
        timestamp: bar.timestamp,
      });
    }
    if (previousEpoch !== null && epoch === previousEpoch) {
      throw new DataIntegrityError(`Bar ${index} duplicates timestamp ${bar.timestamp}`, {
        index,
        timestamp: bar.timestamp,
      });
    }
    if (previousEpoch !== null && epoch < previousEpoch) {
      throw new DataIntegrityError(`Bar ${index} is out of order at ${bar.timestamp}`, {
        index,
        timestamp: bar.timestamp,
      });
    }

    for (const field of PRICE_FIELDS) {
      const value = bar[field];
      if (!Number.isFinite(value) || value <= 0) {
        throw new DataIntegrityError(`Bar ${index} has a non-positive ${field} price (${value})`, {
          index,
          field,
          value,
        });
      }
    }
    if (!Number.isFinite(bar.volume) || bar.volume < 0) {
      throw new DataIntegrityError(`Bar ${index} has an invalid volume (${bar.volume})`, {
        index,
        volume: bar.volume,
      });
    }

    previousEpoch = epoch;
  }
};

const validateSignals = (signals: ReadonlyArray<unknown>): Signal[] => {
  return signals.map((signal, index) => {
    if (!isSignal(signal)) {
      throw new DataIntegrityError(`Signal ${index} is not one of enter/exit/hold`, {
        index,
        signal: String(signal),
      });
    }
    return signal;
  });
};

/**
 * Run-entry checks, in the order a caller would want them reported.
 */
export const validateRunInputs = (
  bars: ReadonlyArray<Bar>,
  signals: ReadonlyArray<unknown>,
): Signal[] => {
  if (bars.length !== signals.length) {
    throw new DataIntegrityError(
      `Price series has ${bars.length} bars but ${signals.length} signals were supplied`,
      { bars: bars.length, signals: signals.length },
    );
  }
  validatePriceSeries(bars);
  return validateSignals(signals);
};
