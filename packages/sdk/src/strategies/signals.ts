import type { Signal } from "../index.js";

type Series = ReadonlyArray<number | null>;

const isDefined = (value: number | null | undefined): value is number => {
  return value !== null && value !== undefined;
};

/**
 * Crossover of `fast` over `slow`. Enters when fast was strictly below slow on
 * the previous bar and is at or above it now; exits on the mirror image.
 * Holds when either series is undefined on the current or previous bar.
 */
export const crossoverSignals = (fast: Series, slow: Series): Signal[] => {
  return fast.map((fastNow, index): Signal => {
    const fastPrev = fast[index - 1];
    const slowPrev = slow[index - 1];
    const slowNow = slow[index];
    if (!isDefined(fastNow) || !isDefined(slowNow) || !isDefined(fastPrev) || !isDefined(slowPrev)) {
      return "hold";
    }
    if (fastPrev < slowPrev && fastNow >= slowNow) {
      return "enter";
    }
    if (fastPrev > slowPrev && fastNow <= slowNow) {
      return "exit";
    }
    return "hold";
  });
};

/**
 * Threshold crossings of a bounded oscillator: enter on an upward cross
 * through `lower`, exit on a downward cross through `upper`.
 */
export const thresholdCrossSignals = (series: Series, lower: number, upper: number): Signal[] => {
  return series.map((now, index): Signal => {
    const prev = series[index - 1];
    if (!isDefined(now) || !isDefined(prev)) {
      return "hold";
    }
    if (prev < lower && now >= lower) {
      return "enter";
    }
    if (prev > upper && now <= upper) {
      return "exit";
    }
    return "hold";
  });
};
