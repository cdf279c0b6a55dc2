import type { Bar, Signal } from "../index.js";

/**
 * A signal generator. `generateSignals` is pure: one signal per input bar,
 * each derived from bars `0..i` only, identical output on every call.
 */
export interface Strategy {
  readonly name: string;
  readonly params: Readonly<Record<string, unknown>>;
  generateSignals(bars: ReadonlyArray<Bar>): Signal[];
}

/** Builds a strategy, validating raw params against the variant's schema. */
export type StrategyFactory = (params: unknown) => Strategy;
