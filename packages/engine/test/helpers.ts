import type { Bar } from "@kline-lab/sdk";

export const dayStamp = (index: number): string => new Date(Date.UTC(2024, 0, index + 1)).toISOString();

export const makeBar = (timestamp: string, close: number, open: number = close): Bar => ({
  timestamp,
  open,
  high: Math.max(open, close),
  low: Math.min(open, close),
  close,
  volume: 1_000,
});

export const buildBars = (closes: ReadonlyArray<number>, opens: ReadonlyArray<number> = closes): Bar[] =>
  closes.map((close, idx) => makeBar(dayStamp(idx), close, opens[idx] ?? close));

export const near = (actual: number | undefined, expected: number, tolerance = 1e-9): boolean => {
  return actual !== undefined && Math.abs(actual - expected) < tolerance;
};

/** Deterministic PRNG so property runs are reproducible. */
export const mulberry32 = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export const randomWalk = (length: number, seed: number): Bar[] => {
  const random = mulberry32(seed);
  const closes: number[] = [];
  const opens: number[] = [];
  let price = 100;
  for (let i = 0; i < length; i += 1) {
    opens.push(price);
    price *= 1 + (random() - 0.5) * 0.1;
    closes.push(price);
  }
  return buildBars(closes, opens);
};
