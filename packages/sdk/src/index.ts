// Source of truth for the data model shared by strategies, the engine and the
// outer data/report surfaces.

import { z } from "zod";

/** -----------------------------------------------------------------------
 *  Shared enums & primitives
 *  -------------------------------------------------------------------- */

/** Where a price series may be loaded from. */
export type DataSource = "auto" | "csv" | "binance";

/** Supported bar intervals, named the way the exchange names them. */
export type Timeframe = "1m" | "5m" | "15m" | "1h" | "4h" | "1d";

export const TIMEFRAMES: ReadonlyArray<Timeframe> = ["1m", "5m", "15m", "1h", "4h", "1d"];

/** ISO-8601 date string (UTC recommended). */
export type ISODate = string;

/** -----------------------------------------------------------------------
 *  Price series
 *  -------------------------------------------------------------------- */

/**
 * One OHLCV observation. A price series is a `ReadonlyArray<Bar>` ordered by
 * strictly increasing timestamp.
 */
export interface Bar {
  readonly timestamp: ISODate;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/** -----------------------------------------------------------------------
 *  Signals, trades & reports
 *  -------------------------------------------------------------------- */

/** Per-bar trading decision emitted by a strategy. */
export type Signal = "enter" | "exit" | "hold";

export const isSignal = (value: unknown): value is Signal => {
  return value === "enter" || value === "exit" || value === "hold";
};

/** Why a position was closed. */
export type ExitReason = "signal" | "end_of_series";

/**
 * A completed entry/exit pair. Indices refer to the series the run was given.
 */
export interface Trade {
  readonly entryIndex: number;
  readonly exitIndex: number;
  readonly entryTimestamp: ISODate;
  readonly exitTimestamp: ISODate;
  readonly entryPrice: number;
  readonly exitPrice: number;
  /** Fractional return after the flat fee (0.25 for +25%). */
  readonly returnPct: number;
  readonly exitReason: ExitReason;
}

/**
 * Summary computed once from the final trade list and equity curve.
 * Ratios are fractions, not percentages.
 */
export interface PerformanceReport {
  /** Compounded return: product of (1 + returnPct) minus 1. */
  readonly totalReturnPct: number;
  readonly numTrades: number;
  /** Share of trades with a positive return; 0 when there are none. */
  readonly winRate: number;
  readonly averageReturnPct: number;
  readonly initialCapital: number;
  readonly finalCapital: number;
  /** Largest peak-to-trough equity decline, as a non-positive fraction. */
  readonly maxDrawdownPct: number;
  readonly sharpe: number;
}

/** -----------------------------------------------------------------------
 *  BacktestOptions
 *  -------------------------------------------------------------------- */

/**
 * When a decision taken on bar `i` is filled:
 * - `signal_close`: at the close of bar `i`;
 * - `next_open`: at the open of bar `i + 1`.
 */
export type ExecutionPolicy = "signal_close" | "next_open";

export interface BacktestOptions {
  /** Starting capital used for the equity curve and final capital. */
  readonly initialCapital?: number;
  /** Flat fee charged on each side of a trade, as a fraction (0.001 for 0.1%). */
  readonly feeRate?: number;
  readonly execution?: ExecutionPolicy;
}

export const DEFAULT_INITIAL_CAPITAL = 10_000;

/** Runtime validator for {@link BacktestOptions}; fills in defaults. */
export const BacktestOptionsSchema = z.object({
  initialCapital: z.number().finite().positive().default(DEFAULT_INITIAL_CAPITAL),
  feeRate: z.number().finite().min(0).lt(1).default(0),
  execution: z.enum(["signal_close", "next_open"]).default("signal_close"),
});

export type ResolvedBacktestOptions = z.output<typeof BacktestOptionsSchema>;

/** -----------------------------------------------------------------------
 *  DataRequest
 *  -------------------------------------------------------------------- */

/**
 * Request for a single time series (symbol, timeframe, date range).
 */
export interface DataRequest {
  /** Vendor identifier; `auto` tries the file cache, then the exchange. */
  source: DataSource;
  /** Instrument symbol (e.g., "BTC/USDT"). */
  symbol: string;
  timeframe: Timeframe;
  /** Inclusive start (e.g., "2023-01-01T00:00:00Z"). */
  start: ISODate;
  /** Inclusive end. */
  end: ISODate;
}

const isoDate = z
  .string()
  .min(1)
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "must be an ISO-8601 date" });

/** Runtime validator for {@link DataRequest}. */
export const DataRequestSchema = z
  .object({
    source: z.enum(["auto", "csv", "binance"]),
    symbol: z.string().min(1),
    timeframe: z.enum(["1m", "5m", "15m", "1h", "4h", "1d"]),
    start: isoDate,
    end: isoDate,
  })
  .superRefine((value, ctx) => {
    if (Date.parse(value.start) > Date.parse(value.end)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "start must not be after end",
        path: ["start"],
      });
    }
  });

export { assertValid } from "./validation.js";
export * from "./errors.js";
export * from "./strategies/types.js";
export * as strategies from "./strategies/index.js";
export { createStrategy, isStrategyKey, strategyKeys } from "./strategies/registry.js";
export { strategyConfigs, type StrategyConfig, type StrategyKey } from "./strategies/config.js";
