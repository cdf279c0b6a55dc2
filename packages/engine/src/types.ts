import type { EquityPoint } from "@kline-lab/metrics";
import type { ISODate, PerformanceReport, Signal, Trade } from "@kline-lab/sdk";

export type { EquityPoint };

/**
 * Single-unit long position. Lives only inside one run.
 */
export type PositionState =
  | { readonly state: "flat" }
  | {
      readonly state: "long";
      readonly entryPrice: number;
      readonly entryIndex: number;
      readonly entryTimestamp: ISODate;
      readonly size: 1;
    };

/** Decision awaiting a fill under the `next_open` execution policy. */
export type PendingOrder = Exclude<Signal, "hold">;

/**
 * Output of one run. The trade list is final; the report was computed from it
 * after the last bar.
 */
export interface BacktestResult {
  readonly trades: ReadonlyArray<Trade>;
  readonly report: PerformanceReport;
  /** Equity after each bar, marked to that bar's close. */
  readonly equityCurve: ReadonlyArray<EquityPoint>;
}
