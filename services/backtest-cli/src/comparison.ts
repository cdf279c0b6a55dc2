import {
  runStrategyBacktest,
  type StrategyBacktestOptions,
  type StrategyBacktestResult,
} from "@kline-lab/engine";
import type { Bar, Strategy } from "@kline-lab/sdk";

export interface ComparisonInput {
  readonly bars: ReadonlyArray<Bar>;
  readonly strategies: ReadonlyArray<Strategy>;
  readonly options?: StrategyBacktestOptions;
}

export type ComparisonRow = Pick<
  StrategyBacktestResult,
  "strategy" | "params" | "report" | "trades" | "offset" | "bars"
>;

/**
 * Runs every strategy over the same series and window. Each run is
 * independent; a failing strategy aborts the comparison.
 */
export const runComparison = ({ bars, strategies, options = {} }: ComparisonInput): ComparisonRow[] => {
  return strategies.map((strategy) => {
    const result = runStrategyBacktest(bars, strategy, options);
    return {
      strategy: result.strategy,
      params: result.params,
      report: result.report,
      trades: result.trades,
      offset: result.offset,
      bars: result.bars,
    };
  });
};
