export { runBacktest, computeReturnPct } from "./engine.js";
export {
  runStrategyBacktest,
  type StrategyBacktestOptions,
  type StrategyBacktestResult,
} from "./runner.js";
export { validatePriceSeries, validateRunInputs } from "./validation.js";
export type { BacktestResult, EquityPoint, PendingOrder, PositionState } from "./types.js";
