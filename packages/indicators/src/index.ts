export { smaSeries, average } from "./sma.js";
export { emaSeries } from "./ema.js";
export { rsiSeries } from "./rsi.js";
export { priorRangeSeries, type PriceRange } from "./channel.js";
export { bollingerSeries, type BollingerBand } from "./bollinger.js";
export { macdSeries, type MacdSeries } from "./macd.js";
export {
  atrSeries,
  supertrendSeries,
  type HighLowClose,
  type SuperTrendPoint,
  type TrendDirection,
} from "./supertrend.js";
