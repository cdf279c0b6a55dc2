export type { Bar, IDataSource } from "./IDataSource.js";
export { CsvSource, CSV_HEADER, type CsvSourceOptions } from "./CsvSource.js";
export {
  BinanceSource,
  toExchangeSymbol,
  MAX_KLINES_PER_REQUEST,
  type BinanceSourceOptions,
} from "./BinanceSource.js";
export { PriceSeriesLoader, type PriceSeriesLoaderOptions } from "./PriceSeriesLoader.js";
export { createHttpClient, type HttpClient, type HttpRequestOptions, type HttpResponse } from "./httpClient.js";
export { datasetKey } from "./internalUtils.js";
