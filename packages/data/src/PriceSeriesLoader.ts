import { createLogger, type Logger } from "@kline-lab/logger";
import { DataRequestSchema, assertValid, type DataRequest } from "@kline-lab/sdk";

import { BinanceSource } from "./BinanceSource.js";
import { CsvSource } from "./CsvSource.js";
import type { Bar, IDataSource } from "./IDataSource.js";
import { datasetKey } from "./internalUtils.js";

export interface PriceSeriesLoaderOptions {
  readonly csv?: CsvSource;
  readonly remote?: IDataSource;
  readonly logger?: Logger;
}

/**
 * Resolves a request from the in-memory memo, then the CSV cache, then the
 * exchange. Remote results are written back to the CSV cache.
 *
 * The memo belongs to the instance and is only emptied by {@link clear}.
 */
export class PriceSeriesLoader {
  private readonly csv: CsvSource;
  private readonly remote: IDataSource;
  private readonly logger: Logger;
  private readonly memo = new Map<string, ReadonlyArray<Bar>>();

  public constructor(options: PriceSeriesLoaderOptions = {}) {
    this.csv = options.csv ?? new CsvSource();
    this.remote = options.remote ?? new BinanceSource();
    this.logger = options.logger ?? createLogger("data");
  }

  public get size(): number {
    return this.memo.size;
  }

  public async load(input: DataRequest): Promise<ReadonlyArray<Bar>> {
    const request = assertValid(DataRequestSchema, input, "DataRequest");
    const key = datasetKey(request);

    const memoised = this.memo.get(key);
    if (memoised) {
      this.logger.debug("memo hit", { key, bars: memoised.length });
      return memoised;
    }

    if (request.source !== "binance") {
      const cached = await this.csv.loadBars(request);
      if (cached.length > 0) {
        this.logger.info("csv cache hit", { key, bars: cached.length });
        this.memo.set(key, cached);
        return cached;
      }
      if (request.source === "csv") {
        throw new Error(`No CSV dataset found at ${this.csv.resolveDatasetPath(request)}`);
      }
    }

    this.logger.info("cache miss, fetching", { key, source: this.remote.id });
    const fetched = await this.remote.loadBars(request);
    if (fetched.length === 0) {
      throw new Error(
        `No bars returned for ${request.symbol} ${request.timeframe} between ${request.start} and ${request.end}`,
      );
    }
    const path = await this.csv.saveBars(request, fetched);
    this.logger.info("saved dataset", { key, bars: fetched.length, path });

    this.memo.set(key, fetched);
    return fetched;
  }

  public clear(): void {
    this.memo.clear();
  }
}
