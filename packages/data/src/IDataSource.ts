import type { Bar, DataRequest } from "@kline-lab/sdk";

export type { Bar };

/**
 * Generic contract for loading market data series.
 */
export interface IDataSource {
  readonly id: string;
  loadBars(request: DataRequest): Promise<ReadonlyArray<Bar>>;
}
