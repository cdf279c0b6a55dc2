import type { DataRequest } from "@kline-lab/sdk";

import type { Bar, IDataSource } from "./IDataSource.js";
import { createHttpClient, type HttpClient } from "./httpClient.js";
import { filterBarsForRequest, sanitizeBar, sortBarsChronologically, toNumber } from "./internalUtils.js";

const DEFAULT_BASE_URL = "https://api.binance.com";
export const MAX_KLINES_PER_REQUEST = 1000;
const DEFAULT_REQUEST_DELAY_MS = 250;
const DEFAULT_TIMEOUT_MS = 15_000;

export interface BinanceSourceOptions {
  readonly baseUrl?: string;
  readonly httpClient?: HttpClient;
  /** Page size, capped at {@link MAX_KLINES_PER_REQUEST}. */
  readonly limit?: number;
  readonly requestDelayMs?: number;
  readonly sleep?: (ms: number) => Promise<void>;
}

/** `BTC/USDT` -> `BTCUSDT`. */
export const toExchangeSymbol = (symbol: string): string => {
  return symbol.replace(/[/\-\s]/gu, "").toUpperCase();
};

/**
 * Loads OHLCV klines from Binance's public REST API, paging forward until the
 * requested range is covered.
 */
export class BinanceSource implements IDataSource {
  public readonly id = "binance";

  private readonly baseUrl: string;
  private readonly httpClient: HttpClient;
  private readonly limit: number;
  private readonly requestDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  public constructor(options: BinanceSourceOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/u, "");
    this.httpClient = options.httpClient ?? createHttpClient();
    this.limit = Math.min(Math.max(1, options.limit ?? MAX_KLINES_PER_REQUEST), MAX_KLINES_PER_REQUEST);
    this.requestDelayMs = options.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  public async loadBars(request: DataRequest): Promise<ReadonlyArray<Bar>> {
    const startEpoch = Date.parse(request.start);
    const endEpoch = Date.parse(request.end);
    if (Number.isNaN(startEpoch) || Number.isNaN(endEpoch)) {
      throw new Error(
        `Binance requires valid ISO dates. Received start="${request.start}" end="${request.end}".`,
      );
    }

    const bars: Bar[] = [];
    let cursor = startEpoch;

    while (cursor <= endEpoch) {
      const page = await this.fetchPage(request, cursor, endEpoch);
      const last = page.rows[page.rows.length - 1];
      bars.push(...page.bars);
      if (page.rows.length < this.limit || last === undefined) {
        break;
      }
      cursor = last + 1;
      if (cursor <= endEpoch) {
        await this.sleep(this.requestDelayMs);
      }
    }

    return filterBarsForRequest(sortBarsChronologically(bars), request);
  }

  /** `rows` carries each raw row's open time so paging survives rows that fail to parse. */
  private async fetchPage(
    request: DataRequest,
    startTime: number,
    endTime: number,
  ): Promise<{ rows: number[]; bars: Bar[] }> {
    const url = new URL(`${this.baseUrl}/api/v3/klines`);
    url.searchParams.set("symbol", toExchangeSymbol(request.symbol));
    url.searchParams.set("interval", request.timeframe);
    url.searchParams.set("startTime", String(startTime));
    url.searchParams.set("endTime", String(endTime));
    url.searchParams.set("limit", String(this.limit));

    const response = await this.httpClient.get(url.toString(), { timeoutMs: DEFAULT_TIMEOUT_MS });

    if (response.statusCode < 200 || response.statusCode >= 300) {
      if (response.statusCode === 429 || response.statusCode === 418) {
        throw new Error("Binance rate limit exceeded. Please wait before making more requests.");
      }
      throw new Error(
        `Binance request failed with status ${response.statusCode}: ${response.body.slice(0, 200)}`,
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch (error) {
      throw new Error(`Unable to parse Binance response: ${String(error)}`);
    }

    if (!Array.isArray(payload)) {
      const payloadStr = typeof payload === "object" ? JSON.stringify(payload) : String(payload);
      throw new Error(
        `Binance returned non-array response for ${request.symbol}: ${payloadStr.slice(0, 200)}`,
      );
    }

    const rows: number[] = [];
    const bars: Bar[] = [];
    for (const row of payload) {
      if (!Array.isArray(row)) {
        continue;
      }
      const openTime = toNumber(row[0]);
      if (openTime === null) {
        continue;
      }
      rows.push(openTime);
      const bar = sanitizeBar({
        timestamp: new Date(openTime).toISOString(),
        open: row[1],
        high: row[2],
        low: row[3],
        close: row[4],
        volume: row[5],
      });
      if (bar) {
        bars.push(bar);
      }
    }
    return { rows, bars };
  }
}

const defaultSleep = (ms: number): Promise<void> => {
  return new Promise((resolve) => setTimeout(resolve, ms));
};
