import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { DataRequest } from "@kline-lab/sdk";

import type { Bar, IDataSource } from "./IDataSource.js";
import { datasetKey, dedupeBars, filterBarsForRequest, sanitizeBar } from "./internalUtils.js";

const DEFAULT_DATASETS_DIR = join(process.cwd(), "storage", "datasets");

export const CSV_HEADER = "timestamp,open,high,low,close,volume";

export interface CsvSourceOptions {
  readonly datasetsDir?: string;
}

const isMissingFile = (error: unknown): boolean => {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
};

/**
 * CSV-backed data source. One file per request range, so a fetched series can
 * be replayed offline.
 */
export class CsvSource implements IDataSource {
  public readonly id = "csv";

  private readonly datasetsDir: string;

  public constructor(options: CsvSourceOptions = {}) {
    this.datasetsDir = options.datasetsDir ?? DEFAULT_DATASETS_DIR;
  }

  public resolveDatasetPath(request: DataRequest): string {
    return join(this.datasetsDir, `${datasetKey(request)}.csv`);
  }

  /** Returns `[]` when no file exists for the request. */
  public async loadBars(request: DataRequest): Promise<ReadonlyArray<Bar>> {
    const datasetPath = this.resolveDatasetPath(request);

    let content: string;
    try {
      content = await readFile(datasetPath, { encoding: "utf-8" });
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    return filterBarsForRequest(parseCsv(content), request);
  }

  public async saveBars(request: DataRequest, bars: ReadonlyArray<Bar>): Promise<string> {
    const datasetPath = this.resolveDatasetPath(request);
    await mkdir(this.datasetsDir, { recursive: true });
    const rows = bars.map((bar) =>
      [bar.timestamp, bar.open, bar.high, bar.low, bar.close, bar.volume].join(","),
    );
    await writeFile(datasetPath, `${[CSV_HEADER, ...rows].join("\n")}\n`, { encoding: "utf-8" });
    return datasetPath;
  }
}

const parseCsv = (content: string): Bar[] => {
  const lines = content
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  // Remove header row.
  const [, ...rows] = lines;
  const bars: Bar[] = [];
  for (const row of rows) {
    const bar = toBar(row);
    if (bar) {
      bars.push(bar);
    }
  }
  return dedupeBars(bars);
};

const toBar = (row: string): Bar | null => {
  const [timestamp, open, high, low, close, volume] = row.split(",").map((part) => part.trim());
  return sanitizeBar({ timestamp, open, high, low, close, volume });
};
