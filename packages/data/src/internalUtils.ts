import type { Bar, DataRequest } from "@kline-lab/sdk";

/**
 * Shared helpers used across data sources to enforce consistent behaviour.
 */
export const slugify = (value: string): string => {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/gu, "_")
    .replace(/^_+|_+$/gu, "");
};

/**
 * Stable name for one request's series, shared by the CSV cache and the
 * in-memory memo.
 */
export const datasetKey = (request: Pick<DataRequest, "symbol" | "timeframe" | "start" | "end">): string => {
  return [request.symbol, request.timeframe, request.start, request.end].map(slugify).join("_");
};

export const toNumber = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

const parseTimestamp = (value: string): number | null => {
  const epoch = Date.parse(value);
  if (Number.isNaN(epoch)) {
    return null;
  }
  return epoch;
};

/**
 * Normalises bars that may come from caches or remote APIs. Timestamps are
 * rewritten as ISO strings so that identical instants compare equal.
 */
export const sanitizeBar = (maybeBar: Partial<Record<keyof Bar, unknown>> | null | undefined): Bar | null => {
  if (!maybeBar || typeof maybeBar.timestamp !== "string") {
    return null;
  }
  const epoch = parseTimestamp(maybeBar.timestamp);
  const open = toNumber(maybeBar.open);
  const high = toNumber(maybeBar.high);
  const low = toNumber(maybeBar.low);
  const close = toNumber(maybeBar.close);
  const volume = toNumber(maybeBar.volume);
  if (epoch === null || open === null || high === null || low === null || close === null || volume === null) {
    return null;
  }

  return { timestamp: new Date(epoch).toISOString(), open, high, low, close, volume };
};

/**
 * Filters bars to the inclusive start/end of a {@link DataRequest}.
 */
export const filterBarsForRequest = (
  bars: ReadonlyArray<Bar>,
  request: Pick<DataRequest, "start" | "end">,
): ReadonlyArray<Bar> => {
  const startEpoch = parseTimestamp(request.start);
  const endEpoch = parseTimestamp(request.end);

  return bars.filter((bar) => {
    const barEpoch = parseTimestamp(bar.timestamp);
    if (barEpoch === null) {
      return false;
    }
    const afterStart = startEpoch === null ? true : barEpoch >= startEpoch;
    const beforeEnd = endEpoch === null ? true : barEpoch <= endEpoch;
    return afterStart && beforeEnd;
  });
};

/**
 * Ensures all connectors store bars in chronological order.
 */
export const sortBarsChronologically = (bars: ReadonlyArray<Bar>): Bar[] => {
  return [...bars].sort((a, b) => {
    const epochA = parseTimestamp(a.timestamp) ?? 0;
    const epochB = parseTimestamp(b.timestamp) ?? 0;
    return epochA - epochB;
  });
};

/** Keeps the last bar seen for each timestamp, then sorts. */
export const dedupeBars = (bars: ReadonlyArray<Bar>): Bar[] => {
  const byTimestamp = new Map<string, Bar>();
  for (const bar of bars) {
    byTimestamp.set(bar.timestamp, bar);
  }
  return sortBarsChronologically(Array.from(byTimestamp.values()));
};
