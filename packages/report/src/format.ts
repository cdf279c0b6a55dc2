import type { PerformanceReport } from "@kline-lab/sdk";

/** 0.1234 -> "12.34%" */
export const formatPercent = (fraction: number, digits = 2): string => {
  return `${(fraction * 100).toFixed(digits)}%`;
};

/** Prices keep up to eight decimals without trailing zeros. */
export const formatPrice = (value: number): string => {
  return String(Number(value.toFixed(8)));
};

export const formatParams = (params: Readonly<Record<string, unknown>>): string => {
  const entries = Object.entries(params);
  if (entries.length === 0) {
    return "-";
  }
  return entries.map(([key, value]) => `${key}=${String(value)}`).join(", ");
};

export interface SummaryRow {
  readonly strategy: string;
  readonly report: PerformanceReport;
}

const SUMMARY_HEADERS = [
  "Strategy",
  "Trades",
  "Win rate",
  "Total return",
  "Avg return",
  "Max drawdown",
  "Final capital",
] as const;

const summaryCells = (row: SummaryRow): string[] => [
  row.strategy,
  String(row.report.numTrades),
  formatPercent(row.report.winRate),
  formatPercent(row.report.totalReturnPct),
  formatPercent(row.report.averageReturnPct),
  formatPercent(row.report.maxDrawdownPct),
  row.report.finalCapital.toFixed(2),
];

/**
 * Fixed-width comparison table for terminals. The strategy column is left
 * aligned, every figure right aligned.
 */
export const formatSummaryTable = (rows: ReadonlyArray<SummaryRow>): string => {
  const body = rows.map(summaryCells);
  const widths = SUMMARY_HEADERS.map((header, column) =>
    Math.max(header.length, ...body.map((cells) => (cells[column] ?? "").length)),
  );

  const renderLine = (cells: ReadonlyArray<string>): string =>
    cells
      .map((cell, column) => {
        const width = widths[column] ?? cell.length;
        return column === 0 ? cell.padEnd(width) : cell.padStart(width);
      })
      .join("  ");

  return [
    renderLine(SUMMARY_HEADERS),
    widths.map((width) => "-".repeat(width)).join("  "),
    ...body.map(renderLine),
  ].join("\n");
};
