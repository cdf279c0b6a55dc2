import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { ExecutionPolicy, PerformanceReport, Trade } from "@kline-lab/sdk";

import { formatParams, formatPercent, formatPrice } from "./format.js";

export interface StrategyReportSection {
  readonly strategy: string;
  readonly params: Readonly<Record<string, unknown>>;
  readonly report: PerformanceReport;
  readonly trades: ReadonlyArray<Trade>;
}

export interface ReportPayload {
  readonly runId: string;
  readonly generatedAt: string;
  readonly symbol: string;
  readonly timeframe: string;
  readonly simulationStart?: string;
  readonly simulationEnd?: string;
  readonly barCount: number;
  readonly initialCapital: number;
  readonly feeRate: number;
  readonly execution: ExecutionPolicy;
  readonly sections: ReadonlyArray<StrategyReportSection>;
}

const tableRow = (cells: ReadonlyArray<string>): string => `| ${cells.join(" | ")} |`;

const summaryTable = (sections: ReadonlyArray<StrategyReportSection>): string[] => {
  const headers = [
    "Strategy",
    "Params",
    "Trades",
    "Win rate",
    "Total return",
    "Avg return",
    "Max drawdown",
    "Sharpe",
    "Final capital",
  ];
  return [
    tableRow(headers),
    tableRow(headers.map(() => "---")),
    ...sections.map(({ strategy, params, report }) =>
      tableRow([
        strategy,
        formatParams(params),
        String(report.numTrades),
        formatPercent(report.winRate),
        formatPercent(report.totalReturnPct),
        formatPercent(report.averageReturnPct),
        formatPercent(report.maxDrawdownPct),
        report.sharpe.toFixed(2),
        report.finalCapital.toFixed(2),
      ]),
    ),
  ];
};

const tradeTable = (trades: ReadonlyArray<Trade>): string[] => {
  if (trades.length === 0) {
    return ["_No trades._"];
  }
  return [
    tableRow(["#", "Entry", "Exit", "Entry price", "Exit price", "Return", "Exit reason"]),
    tableRow(["---", "---", "---", "---", "---", "---", "---"]),
    ...trades.map((trade, idx) =>
      tableRow([
        String(idx + 1),
        trade.entryTimestamp,
        trade.exitTimestamp,
        formatPrice(trade.entryPrice),
        formatPrice(trade.exitPrice),
        formatPercent(trade.returnPct),
        trade.exitReason,
      ]),
    ),
  ];
};

export const buildReportMarkdown = (payload: ReportPayload): string => {
  const window = `${payload.simulationStart ?? "series start"} to ${payload.simulationEnd ?? "series end"}`;
  const lines = [
    `# Backtest report: ${payload.symbol} ${payload.timeframe}`,
    "",
    `- Run: \`${payload.runId}\``,
    `- Generated: ${payload.generatedAt}`,
    `- Simulation window: ${window}`,
    `- Bars simulated: ${payload.barCount}`,
    `- Initial capital: ${payload.initialCapital.toFixed(2)}`,
    `- Fee rate: ${formatPercent(payload.feeRate)}`,
    `- Execution: ${payload.execution}`,
    "",
    "## Summary",
    "",
    ...summaryTable(payload.sections),
    "",
    "## Trades",
  ];

  for (const section of payload.sections) {
    lines.push("", `### ${section.strategy}`, "", ...tradeTable(section.trades));
  }

  return `${lines.join("\n")}\n`;
};

/**
 * Writes `{reportsDir}/{runId}/report.md` and returns its path.
 */
export const writeReportArtifact = async (reportsDir: string, payload: ReportPayload): Promise<string> => {
  const runDir = join(reportsDir, payload.runId);
  await mkdir(runDir, { recursive: true });
  const reportPath = join(runDir, "report.md");
  await writeFile(reportPath, buildReportMarkdown(payload), { encoding: "utf-8" });
  return reportPath;
};
