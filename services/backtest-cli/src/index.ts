import { config as loadEnv } from "dotenv";
import { isAbsolute, join } from "node:path";
import { fileURLToPath } from "node:url";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");
loadEnv({ path: join(REPO_ROOT, ".env") });
loadEnv();

import { BinanceSource, CsvSource, PriceSeriesLoader } from "@kline-lab/data";
import { createLogger, type Logger } from "@kline-lab/logger";
import { formatSummaryTable, writeReportArtifact, type ReportPayload } from "@kline-lab/report";
import { createStrategy, type Bar, type DataRequest } from "@kline-lab/sdk";

import { runComparison, type ComparisonRow } from "./comparison.js";
import { loadCliConfig, type CliConfig } from "./config.js";

export { runComparison, type ComparisonInput, type ComparisonRow } from "./comparison.js";
export { loadCliConfig, type CliConfig } from "./config.js";

export interface SeriesLoader {
  load(request: DataRequest): Promise<ReadonlyArray<Bar>>;
}

export interface CliDependencies {
  readonly env?: NodeJS.ProcessEnv;
  readonly logger?: Logger;
  readonly loader?: SeriesLoader;
  readonly now?: () => Date;
  readonly print?: (text: string) => void;
}

export interface CliRunSummary {
  readonly runId: string;
  readonly rows: ReadonlyArray<ComparisonRow>;
  readonly reportPath: string;
}

/** Storage paths in the environment are relative to the repository root. */
const resolveStoragePath = (dir: string): string => {
  return isAbsolute(dir) ? dir : join(REPO_ROOT, dir);
};

export const generateRunId = (config: Pick<CliConfig, "symbol" | "timeframe">, now: Date): string => {
  const slug = `${config.symbol}-${config.timeframe}`
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  const suffix = now.getTime().toString(36);
  return slug.length > 0 ? `${slug}-${suffix}` : `run-${suffix}`;
};

const createDefaultLoader = (config: CliConfig, logger: Logger): SeriesLoader => {
  return new PriceSeriesLoader({
    csv: new CsvSource({ datasetsDir: resolveStoragePath(config.datasetsDir) }),
    remote: new BinanceSource({ baseUrl: config.binanceBaseUrl }),
    logger: logger.child("data"),
  });
};

const writeStdout = (text: string): void => {
  process.stdout.write(`${text}\n`);
};

/**
 * Loads one series, runs every configured strategy over the same window and
 * writes the comparison report.
 */
export const main = async (deps: CliDependencies = {}): Promise<CliRunSummary> => {
  const config = loadCliConfig(deps.env ?? process.env);
  const logger = deps.logger ?? createLogger("services/backtest-cli", { level: config.logLevel });
  const now = deps.now ?? (() => new Date());
  const print = deps.print ?? writeStdout;
  const runId = generateRunId(config, now());

  logger.info("Starting comparison", {
    runId,
    symbol: config.symbol,
    timeframe: config.timeframe,
    strategies: config.strategies,
  });

  const loader = deps.loader ?? createDefaultLoader(config, logger);
  const bars = await loader.load({
    source: config.dataSource,
    symbol: config.symbol,
    timeframe: config.timeframe,
    start: config.fetchStart,
    end: config.fetchEnd,
  });
  logger.info("Loaded price series", {
    runId,
    bars: bars.length,
    first: bars[0]?.timestamp,
    last: bars[bars.length - 1]?.timestamp,
  });

  const rows = runComparison({
    bars,
    strategies: config.strategies.map((key) => createStrategy(key)),
    options: {
      simulationStart: config.simulationStart,
      simulationEnd: config.simulationEnd,
      initialCapital: config.initialCapital,
      feeRate: config.feeRate,
      execution: config.execution,
    },
  });

  for (const row of rows) {
    logger.info("Strategy finished", {
      runId,
      strategy: row.strategy,
      trades: row.report.numTrades,
      winRate: row.report.winRate,
      totalReturnPct: row.report.totalReturnPct,
      maxDrawdownPct: row.report.maxDrawdownPct,
      finalCapital: row.report.finalCapital,
    });
  }

  print(formatSummaryTable(rows));

  const payload: ReportPayload = {
    runId,
    generatedAt: now().toISOString(),
    symbol: config.symbol,
    timeframe: config.timeframe,
    simulationStart: config.simulationStart,
    simulationEnd: config.simulationEnd,
    barCount: rows[0]?.bars.length ?? 0,
    initialCapital: config.initialCapital,
    feeRate: config.feeRate,
    execution: config.execution,
    sections: rows,
  };
  const reportPath = await writeReportArtifact(resolveStoragePath(config.reportsDir), payload);
  logger.info("Report written", { runId, reportPath });

  return { runId, rows, reportPath };
};

const shouldAutostart = process.env.KLINE_CLI_AUTOSTART !== "false";

if (shouldAutostart) {
  const logger = createLogger("services/backtest-cli");
  void main().catch((error) => {
    logger.error("Backtest comparison failed", {
      error: error instanceof Error ? error.message : String(error),
      ...(error instanceof Error && "code" in error ? { code: error.code } : {}),
    });
    process.exit(1);
  });
}
