import { strict as assert } from "node:assert";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import { createLogger, type LogSink } from "@kline-lab/logger";
import type { Bar, DataRequest } from "@kline-lab/sdk";

process.env.KLINE_CLI_AUTOSTART = "false";
const { generateRunId, main } = await import("../src/index.js");

const bars: Bar[] = Array.from({ length: 10 }, (_, idx) => ({
  timestamp: new Date(Date.UTC(2024, 0, idx + 1)).toISOString(),
  open: 100 + idx,
  high: 100 + idx,
  low: 100 + idx,
  close: 100 + idx,
  volume: 1,
}));

test("generateRunId slugs the symbol and timeframe", () => {
  const now = new Date("2024-06-02T00:00:00.000Z");
  assert.equal(
    generateRunId({ symbol: "BTC/USDT", timeframe: "1d" }, now),
    `btc-usdt-1d-${now.getTime().toString(36)}`,
  );
});

test("main loads the series, compares strategies and writes the report", async (t) => {
  const reportsDir = await mkdtemp(join(tmpdir(), "cli-reports-"));
  t.after(async () => {
    await rm(reportsDir, { recursive: true, force: true });
  });

  const requests: DataRequest[] = [];
  const printed: string[] = [];
  const messages: string[] = [];
  const sink: LogSink = (_level, line) => {
    messages.push(String(JSON.parse(line).msg));
  };
  const now = new Date("2024-06-02T00:00:00.000Z");

  const summary = await main({
    env: {
      BACKTEST_STRATEGIES: "sma_crossover,buy_and_hold",
      BACKTEST_SIM_START: "2024-01-01",
      BACKTEST_SIM_END: "2024-01-31",
      BACKTEST_FEE_RATE: "0",
      REPORTS_DIR: reportsDir,
    },
    logger: createLogger("cli-test", { level: "info", sink }),
    loader: {
      load: async (request) => {
        requests.push(request);
        return bars;
      },
    },
    now: () => now,
    print: (text) => printed.push(text),
  });

  assert.deepEqual(requests, [
    {
      source: "auto",
      symbol: "BTC/USDT",
      timeframe: "1d",
      start: "2023-01-01T00:00:00Z",
      end: "2024-06-01T00:00:00Z",
    },
  ]);
  assert.equal(summary.runId, generateRunId({ symbol: "BTC/USDT", timeframe: "1d" }, now));
  assert.deepEqual(
    summary.rows.map((row) => [row.strategy, row.report.numTrades]),
    [
      ["sma_crossover", 0],
      ["buy_and_hold", 1],
    ],
  );
  assert.equal(summary.rows[1]?.trades[0]?.exitPrice, 109);

  assert.equal(printed.length, 1);
  assert.ok(printed[0]?.startsWith("Strategy "));

  assert.equal(summary.reportPath, join(reportsDir, summary.runId, "report.md"));
  const markdown = await readFile(summary.reportPath, { encoding: "utf-8" });
  assert.ok(markdown.startsWith("# Backtest report: BTC/USDT 1d\n"));
  assert.ok(markdown.includes("- Bars simulated: 10\n"));

  assert.deepEqual(messages, [
    "Starting comparison",
    "Loaded price series",
    "Strategy finished",
    "Strategy finished",
    "Report written",
  ]);
});

test("main rejects an invalid environment before loading data", async () => {
  let loads = 0;
  await assert.rejects(
    main({
      env: { BACKTEST_STRATEGIES: "nope" },
      loader: {
        load: async () => {
          loads += 1;
          return bars;
        },
      },
      print: () => {},
    }),
    /unknown strategy "nope"/,
  );
  assert.equal(loads, 0);
});
