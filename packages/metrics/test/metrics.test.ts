import { strict as assert } from "node:assert";
import test from "node:test";

import type { Trade } from "@kline-lab/sdk";

import {
  buildPerformanceReport,
  calculateAverageReturn,
  calculateMaxDrawdown,
  calculateReturns,
  calculateSharpe,
  calculateTotalReturn,
  calculateWinRate,
  inferPeriodsPerYear,
  type EquityPoint,
} from "../src/index.js";

const near = (actual: number, expected: number, tolerance = 1e-9): void => {
  assert.ok(Math.abs(actual - expected) < tolerance, `${actual} != ${expected}`);
};

const curve = (values: number[]): EquityPoint[] =>
  values.map((equity, idx) => ({
    timestamp: new Date(Date.UTC(2024, 0, idx + 1)).toISOString(),
    equity,
  }));

const trade = (returnPct: number, entryIndex = 0): Trade => ({
  entryIndex,
  exitIndex: entryIndex + 1,
  entryTimestamp: new Date(Date.UTC(2024, 0, entryIndex + 1)).toISOString(),
  exitTimestamp: new Date(Date.UTC(2024, 0, entryIndex + 2)).toISOString(),
  entryPrice: 100,
  exitPrice: 100 * (1 + returnPct),
  returnPct,
  exitReason: "signal",
});

// ============================================================================
// Trade-list metrics
// ============================================================================

test("calculateTotalReturn compounds instead of summing", () => {
  near(calculateTotalReturn([{ returnPct: 0.25 }, { returnPct: -0.2 }]), 0);
  near(calculateTotalReturn([{ returnPct: 0.1 }, { returnPct: 0.1 }]), 0.21);
});

test("calculateTotalReturn is zero without trades", () => {
  assert.equal(calculateTotalReturn([]), 0);
});

test("calculateWinRate counts strictly positive returns", () => {
  assert.equal(
    calculateWinRate([{ returnPct: 0.1 }, { returnPct: 0 }, { returnPct: -0.1 }, { returnPct: 0.2 }]),
    0.5,
  );
});

test("calculateWinRate is zero without trades", () => {
  assert.equal(calculateWinRate([]), 0);
});

test("calculateAverageReturn is the arithmetic mean", () => {
  near(calculateAverageReturn([{ returnPct: 0.25 }, { returnPct: -0.2 }]), 0.025);
  assert.equal(calculateAverageReturn([]), 0);
});

// ============================================================================
// Equity-curve metrics
// ============================================================================

test("calculateReturns computes sequential percentage returns", () => {
  const returns = calculateReturns(curve([100, 110, 88]));
  assert.equal(returns.length, 2);
  near(returns[0] ?? Number.NaN, 0.1);
  near(returns[1] ?? Number.NaN, -0.2);
});

test("calculateReturns skips non-positive starting equity", () => {
  assert.deepEqual(calculateReturns(curve([0, 100])), []);
  assert.deepEqual(calculateReturns(curve([100])), []);
  assert.deepEqual(calculateReturns([]), []);
});

test("calculateSharpe annualises the mean over the deviation of returns", () => {
  near(calculateSharpe(curve([100, 110, 88])), -Math.sqrt(365) / 3, 1e-6);
});

test("calculateSharpe returns zero when variance is zero", () => {
  assert.equal(calculateSharpe(curve([100, 110, 121])), 0);
  assert.equal(calculateSharpe(curve([100, 100, 100])), 0);
  assert.equal(calculateSharpe(curve([100])), 0);
});

test("calculateMaxDrawdown identifies largest drop", () => {
  near(calculateMaxDrawdown(curve([100, 120, 90, 130, 117])), -0.25);
});

test("calculateMaxDrawdown returns zero for increasing or empty curves", () => {
  assert.equal(calculateMaxDrawdown(curve([100, 101, 102])), 0);
  assert.equal(calculateMaxDrawdown([]), 0);
});

test("inferPeriodsPerYear reads the median bar spacing", () => {
  const day = (offset: number) => new Date(Date.UTC(2024, 0, 1) + offset * 86_400_000).toISOString();
  const hour = (offset: number) => new Date(Date.UTC(2024, 0, 1) + offset * 3_600_000).toISOString();
  near(inferPeriodsPerYear([day(0), day(1), day(2)]), 365);
  near(inferPeriodsPerYear([hour(0), hour(1), hour(2), hour(3)]), 8_760);
  // one weekend-sized gap does not move the median
  near(inferPeriodsPerYear([day(0), day(1), day(4), day(5)]), 365);
});

test("inferPeriodsPerYear falls back to daily without a measurable spacing", () => {
  assert.equal(inferPeriodsPerYear([]), 365);
  assert.equal(inferPeriodsPerYear([new Date(Date.UTC(2024, 0, 1)).toISOString()]), 365);
});

// ============================================================================
// Report
// ============================================================================

test("buildPerformanceReport derives every field from the final trades", () => {
  const report = buildPerformanceReport(
    [trade(0.25, 0), trade(-0.2, 2), trade(0.1, 4)],
    curve([1_000, 1_250, 1_250, 1_000, 1_000, 1_100]),
    1_000,
  );

  assert.equal(report.numTrades, 3);
  near(report.winRate, 2 / 3);
  near(report.totalReturnPct, 0.1);
  near(report.averageReturnPct, 0.05);
  assert.equal(report.initialCapital, 1_000);
  near(report.finalCapital, 1_100, 1e-6);
  near(report.maxDrawdownPct, -0.2);
  assert.ok(Number.isFinite(report.sharpe));
});

test("buildPerformanceReport annualises Sharpe at the bar frequency", () => {
  const equities = [100, 110, 88];
  const hourly: EquityPoint[] = equities.map((equity, idx) => ({
    timestamp: new Date(Date.UTC(2024, 0, 1, idx)).toISOString(),
    equity,
  }));
  const daily = buildPerformanceReport([], curve(equities), 100);
  const byHour = buildPerformanceReport([], hourly, 100);
  near(daily.sharpe, -Math.sqrt(365) / 3, 1e-6);
  near(byHour.sharpe, -Math.sqrt(8_760) / 3, 1e-6);
  near(buildPerformanceReport([], hourly, 100, 365).sharpe, daily.sharpe, 1e-9);
});

test("buildPerformanceReport for an empty run", () => {
  const report = buildPerformanceReport([], curve([5_000, 5_000]), 5_000);
  assert.deepEqual(report, {
    totalReturnPct: 0,
    numTrades: 0,
    winRate: 0,
    averageReturnPct: 0,
    initialCapital: 5_000,
    finalCapital: 5_000,
    maxDrawdownPct: 0,
    sharpe: 0,
  });
});
