import { z } from "zod";

import { isLogLevel, type LogLevel } from "@kline-lab/logger";
import {
  BacktestOptionsSchema,
  TIMEFRAMES,
  assertValid,
  isStrategyKey,
  strategyKeys,
  type DataSource,
  type ExecutionPolicy,
  type StrategyKey,
  type Timeframe,
} from "@kline-lab/sdk";

export interface CliConfig {
  readonly symbol: string;
  readonly timeframe: Timeframe;
  /** Range fetched from the data source; wider than the simulation so indicators warm up. */
  readonly fetchStart: string;
  readonly fetchEnd: string;
  readonly simulationStart?: string;
  readonly simulationEnd?: string;
  readonly initialCapital: number;
  readonly feeRate: number;
  readonly execution: ExecutionPolicy;
  readonly strategies: ReadonlyArray<StrategyKey>;
  readonly dataSource: DataSource;
  readonly datasetsDir: string;
  readonly reportsDir: string;
  readonly binanceBaseUrl: string;
  readonly logLevel: LogLevel;
}

const isoDate = z
  .string()
  .trim()
  .min(1)
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "must be an ISO-8601 date" });

const isTimeframe = (value: string): value is Timeframe => {
  return TIMEFRAMES.some((timeframe) => timeframe === value);
};

const numberFromEnv = z
  .string()
  .trim()
  .min(1)
  .transform((value, ctx) => {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a number` });
      return z.NEVER;
    }
    return parsed;
  });

const EnvSchema = z
  .object({
    BACKTEST_SYMBOL: z.string().trim().min(1).default("BTC/USDT"),
    BACKTEST_TIMEFRAME: z
      .string()
      .trim()
      .default("1d")
      .refine(isTimeframe, { message: `must be one of ${TIMEFRAMES.join(", ")}` }),
    BACKTEST_FETCH_START: isoDate.default("2023-01-01T00:00:00Z"),
    BACKTEST_FETCH_END: isoDate.default("2024-06-01T00:00:00Z"),
    BACKTEST_SIM_START: isoDate.default("2024-01-01"),
    BACKTEST_SIM_END: isoDate.default("2024-06-01"),
    BACKTEST_INITIAL_CAPITAL: numberFromEnv.default("10000"),
    BACKTEST_FEE_RATE: numberFromEnv.default("0.001"),
    BACKTEST_EXECUTION: z.enum(["signal_close", "next_open"]).default("signal_close"),
    BACKTEST_STRATEGIES: z
      .string()
      .default(strategyKeys.join(","))
      .transform((value) =>
        value
          .split(",")
          .map((key) => key.trim())
          .filter((key) => key.length > 0),
      )
      .superRefine((keys, ctx) => {
        if (keys.length === 0) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: "at least one strategy is required" });
        }
        for (const key of keys) {
          if (!isStrategyKey(key)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `unknown strategy "${key}"; expected one of ${strategyKeys.join(", ")}`,
            });
          }
        }
      }),
    BACKTEST_DATA_SOURCE: z.enum(["auto", "csv", "binance"]).default("auto"),
    DATASETS_DIR: z.string().trim().min(1).default("storage/datasets"),
    REPORTS_DIR: z.string().trim().min(1).default("storage/reports"),
    BINANCE_BASE_URL: z.string().trim().url().default("https://api.binance.com"),
    LOG_LEVEL: z
      .string()
      .trim()
      .toLowerCase()
      .default("info")
      .refine((value): value is LogLevel => isLogLevel(value), {
        message: "must be one of debug, info, warn, error",
      }),
  })
  .superRefine((env, ctx) => {
    if (Date.parse(env.BACKTEST_FETCH_START) > Date.parse(env.BACKTEST_FETCH_END)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "must not be after BACKTEST_FETCH_END",
        path: ["BACKTEST_FETCH_START"],
      });
    }
  });

/** Blank variables count as unset so `.env` templates can leave them empty. */
const dropBlank = (env: NodeJS.ProcessEnv): Record<string, string> => {
  const entries = Object.entries(env).filter(
    (entry): entry is [string, string] => typeof entry[1] === "string" && entry[1].trim().length > 0,
  );
  return Object.fromEntries(entries);
};

/**
 * Reads the CLI configuration from environment variables.
 *
 * @throws ConfigurationError listing every invalid variable.
 */
export const loadCliConfig = (env: NodeJS.ProcessEnv = process.env): CliConfig => {
  const parsed = assertValid(EnvSchema, dropBlank(env), "environment");
  const options = assertValid(
    BacktestOptionsSchema,
    {
      initialCapital: parsed.BACKTEST_INITIAL_CAPITAL,
      feeRate: parsed.BACKTEST_FEE_RATE,
      execution: parsed.BACKTEST_EXECUTION,
    },
    "environment",
  );

  return {
    symbol: parsed.BACKTEST_SYMBOL,
    timeframe: parsed.BACKTEST_TIMEFRAME,
    fetchStart: parsed.BACKTEST_FETCH_START,
    fetchEnd: parsed.BACKTEST_FETCH_END,
    simulationStart: parsed.BACKTEST_SIM_START,
    simulationEnd: parsed.BACKTEST_SIM_END,
    initialCapital: options.initialCapital,
    feeRate: options.feeRate,
    execution: options.execution,
    strategies: parsed.BACKTEST_STRATEGIES.filter(isStrategyKey),
    dataSource: parsed.BACKTEST_DATA_SOURCE,
    datasetsDir: parsed.DATASETS_DIR,
    reportsDir: parsed.REPORTS_DIR,
    binanceBaseUrl: parsed.BINANCE_BASE_URL,
    logLevel: parsed.LOG_LEVEL,
  };
};
