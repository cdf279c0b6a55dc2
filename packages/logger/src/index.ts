export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = {
  /** Correlates every line written during one comparison run. */
  readonly runId?: string;
} & Record<string, unknown>;

/** Receives one serialised JSON line, without the trailing newline. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Lowest level written. Falls back to `LOG_LEVEL`, then `debug`. */
  readonly level?: LogLevel;
  readonly sink?: LogSink;
}

export interface Logger {
  readonly module: string;
  readonly level: LogLevel;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  child(suffix: string): Logger;
}

export const isLogLevel = (value: unknown): value is LogLevel => {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
};

const writeLine: LogSink = (level, line) => {
  const output = level === "error" ? process.stderr : process.stdout;
  output.write(`${line}\n`);
};

const resolveLevel = (explicit: LogLevel | undefined): LogLevel => {
  if (explicit) {
    return explicit;
  }
  const fromEnv = process.env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "debug";
};

const buildEntry = (moduleName: string, level: LogLevel, msg: string, meta?: LogMeta) => {
  const { runId, ...rest } = meta ?? {};

  return {
    ts: new Date().toISOString(),
    level,
    module: moduleName,
    msg,
    ...(typeof runId === "string" ? { runId } : {}),
    ...rest,
  };
};

export const createLogger = (moduleName: string, options: LoggerOptions = {}): Logger => {
  const threshold = resolveLevel(options.level);
  const sink = options.sink ?? writeLine;

  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
      return;
    }
    sink(level, JSON.stringify(buildEntry(moduleName, level, msg, meta)));
  };

  return {
    module: moduleName,
    level: threshold,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (suffix) => createLogger(`${moduleName}:${suffix}`, { level: threshold, sink }),
  };
};
