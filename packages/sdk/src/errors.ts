export type BacktestErrorCode = "configuration" | "data_integrity" | "computation";

/**
 * Base class for deterministic input-validity failures. None of these are
 * transient, so callers should not retry them.
 */
export class BacktestError extends Error {
  public readonly code: BacktestErrorCode;
  public readonly details?: Readonly<Record<string, unknown>>;

  public constructor(
    code: BacktestErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "BacktestError";
    this.code = code;
    this.details = details;
  }
}

/** Invalid strategy parameters or run options. */
export class ConfigurationError extends BacktestError {
  public constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super("configuration", message, details);
    this.name = "ConfigurationError";
  }
}

/** Malformed price series or signal sequence. */
export class DataIntegrityError extends BacktestError {
  public constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super("data_integrity", message, details);
    this.name = "DataIntegrityError";
  }
}

/** Arithmetic guard tripped while computing a result. */
export class ComputationError extends BacktestError {
  public constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super("computation", message, details);
    this.name = "ComputationError";
  }
}

export const isBacktestError = (error: unknown): error is BacktestError => {
  return error instanceof BacktestError;
};
