export class BacktestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'BacktestError';
  }
}

export class InvalidInputError extends BacktestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_INPUT', details);
    this.name = 'InvalidInputError';
  }
}

export class ComputationError extends BacktestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'COMPUTATION_ERROR', details);
    this.name = 'ComputationError';
  }
}

export class MarketDataError extends BacktestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MARKET_DATA_ERROR', details);
    this.name = 'MarketDataError';
  }
}

export function isBacktestError(err: unknown): err is BacktestError {
  return err instanceof BacktestError;
}
