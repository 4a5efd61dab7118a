/** Source file missing, unreadable, or without any rows. Aborts the run. */
export class InputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InputError';
  }
}

/** Raised for a malformed numeric cell when the parse policy is `fail`. */
export class ParseError extends Error {
  readonly column: number;
  readonly cell: string | undefined;

  constructor(args: { column: number; cell: string | undefined; context: string }) {
    const shown = args.cell === undefined ? 'missing cell' : `"${args.cell}"`;
    super(`Cannot parse ${args.context} in column ${args.column}: ${shown}`);
    this.name = 'ParseError';
    this.column = args.column;
    this.cell = args.cell;
  }
}

export type RegressionFailure =
  | 'EMPTY_SAMPLES'
  | 'MISSING_PREDICTOR'
  | 'CONSTANT_PREDICTOR'
  | 'CONSTANT_TARGET';

const REGRESSION_MESSAGES: Record<RegressionFailure, string> = {
  EMPTY_SAMPLES: 'Insufficient data for regression analysis: no samples',
  MISSING_PREDICTOR: 'Insufficient data for regression analysis: sample has no predictor value',
  CONSTANT_PREDICTOR: 'Cannot normalize predictor: all values are equal',
  CONSTANT_TARGET: 'Cannot compute R-squared: target has zero variance'
};

/** A degenerate fit. Distinct from a valid fit with a poor R². */
export class RegressionError extends Error {
  readonly reason: RegressionFailure;

  constructor(reason: RegressionFailure) {
    super(REGRESSION_MESSAGES[reason]);
    this.name = 'RegressionError';
    this.reason = reason;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
