import { RegressionError } from '../errors';

// Min-max scaling onto [0, 1].
export function minMaxNormalize(values: readonly number[]): number[] {
  if (values.length === 0) {
    throw new RegressionError('EMPTY_SAMPLES');
  }

  let min = values[0];
  let max = values[0];
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }

  const span = max - min;
  if (span === 0) {
    throw new RegressionError('CONSTANT_PREDICTOR');
  }

  return values.map((value) => (value - min) / span);
}
