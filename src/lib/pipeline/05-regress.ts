import { RegressionError } from './errors';
import type { PreviewPair, RegressionResult, RegressionSample } from './types';
import { minMaxNormalize } from './utils/normalize';

export const DEFAULT_PREVIEW_LIMIT = 10;

function mean(values: readonly number[]): number {
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}

/**
 * Simple linear regression of the target on the first predictor, after min-max
 * scaling that predictor: `target ≈ intercept + slope * x'`.
 *
 * Further predictor components are ignored. Degenerate inputs throw a
 * `RegressionError` instead of yielding NaN.
 */
export function fitRegression(
  samples: readonly RegressionSample[],
  options: {
    previewLimit?: number;
    onPreview?: (pairs: PreviewPair[]) => void;
  } = {}
): RegressionResult {
  if (samples.length === 0) {
    throw new RegressionError('EMPTY_SAMPLES');
  }

  const y: number[] = [];
  const xRaw: number[] = [];
  for (const sample of samples) {
    if (sample.predictors.length === 0) {
      throw new RegressionError('MISSING_PREDICTOR');
    }
    y.push(sample.target);
    xRaw.push(sample.predictors[0]);
  }

  const x = minMaxNormalize(xRaw);

  // Checked on the values: a constant target's mean can round, leaving SS_total a tiny nonzero
  if (y.every((value) => value === y[0])) {
    throw new RegressionError('CONSTANT_TARGET');
  }

  if (options.onPreview) {
    const limit = Math.min(y.length, options.previewLimit ?? DEFAULT_PREVIEW_LIMIT);
    const pairs: PreviewPair[] = [];
    for (let i = 0; i < limit; i += 1) {
      pairs.push({ index: i, target: y[i], normalizedPredictor: x[i] });
    }
    options.onPreview(pairs);
  }

  const yMean = mean(y);
  const xMean = mean(x);

  let covariance = 0;
  let variance = 0;
  for (let i = 0; i < y.length; i += 1) {
    const dx = x[i] - xMean;
    covariance += dx * (y[i] - yMean);
    variance += dx * dx;
  }

  // variance > 0 here: normalization guarantees both 0 and 1 occur in x
  const slope = covariance / variance;
  const intercept = yMean - slope * xMean;

  let ssTotal = 0;
  let ssResidual = 0;
  for (let i = 0; i < y.length; i += 1) {
    const predicted = intercept + slope * x[i];
    ssTotal += (y[i] - yMean) * (y[i] - yMean);
    ssResidual += (y[i] - predicted) * (y[i] - predicted);
  }

  if (ssTotal === 0) {
    throw new RegressionError('CONSTANT_TARGET');
  }

  return Object.freeze({
    intercept,
    slope,
    rSquared: 1 - ssResidual / ssTotal,
    sampleCount: samples.length
  });
}
