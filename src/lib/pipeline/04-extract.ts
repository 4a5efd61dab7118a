import type { ParseErrorPolicy, RegressionSample } from './types';
import { resolveCell } from './utils/parse-cell';

function readPredictors(row: string[], predictorCols: readonly number[], policy: ParseErrorPolicy): number[] | null {
  const predictors: number[] = [];
  for (const col of predictorCols) {
    if (col >= row.length) continue;
    const value = resolveCell(row, col, policy, 'predictor');
    if (value == null) return null;
    predictors.push(value);
  }
  return predictors;
}

/**
 * Pulls one sample per joined row that is long enough to hold the target.
 * Predictor columns past the end of a short row are left out of that sample.
 */
export function extractSamples(args: {
  joined: string[][];
  targetCol: number;
  predictorCols: readonly number[];
  onParseError?: ParseErrorPolicy;
}): RegressionSample[] {
  const policy = args.onParseError ?? 'zero';
  const samples: RegressionSample[] = [];

  for (const row of args.joined) {
    if (row.length <= args.targetCol) continue;

    const target = resolveCell(row, args.targetCol, policy, 'target');
    if (target == null) continue;

    const predictors = readPredictors(row, args.predictorCols, policy);
    if (predictors == null) continue;

    samples.push({ target, predictors });
  }

  return samples;
}
