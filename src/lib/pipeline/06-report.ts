import type { PipelineReport } from './types';

function fixed(value: number): string {
  return value.toFixed(4);
}

function headerLine(label: string, header: string[]): string {
  return `${label} headers: [${header.join(' ')}]`;
}

export function formatModel(intercept: number, slope: number): string {
  const sign = slope < 0 ? '-' : '+';
  return `target = ${fixed(intercept)} ${sign} ${fixed(Math.abs(slope))} * predictor_normalized`;
}

export function formatReport(report: PipelineReport): string[] {
  const lines = [
    headerLine('Survey', report.surveyHeader),
    headerLine('Volume', report.volumeHeader),
    `Filtered ${report.country} records in survey: ${report.surveyCount}`,
    `Filtered ${report.country} records in volume: ${report.volumeCount}`,
    `Joined records (within ${fixed(report.maxDistanceKm)} km): ${report.joinedCount}`,
    `Dangling survey records: ${report.danglingCount}`,
    '',
    `Sample normalized data (first ${report.preview.length} values):`
  ];

  for (const pair of report.preview) {
    lines.push(
      `y[${pair.index}] (target): ${fixed(pair.target)}, x[${pair.index}] (normalized predictor): ${fixed(pair.normalizedPredictor)}`
    );
  }

  lines.push(
    '',
    `Regression model (normalized): ${formatModel(report.result.intercept, report.result.slope)}`,
    `R-squared (normalized): ${fixed(report.result.rSquared)}`
  );

  return lines;
}
