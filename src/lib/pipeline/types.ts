export type StageName =
  | 'ingest'
  | 'filter'
  | 'match'
  | 'extract'
  | 'regress';

/** Cells are kept as the source text; row 0 of the source becomes `header`. */
export type Table = {
  header: string[];
  rows: string[][];
};

export type GeoPoint = {
  lat: number;
  lon: number;
};

export type JoinResult = {
  /** Left row cells followed by the winning right row's cells. */
  matched: string[][];
  /** Left rows with no right row inside the threshold, unchanged. */
  dangling: string[][];
};

export type ParseErrorPolicy = 'zero' | 'skip_row' | 'fail';

export type RegressionSample = {
  target: number;
  predictors: number[];
};

export type RegressionResult = Readonly<{
  intercept: number;
  slope: number;
  rSquared: number;
  sampleCount: number;
}>;

export type PreviewPair = {
  index: number;
  target: number;
  normalizedPredictor: number;
};

export type PipelineReport = {
  country: string;
  maxDistanceKm: number;
  surveyHeader: string[];
  volumeHeader: string[];
  surveyCount: number;
  volumeCount: number;
  joinedCount: number;
  danglingCount: number;
  preview: PreviewPair[];
  result: RegressionResult;
};
