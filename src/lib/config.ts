import { z } from 'zod';
import { ConfigError } from './pipeline/errors';
import { DEFAULT_MAX_DISTANCE_KM } from './pipeline/03-match';
import { DEFAULT_PREVIEW_LIMIT } from './pipeline/05-regress';

const columnIndex = z.number().int().nonnegative();

const geoColumnsSchema = z.object({
  countryCol: columnIndex,
  latCol: columnIndex,
  lonCol: columnIndex
});

/**
 * Column positions for one dataset pair. Regression columns index into the
 * joined row, i.e. survey cells first, then volume cells.
 */
export const layoutSchema = z.object({
  survey: geoColumnsSchema,
  volume: geoColumnsSchema,
  regression: z.object({
    targetCol: columnIndex,
    predictorCols: z.array(columnIndex).min(1)
  })
});

export type DatasetLayout = z.infer<typeof layoutSchema>;

// EOG 2015 flare survey list joined with the 2012-2023 volume estimate workbook
export const DEFAULT_LAYOUT: DatasetLayout = {
  survey: { countryCol: 0, latCol: 4, lonCol: 5 },
  volume: { countryCol: 0, latCol: 1, lonCol: 2 },
  regression: {
    targetCol: 10, // flaring volume (million m3)
    predictorCols: [6, 7, 8] // flr_volume, avg_temp, dtc_freq
  }
};

const configSchema = z.object({
  surveyPath: z.string().min(1).default('eog_global_flare_survey_2015_flare_list.csv'),
  volumePath: z.string().min(1).default('2012-2023-individual-flare-volume-estimates.xlsx'),
  country: z.string().trim().min(1).default('Algeria'),
  maxDistanceKm: z.coerce.number().positive().finite().default(DEFAULT_MAX_DISTANCE_KM),
  onParseError: z.enum(['zero', 'skip_row', 'fail']).default('zero'),
  previewLimit: z.coerce.number().int().nonnegative().default(DEFAULT_PREVIEW_LIMIT)
});

export type PipelineConfig = z.infer<typeof configSchema>;

function blankToUndefined(value: string | undefined): string | undefined {
  return value == null || value.trim() === '' ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = configSchema.safeParse({
    surveyPath: blankToUndefined(env.FLARE_SURVEY_PATH),
    volumePath: blankToUndefined(env.FLARE_VOLUME_PATH),
    country: blankToUndefined(env.FLARE_COUNTRY),
    maxDistanceKm: blankToUndefined(env.FLARE_MAX_DISTANCE_KM),
    onParseError: blankToUndefined(env.FLARE_ON_PARSE_ERROR),
    previewLimit: blankToUndefined(env.FLARE_PREVIEW_LIMIT)
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'config';
    throw new ConfigError(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`);
  }

  return parsed.data;
}

export function parseLayout(input: unknown): DatasetLayout {
  const parsed = layoutSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid layout ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'invalid value'}`);
  }
  return parsed.data;
}
