import { DEFAULT_LAYOUT, parseLayout, type DatasetLayout, type PipelineConfig } from '../config';
import { loadTable } from './01-ingest';
import { filterByCountry } from './02-filter';
import { matchNearest } from './03-match';
import { extractSamples } from './04-extract';
import { fitRegression } from './05-regress';
import type { PipelineReport, PreviewPair, StageName } from './types';

const STAGES: { name: StageName; label: string }[] = [
  { name: 'ingest', label: 'Parse/ingest' },
  { name: 'filter', label: 'Country filter' },
  { name: 'match', label: 'Geo match' },
  { name: 'extract', label: 'Sample extraction' },
  { name: 'regress', label: 'Regression' }
];

function markStage(stageIndex: number, status: 'RUNNING' | 'DONE' | 'FAILED', message?: string) {
  console.log(`[Pipeline] Stage ${stageIndex} (${STAGES[stageIndex - 1].label}): ${status}${message ? ' — ' + message : ''}`);
}

/**
 * Load → filter → join → extract → fit. Any failure marks the running stage
 * FAILED and is rethrown; no partial report is returned.
 */
export async function runFlarePipeline(
  config: PipelineConfig,
  layoutInput: DatasetLayout = DEFAULT_LAYOUT
): Promise<PipelineReport> {
  let stage = 1;

  try {
    markStage(stage, 'RUNNING', `${config.surveyPath}, ${config.volumePath}`);
    const layout = parseLayout(layoutInput);
    const survey = await loadTable(config.surveyPath);
    const volume = await loadTable(config.volumePath);
    markStage(stage, 'DONE', `${survey.rows.length} survey rows, ${volume.rows.length} volume rows`);

    stage = 2;
    markStage(stage, 'RUNNING', config.country);
    const surveyFiltered = filterByCountry(survey, layout.survey.countryCol, config.country);
    const volumeFiltered = filterByCountry(volume, layout.volume.countryCol, config.country);
    markStage(stage, 'DONE', `${surveyFiltered.rows.length} survey, ${volumeFiltered.rows.length} volume`);

    stage = 3;
    markStage(stage, 'RUNNING', `max distance ${config.maxDistanceKm} km`);
    const joined = matchNearest({
      left: surveyFiltered,
      right: volumeFiltered,
      leftLatCol: layout.survey.latCol,
      leftLonCol: layout.survey.lonCol,
      rightLatCol: layout.volume.latCol,
      rightLonCol: layout.volume.lonCol,
      maxDistanceKm: config.maxDistanceKm,
      onParseError: config.onParseError
    });
    markStage(stage, 'DONE', `${joined.matched.length} matched, ${joined.dangling.length} dangling`);

    stage = 4;
    markStage(stage, 'RUNNING');
    const samples = extractSamples({
      joined: joined.matched,
      targetCol: layout.regression.targetCol,
      predictorCols: layout.regression.predictorCols,
      onParseError: config.onParseError
    });
    markStage(stage, 'DONE', `${samples.length} samples`);

    stage = 5;
    markStage(stage, 'RUNNING');
    let preview: PreviewPair[] = [];
    const result = fitRegression(samples, {
      previewLimit: config.previewLimit,
      onPreview: (pairs) => {
        preview = pairs;
      }
    });
    markStage(stage, 'DONE', `R² ${result.rSquared.toFixed(4)}`);

    return {
      country: config.country,
      maxDistanceKm: config.maxDistanceKm,
      surveyHeader: survey.header,
      volumeHeader: volume.header,
      surveyCount: surveyFiltered.rows.length,
      volumeCount: volumeFiltered.rows.length,
      joinedCount: joined.matched.length,
      danglingCount: joined.dangling.length,
      preview,
      result
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Pipeline failed';
    markStage(stage, 'FAILED', message);
    throw error;
  }
}
