import type { MigrationConfig } from '../config';
import type { Logger } from '../logger';
import { createEnrichHolidaysStage, type EnrichHolidaysDeps } from '../stages/enrichHolidays';
import { createFinalizeStage } from '../stages/finalize';
import { createMergeSpreadsheetsStage, type MergeSpreadsheetsDeps } from '../stages/mergeSpreadsheets';
import { createMergeWeatherStage } from '../stages/mergeWeather';
import { runPipeline } from './orchestrator';
import { fileCheck, workbookDirectoryCheck, type PreflightCheck } from './preflight';
import type { PipelineRunResult, PipelineStage } from './types';

export type MigrationDeps = MergeSpreadsheetsDeps & EnrichHolidaysDeps;

export function createMigrationStages(config: MigrationConfig, deps: MigrationDeps = {}): PipelineStage[] {
  return [
    createMergeSpreadsheetsStage(config, deps),
    createEnrichHolidaysStage(config, deps),
    createMergeWeatherStage(config),
    createFinalizeStage(config)
  ];
}

export function createPreflightChecks(config: MigrationConfig): PreflightCheck[] {
  const { spreadsheetDir, holidayFile, weatherFile } = config.paths;
  return [
    workbookDirectoryCheck('Load workbook directory', spreadsheetDir),
    fileCheck('Holiday calendar', holidayFile),
    fileCheck('Weather table', weatherFile, 'run `loadgrid fetch-weather` first')
  ];
}

export async function runMigration(
  config: MigrationConfig,
  logger: Logger,
  deps: MigrationDeps = {}
): Promise<PipelineRunResult> {
  return runPipeline(createMigrationStages(config, deps), { config, logger }, {
    preflight: createPreflightChecks(config)
  });
}
